// scripts/run-migrations.ts
// Applies src/db/migrations/*.sql over one connection to DATABASE_URL.

import 'dotenv/config';
import path from 'path';
import pg from 'pg';
import { applyMigrations } from '../src/db/migrate.js';

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    console.error('[migrate] DATABASE_URL is not set');
    process.exitCode = 1;
    return;
  }

  const pool = new pg.Pool({ connectionString, max: 1 });
  try {
    const dir = path.resolve(process.cwd(), 'src/db/migrations');
    const applied = await applyMigrations(pool, dir, (file) => console.log(`[migrate] ${file} applied`));
    console.log(`[migrate] done (${applied.length} file${applied.length === 1 ? '' : 's'})`);
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  if (err instanceof pg.DatabaseError) {
    const { code, severity, detail, hint, routine } = err;
    console.error('[migrate] failed', { code, severity, detail: detail ?? err.message, hint, routine });
  } else {
    console.error('[migrate] failed', err);
  }
  process.exitCode = 1;
});
