// src/db/migrate.ts
// Applies the *.sql files of a directory in filename order. Each file wraps itself in BEGIN/COMMIT and guards with
// IF NOT EXISTS, so re-running everything is the upgrade path.

import { promises as fs } from 'fs';
import path from 'path';
import type { Queryable } from './pool.js';

export async function listMigrations(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith('.sql'))
    .map((e) => e.name)
    .sort();
}

export async function applyMigrations(
  db: Queryable,
  dir: string,
  onApplied: (file: string) => void = () => {},
): Promise<string[]> {
  const files = await listMigrations(dir);
  for (const file of files) {
    await db.query(await fs.readFile(path.join(dir, file), 'utf8'));
    onApplied(file);
  }
  return files;
}
