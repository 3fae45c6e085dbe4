/**
 * src/config/env.ts
 * What: Environment configuration loader/validator.
 * How: Loads .env via dotenv and validates the environment with zod. Numeric settings arrive as strings and are
 *      coerced with defaults; empty strings count as unset. `loadConfig()` is called once at boot and the result
 *      is passed down explicitly, so nothing reads process.env after startup.
 */

import 'dotenv/config';
import { z } from 'zod';

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const toNumber = (v: unknown) => {
  const value = blankToUndefined(v);
  return typeof value === 'string' ? Number(value) : value;
};

const intWithDefault = (def: number) => z.preprocess(toNumber, z.number().int().positive().default(def));

const countWithDefault = (def: number) => z.preprocess(toNumber, z.number().int().nonnegative().default(def));

const floatWithDefault = (def: number, min: number, max: number) =>
  z.preprocess(toNumber, z.number().min(min).max(max).default(def));

const schema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_EMBED_MODEL: z.preprocess(blankToUndefined, z.string().default('text-embedding-3-small')),
  OPENAI_CHAT_MODEL: z.preprocess(blankToUndefined, z.string().default('gpt-4o')),
  EMBED_DIMENSIONS: intWithDefault(1536),
  EMBED_BATCH_SIZE: intWithDefault(32),
  CHUNK_MAX_SIZE: intWithDefault(1500),
  CHUNK_OVERLAP: countWithDefault(200),
  INGEST_CONCURRENCY: intWithDefault(2),
  WRITE_CONCURRENCY: intWithDefault(8),
  RETRIEVAL_TOP_K: intWithDefault(8),
  RETRIEVAL_MIN_SCORE: floatWithDefault(0.15, 0, 0.99),
  DEDUP_THRESHOLD: floatWithDefault(0.9, 0.01, 1),
  HISTORY_TURNS: intWithDefault(6),
  MAX_CONTEXT_CHARS: intWithDefault(12_000),
  MAX_IMAGES: intWithDefault(4),
  IMAGE_PAGE_WINDOW: countWithDefault(0),
  PORT: intWithDefault(3000),
  NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
});

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const config = parsed.data;
  if (config.CHUNK_OVERLAP >= config.CHUNK_MAX_SIZE) {
    throw new Error('Invalid environment configuration: CHUNK_OVERLAP must be smaller than CHUNK_MAX_SIZE');
  }
  return config;
}
