// src/services/ingestion.ts
// What: Turns an uploaded PDF into a ready document: parse → chunk → embed → store.
// How: Reserves the document row first (pending; the unique filename constraint rejects duplicates), then
//      parses, normalizes and chunks the text, embeds chunks in batches and writes each batch with bounded
//      concurrency (p-limit), inserts the extracted images and finally marks the document ready. Any failure after
//      the reservation deletes everything written for the document before the typed error is rethrown.

import path from 'path';
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { AppError, IngestionError, ValidationError, errorMessage } from '../errors.js';
import logger from '../logging.js';
import type {
  ChunkRecord,
  DocumentParser,
  Embedder,
  MetadataStore,
  ParsedDocument,
  TextBlock,
  VectorStore,
} from '../models/types.js';
import { chunkText, validateChunkOptions, type ChunkCandidate, type ChunkOptions } from './chunking.js';
import { assertDimensions } from './embeddings.js';

export interface IngestDeps {
  parser: DocumentParser;
  embedder: Embedder;
  vectors: VectorStore;
  metadata: MetadataStore;
}

export interface IngestOptions {
  chunk: Partial<ChunkOptions>;
  embedBatchSize: number;
  writeConcurrency: number;
}

export const DEFAULT_INGEST_OPTIONS: IngestOptions = {
  chunk: {},
  embedBatchSize: 32,
  writeConcurrency: 8,
};

export interface IngestResult {
  documentId: string;
  filename: string;
  chunkCount: number;
  imageCount: number;
}

export interface IngestFile {
  bytes: Buffer;
  filename: string;
}

export type IngestOutcome =
  | { ok: true; filename: string; result: IngestResult }
  | { ok: false; filename: string; error: { kind: string; message: string } };

export interface IngestManyOptions extends IngestOptions {
  ingestConcurrency: number;
}

const MAX_FILENAME_LENGTH = 200;

/**
 * Sanitize filename to prevent path traversal and ensure valid characters.
 * - Removes path components (/, \)
 * - Limits length to 200 characters, keeping the extension
 * - Replaces problematic characters
 */
export function sanitizeFilename(name: string): string {
  let sanitized = path.posix.basename(name.replace(/\\/g, '/'));
  sanitized = sanitized.replace(/[<>:"|?*\x00-\x1f]/g, '_').trim();

  const ext = path.extname(sanitized);
  const base = sanitized.slice(0, sanitized.length - ext.length);
  const maxBaseLen = MAX_FILENAME_LENGTH - ext.length;
  if (base.length > maxBaseLen) {
    sanitized = base.substring(0, maxBaseLen) + ext;
  }

  if (sanitized === '' || sanitized === '.' || sanitized === '..') {
    throw new ValidationError(`Invalid filename: "${name}"`);
  }
  return sanitized;
}

export async function ingestDocument(
  deps: IngestDeps,
  bytes: Buffer,
  filename: string,
  options: Partial<IngestOptions> = {},
): Promise<IngestResult> {
  const opts = validateIngestOptions(options);
  const name = sanitizeFilename(filename);
  const documentId = uuidv4();

  let reserved: boolean;
  try {
    reserved = await deps.metadata.reserveDocument(documentId, name);
  } catch (err) {
    throw new IngestionError('StorageFailure', `Could not register document: ${errorMessage(err)}`, { cause: err });
  }
  if (!reserved) {
    throw new IngestionError('DuplicateFilename', `A document named "${name}" already exists`);
  }

  try {
    const counts = await writeDocument(deps, documentId, bytes, opts);
    try {
      await deps.metadata.markReady(documentId, counts);
    } catch (err) {
      throw new IngestionError('StorageFailure', `Could not finalize document: ${errorMessage(err)}`, { cause: err });
    }
    logger.info({ documentId, filename: name, ...counts }, 'Document ingested');
    return { documentId, filename: name, ...counts };
  } catch (err) {
    const failure =
      err instanceof IngestionError
        ? err
        : new IngestionError('StorageFailure', `Ingestion failed: ${errorMessage(err)}`, { cause: err });
    logger.warn({ documentId, filename: name, kind: failure.kind, err: failure.cause ?? failure }, 'Ingestion failed');
    await rollback(deps, documentId, failure);
    throw failure;
  }
}

/**
 * Ingests every file independently; a failing file is reported in its outcome and never stops the others.
 * Outcomes are in input order.
 */
export async function ingestMany(
  deps: IngestDeps,
  files: readonly IngestFile[],
  options: Partial<IngestManyOptions> = {},
): Promise<IngestOutcome[]> {
  const { ingestConcurrency = 2, ...ingestOptions } = options;
  const limit = pLimit(ingestConcurrency);
  return Promise.all(
    files.map((file) =>
      limit(async (): Promise<IngestOutcome> => {
        try {
          const result = await ingestDocument(deps, file.bytes, file.filename, ingestOptions);
          return { ok: true, filename: result.filename, result };
        } catch (err) {
          const kind = err instanceof AppError ? err.code : 'InternalError';
          if (!(err instanceof AppError)) logger.error({ err, filename: file.filename }, 'Unexpected ingestion error');
          return { ok: false, filename: file.filename, error: { kind, message: errorMessage(err) } };
        }
      }),
    ),
  );
}

function validateIngestOptions(options: Partial<IngestOptions>): IngestOptions & { chunk: ChunkOptions } {
  const opts = { ...DEFAULT_INGEST_OPTIONS, ...options };
  if (!Number.isInteger(opts.embedBatchSize) || opts.embedBatchSize < 1) {
    throw new RangeError(`embedBatchSize must be a positive integer, got ${opts.embedBatchSize}`);
  }
  if (!Number.isInteger(opts.writeConcurrency) || opts.writeConcurrency < 1) {
    throw new RangeError(`writeConcurrency must be a positive integer, got ${opts.writeConcurrency}`);
  }
  return { ...opts, chunk: validateChunkOptions(opts.chunk) };
}

async function writeDocument(
  deps: IngestDeps,
  documentId: string,
  bytes: Buffer,
  opts: IngestOptions & { chunk: ChunkOptions },
): Promise<{ chunkCount: number; imageCount: number }> {
  const parsed = await parse(deps.parser, bytes);
  const text = joinBlocks(parsed.textBlocks);
  if (text.value.length === 0) {
    throw new IngestionError('ParseFailure', 'No text extracted from document');
  }

  const candidates = [...chunkText(text.value, opts.chunk)];
  const limit = pLimit(opts.writeConcurrency);
  for (let offset = 0; offset < candidates.length; offset += opts.embedBatchSize) {
    const batch = candidates.slice(offset, offset + opts.embedBatchSize);
    const vectors = await embedBatch(deps.embedder, batch);
    const records = batch.map((c, i): ChunkRecord => {
      const pages = text.pagesOf(c.start, c.end);
      return {
        documentId,
        chunkId: uuidv4(),
        ordinal: c.ordinal,
        text: c.text,
        pageStart: pages.start,
        pageEnd: pages.end,
        embedding: vectors[i],
      };
    });
    // Settle every write before failing so the rollback cannot race a late upsert.
    const writes = await Promise.allSettled(records.map((r) => limit(() => deps.vectors.upsert(r))));
    const failed = writes.find((w): w is PromiseRejectedResult => w.status === 'rejected');
    if (failed) {
      const err: unknown = failed.reason;
      throw new IngestionError('StorageFailure', `Could not store chunks: ${errorMessage(err)}`, { cause: err });
    }
  }

  for (const image of parsed.images) {
    try {
      await deps.metadata.insertImage({ documentId, ...image });
    } catch (err) {
      throw new IngestionError('StorageFailure', `Could not store image: ${errorMessage(err)}`, { cause: err });
    }
  }

  return { chunkCount: candidates.length, imageCount: parsed.images.length };
}

async function parse(parser: DocumentParser, bytes: Buffer): Promise<ParsedDocument> {
  try {
    return await parser.parse(bytes);
  } catch (err) {
    throw new IngestionError('ParseFailure', `Could not parse document: ${errorMessage(err)}`, { cause: err });
  }
}

async function embedBatch(embedder: Embedder, batch: ChunkCandidate[]): Promise<number[][]> {
  try {
    const vectors = await embedder.embedBatch(batch.map((c) => c.text));
    if (vectors.length !== batch.length) {
      throw new Error(`Embedding count mismatch; expected ${batch.length}, got ${vectors.length}`);
    }
    for (const vec of vectors) assertDimensions(vec, embedder.dimensions);
    return vectors;
  } catch (err) {
    throw new IngestionError('EmbeddingFailure', `Could not embed chunks: ${errorMessage(err)}`, { cause: err });
  }
}

async function rollback(deps: IngestDeps, documentId: string, failure: IngestionError): Promise<void> {
  try {
    await deps.vectors.deleteByDocument(documentId);
  } catch (err) {
    failure.rollbackError = err;
    logger.error({ err, documentId }, 'Rollback failed: chunks of the failed document were not removed');
  }
  try {
    await deps.metadata.deleteDocument(documentId);
  } catch (err) {
    failure.rollbackError ??= err;
    logger.error({ err, documentId }, 'Rollback failed: document record was not removed');
  }
}

// --- text normalization ---

interface BlockSpan {
  start: number;
  end: number;
  page: number | null;
}

export interface JoinedText {
  value: string;
  /** First and last page among the blocks the [start, end) span touches. */
  pagesOf(start: number, end: number): { start: number | null; end: number | null };
}

export function normalizeBlock(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** Normalizes the blocks and joins the non-empty ones with a blank line, remembering where each one landed. */
export function joinBlocks(blocks: readonly TextBlock[]): JoinedText {
  const spans: BlockSpan[] = [];
  let value = '';
  for (const block of blocks) {
    const text = normalizeBlock(block.text);
    if (text === '') continue;
    if (value !== '') value += '\n\n';
    spans.push({ start: value.length, end: value.length + text.length, page: block.page });
    value += text;
  }

  return {
    value,
    pagesOf(start, end) {
      let first: number | null = null;
      let last: number | null = null;
      for (const span of spans) {
        if (span.page === null || span.end <= start || span.start >= end) continue;
        first = first === null ? span.page : Math.min(first, span.page);
        last = last === null ? span.page : Math.max(last, span.page);
      }
      return { start: first, end: last };
    },
  };
}
