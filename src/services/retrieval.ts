// src/services/retrieval.ts
// What: Scoped retrieval with a relevance floor, near-duplicate collapsing and score normalization.
// How: An empty scope short-circuits without touching the store. Otherwise the document restriction is passed into
//      the vector-store query, results below minScore are dropped, near-identical texts (word-set Jaccard) collapse
//      onto the best-scored copy, and the survivors are rescaled linearly so minScore maps to 0 and a perfect match
//      to 1. Final order: normalized score desc, then ordinal, document id and chunk id ascending.

import { RetrievalError, errorMessage } from '../errors.js';
import logger from '../logging.js';
import type { QueryScope, RetrievedItem, VectorMatch, VectorStore } from '../models/types.js';

export interface RetrieveOptions {
  topK: number;
  minScore: number;
  dedupThreshold: number;
}

export const DEFAULT_RETRIEVE_OPTIONS: RetrieveOptions = {
  topK: 8,
  minScore: 0.15,
  dedupThreshold: 0.9,
};

export async function retrieve(
  store: VectorStore,
  queryEmbedding: number[],
  scope: QueryScope,
  options: Partial<RetrieveOptions> = {},
): Promise<RetrievedItem[]> {
  const opts = resolveOptions(options);
  const documentIds = [...new Set(scope)];
  if (documentIds.length === 0) return [];

  let matches: VectorMatch[];
  try {
    matches = await store.query(queryEmbedding, { documentIds }, opts.topK);
  } catch (err) {
    throw new RetrievalError('StoreUnavailable', `Vector store query failed: ${errorMessage(err)}`, { cause: err });
  }

  const inScope = new Set(documentIds);
  const candidates = matches
    .filter((m) => inScope.has(m.metadata.documentId))
    .filter((m) => Number.isFinite(m.score) && m.score >= opts.minScore)
    .sort(compareMatches);

  const kept = dropNearDuplicates(candidates, opts.dedupThreshold);
  const items = kept.map((m) => toRetrievedItem(m, opts.minScore)).sort(compareItems);

  logger.debug(
    { scope: documentIds.length, returned: matches.length, aboveFloor: candidates.length, kept: items.length },
    'Retrieval finished',
  );
  return items;
}

/**
 * Linear rescale of a raw similarity onto [0, 1]: `minScore` maps to 0 and 1.0 maps to 1. Monotonic, so relative
 * order (and ties) of raw scores is preserved.
 */
export function normalizeScore(raw: number, minScore: number): number {
  const scaled = (raw - minScore) / (1 - minScore);
  return Math.min(1, Math.max(0, scaled));
}

/** Jaccard similarity of the two texts' lowercase word sets. */
export function textSimilarity(a: string, b: string): number {
  return jaccard(wordSet(a), wordSet(b));
}

function resolveOptions(options: Partial<RetrieveOptions>): RetrieveOptions {
  const opts = { ...DEFAULT_RETRIEVE_OPTIONS, ...options };
  if (!Number.isInteger(opts.topK) || opts.topK < 1) {
    throw new RangeError(`topK must be a positive integer, got ${opts.topK}`);
  }
  if (!(opts.minScore >= 0 && opts.minScore < 1)) {
    throw new RangeError(`minScore must be in [0, 1), got ${opts.minScore}`);
  }
  if (!(opts.dedupThreshold > 0 && opts.dedupThreshold <= 1)) {
    throw new RangeError(`dedupThreshold must be in (0, 1], got ${opts.dedupThreshold}`);
  }
  return opts;
}

function dropNearDuplicates(sorted: VectorMatch[], threshold: number): VectorMatch[] {
  const kept: { match: VectorMatch; words: Set<string> }[] = [];
  for (const match of sorted) {
    const words = wordSet(match.metadata.text);
    const duplicate = kept.some((k) => jaccard(k.words, words) >= threshold);
    if (!duplicate) kept.push({ match, words });
  }
  return kept.map((k) => k.match);
}

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []);
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let shared = 0;
  for (const w of a) if (b.has(w)) shared++;
  return shared / (a.size + b.size - shared);
}

function toRetrievedItem(match: VectorMatch, minScore: number): RetrievedItem {
  const { metadata } = match;
  return {
    chunkId: match.chunkId,
    documentId: metadata.documentId,
    ordinal: metadata.ordinal,
    text: metadata.text,
    pageStart: metadata.pageStart,
    pageEnd: metadata.pageEnd,
    rawScore: match.score,
    score: normalizeScore(match.score, minScore),
  };
}

function compareIds(a: { ordinal: number; documentId: string; chunkId: string }, b: typeof a): number {
  return a.ordinal - b.ordinal || a.documentId.localeCompare(b.documentId) || a.chunkId.localeCompare(b.chunkId);
}

function compareMatches(a: VectorMatch, b: VectorMatch): number {
  return b.score - a.score || compareIds({ ...a.metadata, chunkId: a.chunkId }, { ...b.metadata, chunkId: b.chunkId });
}

function compareItems(a: RetrievedItem, b: RetrievedItem): number {
  return b.score - a.score || compareIds(a, b);
}
