// src/testing/memory.ts
// What: In-process stand-ins for the collaborators, used by the test suites.
// How: Map-backed vector and metadata stores (cosine similarity computed in JS), a parser that returns canned
//      documents, an embedder backed by a lookup table and a scripted chat model. Each exposes call counters or
//      failure switches the tests flip.

import { v4 as uuidv4 } from 'uuid';
import type {
  ChatMessage,
  ChunkRecord,
  CompletionOptions,
  DocumentParser,
  DocumentRecord,
  Embedder,
  GenerativeModel,
  ImageRecord,
  MetadataStore,
  NewImage,
  ParsedDocument,
  VectorFilter,
  VectorMatch,
  VectorStore,
} from '../models/types.js';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}

/** Unit vector in 2-D whose cosine with [1, 0] is `score` (up to float rounding). */
export function vectorWithScore(score: number): number[] {
  return [score, Math.sqrt(1 - score * score)];
}

export class InMemoryVectorStore implements VectorStore {
  readonly records = new Map<string, ChunkRecord>();
  queries = 0;
  failQueries = false;
  /** Fails the upsert with this 1-based call number. */
  failOnUpsert: number | null = null;
  private upserts = 0;

  async upsert(record: ChunkRecord): Promise<void> {
    this.upserts += 1;
    if (this.failOnUpsert === this.upserts) {
      throw new Error('vector store write failed');
    }
    this.records.set(record.chunkId, record);
  }

  async deleteByDocument(documentId: string): Promise<void> {
    for (const [id, record] of this.records) {
      if (record.documentId === documentId) this.records.delete(id);
    }
  }

  async deleteAll(): Promise<void> {
    this.records.clear();
  }

  async query(vector: number[], filter: VectorFilter, topK: number): Promise<VectorMatch[]> {
    this.queries += 1;
    if (this.failQueries) {
      throw new Error('connection refused');
    }
    const allowed = new Set(filter.documentIds);
    const matches: VectorMatch[] = [];
    for (const record of this.records.values()) {
      if (!allowed.has(record.documentId)) continue;
      const { embedding, ...metadata } = record;
      matches.push({ chunkId: record.chunkId, score: cosineSimilarity(vector, embedding), metadata });
    }
    matches.sort((a, b) => b.score - a.score);
    return matches.slice(0, topK);
  }

  chunksOf(documentId: string): ChunkRecord[] {
    return [...this.records.values()].filter((r) => r.documentId === documentId);
  }
}

export class InMemoryMetadataStore implements MetadataStore {
  readonly documents = new Map<string, DocumentRecord>();
  readonly images = new Map<string, ImageRecord>();
  failImageInsert = false;
  private clock = 0;

  async reserveDocument(id: string, filename: string): Promise<boolean> {
    for (const doc of this.documents.values()) {
      if (doc.filename === filename) return false;
    }
    // Strictly increasing timestamps keep "newest first" ordering deterministic.
    const createdAt = new Date(Date.UTC(2024, 0, 1) + this.clock++ * 1000).toISOString();
    this.documents.set(id, { id, filename, status: 'pending', chunkCount: 0, imageCount: 0, createdAt });
    return true;
  }

  async markReady(id: string, counts: { chunkCount: number; imageCount: number }): Promise<void> {
    const doc = this.documents.get(id);
    if (doc) this.documents.set(id, { ...doc, status: 'ready', ...counts });
  }

  async getDocument(id: string): Promise<DocumentRecord | null> {
    return this.documents.get(id) ?? null;
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    return [...this.documents.values()]
      .filter((d) => d.status === 'ready')
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async readyDocumentIds(ids: readonly string[]): Promise<string[]> {
    return ids.filter((id) => this.documents.get(id)?.status === 'ready');
  }

  async deleteDocument(id: string): Promise<boolean> {
    const existed = this.documents.delete(id);
    for (const [imageId, image] of this.images) {
      if (image.documentId === id) this.images.delete(imageId);
    }
    return existed;
  }

  async deleteAllDocuments(): Promise<number> {
    const count = this.documents.size;
    this.documents.clear();
    this.images.clear();
    return count;
  }

  async insertImage(image: NewImage): Promise<ImageRecord> {
    if (this.failImageInsert) {
      throw new Error('image insert failed');
    }
    const record: ImageRecord = { id: uuidv4(), ...image };
    this.images.set(record.id, record);
    return record;
  }

  async listImages(documentIds: readonly string[]): Promise<ImageRecord[]> {
    const wanted = new Set(documentIds);
    return [...this.images.values()].filter((img) => wanted.has(img.documentId));
  }

  imagesOf(documentId: string): ImageRecord[] {
    return [...this.images.values()].filter((img) => img.documentId === documentId);
  }
}

/** Returns the document registered for the exact bytes; anything else fails to parse. */
export class FakeParser implements DocumentParser {
  private readonly documents = new Map<string, ParsedDocument>();

  register(bytes: Buffer, doc: ParsedDocument): Buffer {
    this.documents.set(bytes.toString('base64'), doc);
    return bytes;
  }

  async parse(bytes: Buffer): Promise<ParsedDocument> {
    const doc = this.documents.get(bytes.toString('base64'));
    if (!doc) throw new Error('corrupt document');
    return doc;
  }
}

/**
 * Looks vectors up by exact text; unknown texts map to `fallback`. `failOnBatch` makes the n-th (1-based)
 * embedBatch call reject.
 */
export class FakeEmbedder implements Embedder {
  readonly dimensions: number;
  readonly vectors = new Map<string, number[]>();
  batches: string[][] = [];
  singles: string[] = [];
  failOnBatch: number | null = null;
  failSingle = false;

  constructor(private readonly fallback: number[] = [0, 1]) {
    this.dimensions = fallback.length;
  }

  async embed(text: string): Promise<number[]> {
    this.singles.push(text);
    if (this.failSingle) throw new Error('embedding quota exceeded');
    return this.lookup(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batches.push(texts);
    if (this.failOnBatch === this.batches.length) throw new Error('embedding quota exceeded');
    return texts.map((t) => this.lookup(t));
  }

  private lookup(text: string): number[] {
    return this.vectors.get(text) ?? this.fallback;
  }
}

type ScriptStep = string | Error;

/** Replays scripted replies in order and records every request. */
export class ScriptedModel implements GenerativeModel {
  readonly calls: ChatMessage[][] = [];
  readonly signals: (AbortSignal | undefined)[] = [];
  private readonly script: ScriptStep[];
  onCall?: () => void;

  constructor(...script: ScriptStep[]) {
    this.script = script;
  }

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
    this.calls.push(messages);
    this.signals.push(options?.signal);
    this.onCall?.();
    const step = this.script.shift();
    if (step === undefined) throw new Error('no scripted reply left');
    if (step instanceof Error) throw step;
    return step;
  }
}

export function reply(answer: string, citations: string[] = [], images: string[] = []): string {
  return JSON.stringify({ answer, citations, images });
}
