// src/models/types.ts
// What: Shared TypeScript types for stored entities, pipeline values and the collaborator contracts.
// How: Entities mirror DB rows (camelCased); collaborator interfaces are implemented by the pg/openai/mupdf
//      adapters and by the in-memory stand-ins used in tests.

export type DocumentStatus = 'pending' | 'ready';

export interface DocumentRecord {
  id: string;
  filename: string;
  status: DocumentStatus;
  chunkCount: number;
  imageCount: number;
  createdAt: string; // ISO timestamp
}

export interface ChunkMetadata {
  documentId: string;
  chunkId: string;
  ordinal: number;
  text: string;
  pageStart: number | null;
  pageEnd: number | null;
}

export interface ChunkRecord extends ChunkMetadata {
  embedding: number[];
}

export interface ImageRecord {
  id: string;
  documentId: string;
  page: number | null;
  ordinal: number;
  mimeType: string;
  data: Buffer;
}

export interface RetrievedItem {
  chunkId: string;
  documentId: string;
  ordinal: number;
  text: string;
  pageStart: number | null;
  pageEnd: number | null;
  rawScore: number;
  score: number; // normalized, [0,1]
}

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

export type QueryScope = ReadonlySet<string> | readonly string[];

// --- collaborators ---

export interface TextBlock {
  page: number | null;
  text: string;
}

export interface ParsedImage {
  page: number | null;
  ordinal: number;
  mimeType: string;
  data: Buffer;
}

export interface ParsedDocument {
  textBlocks: TextBlock[];
  images: ParsedImage[];
}

export interface DocumentParser {
  parse(bytes: Buffer): Promise<ParsedDocument>;
}

export interface Embedder {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface VectorFilter {
  documentIds: readonly string[];
}

export interface VectorMatch {
  chunkId: string;
  score: number; // raw similarity, 1 - cosine distance
  metadata: ChunkMetadata;
}

export interface VectorStore {
  upsert(record: ChunkRecord): Promise<void>;
  deleteByDocument(documentId: string): Promise<void>;
  deleteAll(): Promise<void>;
  query(vector: number[], filter: VectorFilter, topK: number): Promise<VectorMatch[]>;
}

export interface NewImage {
  documentId: string;
  page: number | null;
  ordinal: number;
  mimeType: string;
  data: Buffer;
}

export interface MetadataStore {
  /** Inserts a pending document row. Resolves false when the filename is taken. */
  reserveDocument(id: string, filename: string): Promise<boolean>;
  markReady(id: string, counts: { chunkCount: number; imageCount: number }): Promise<void>;
  getDocument(id: string): Promise<DocumentRecord | null>;
  listDocuments(): Promise<DocumentRecord[]>;
  /** Subset of `ids` that refer to ready documents, in input order. */
  readyDocumentIds(ids: readonly string[]): Promise<string[]>;
  deleteDocument(id: string): Promise<boolean>;
  deleteAllDocuments(): Promise<number>;
  insertImage(image: NewImage): Promise<ImageRecord>;
  listImages(documentIds: readonly string[]): Promise<ImageRecord[]>;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

export interface GenerativeModel {
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}
