// src/services/rag.ts
// What: The service surface the HTTP routes call: ingest, list, delete and answer.
// How: Binds the collaborators once and threads per-request overrides into the pipeline. `answer` narrows the
//      requested scope to ready documents, embeds and retrieves only when something is left in scope, loads the
//      images and filenames of the retrieved documents, assembles the prompt and runs generation.

import { NotFoundError, RetrievalError, ValidationError, errorMessage } from '../errors.js';
import type { AppConfig } from '../config/env.js';
import logger from '../logging.js';
import type {
  ConversationTurn,
  DocumentRecord,
  GenerativeModel,
  ImageRecord,
  QueryScope,
  RetrievedItem,
} from '../models/types.js';
import { assembleContext, type ContextOptions, type PromptMode } from './context.js';
import { generateAnswer, type GeneratedAnswer } from './generation.js';
import {
  ingestDocument,
  ingestMany,
  type IngestDeps,
  type IngestFile,
  type IngestManyOptions,
  type IngestOutcome,
  type IngestResult,
} from './ingestion.js';
import { retrieve, type RetrieveOptions } from './retrieval.js';

export interface RagDeps extends IngestDeps {
  model: GenerativeModel;
}

export interface RagOptions {
  ingest: Partial<IngestManyOptions>;
  retrieval: Partial<RetrieveOptions>;
  context: Partial<ContextOptions>;
  maxRepairAttempts?: number;
}

export interface AnswerRequest {
  query: string;
  scope: QueryScope;
  history?: readonly ConversationTurn[];
  signal?: AbortSignal;
  topK?: number;
  minScore?: number;
}

export interface AnswerResponse extends GeneratedAnswer {
  mode: PromptMode;
}

export interface RagService {
  ingest(bytes: Buffer, filename: string): Promise<IngestResult>;
  ingestMany(files: readonly IngestFile[]): Promise<IngestOutcome[]>;
  listDocuments(): Promise<DocumentRecord[]>;
  deleteDocument(id: string): Promise<void>;
  deleteAllDocuments(): Promise<number>;
  answer(request: AnswerRequest): Promise<AnswerResponse>;
}

export function ragOptionsFromConfig(config: AppConfig): RagOptions {
  return {
    ingest: {
      chunk: { maxSize: config.CHUNK_MAX_SIZE, overlap: config.CHUNK_OVERLAP },
      embedBatchSize: config.EMBED_BATCH_SIZE,
      writeConcurrency: config.WRITE_CONCURRENCY,
      ingestConcurrency: config.INGEST_CONCURRENCY,
    },
    retrieval: {
      topK: config.RETRIEVAL_TOP_K,
      minScore: config.RETRIEVAL_MIN_SCORE,
      dedupThreshold: config.DEDUP_THRESHOLD,
    },
    context: {
      historyTurns: config.HISTORY_TURNS,
      maxContextChars: config.MAX_CONTEXT_CHARS,
      maxImages: config.MAX_IMAGES,
      pageWindow: config.IMAGE_PAGE_WINDOW,
    },
  };
}

export function createRagService(deps: RagDeps, options: Partial<RagOptions> = {}): RagService {
  const ingestOptions = options.ingest ?? {};
  const retrievalOptions = options.retrieval ?? {};
  const contextOptions = options.context ?? {};

  async function answer(request: AnswerRequest): Promise<AnswerResponse> {
    const { query, signal } = request;
    if (query.trim() === '') {
      throw new ValidationError('query must not be empty');
    }
    signal?.throwIfAborted();

    const scope = await readyScope(request.scope);
    let retrieved: RetrievedItem[] = [];
    if (scope.length > 0) {
      const queryEmbedding = await embedQuery(query);
      const overrides: Partial<RetrieveOptions> = { ...retrievalOptions };
      if (request.topK !== undefined) overrides.topK = request.topK;
      if (request.minScore !== undefined) overrides.minScore = request.minScore;
      retrieved = await retrieve(deps.vectors, queryEmbedding, scope, overrides);
    }
    signal?.throwIfAborted();

    const { images, filenames } = await loadAttachments(retrieved);
    const payload = assembleContext(
      { query, retrieved, history: request.history ?? [], images, filenames, searched: scope.length > 0 },
      contextOptions,
    );
    logger.debug(
      { mode: payload.mode, requested: [...request.scope].length, scope: scope.length, sources: payload.sources.length },
      'Prompt assembled',
    );

    const result = await generateAnswer(deps.model, payload, {
      signal,
      maxRepairAttempts: options.maxRepairAttempts,
    });
    return { mode: payload.mode, ...result };
  }

  async function readyScope(scope: QueryScope): Promise<string[]> {
    const requested = [...new Set(scope)];
    if (requested.length === 0) return [];
    try {
      return await deps.metadata.readyDocumentIds(requested);
    } catch (err) {
      throw new RetrievalError('StoreUnavailable', `Could not resolve document scope: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async function embedQuery(query: string): Promise<number[]> {
    try {
      return await deps.embedder.embed(query);
    } catch (err) {
      throw new RetrievalError('EmbeddingUnavailable', `Could not embed the query: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async function loadAttachments(
    retrieved: readonly RetrievedItem[],
  ): Promise<{ images: ImageRecord[]; filenames: Map<string, string> }> {
    const documentIds = [...new Set(retrieved.map((r) => r.documentId))];
    if (documentIds.length === 0) return { images: [], filenames: new Map() };
    try {
      const [images, documents] = await Promise.all([
        deps.metadata.listImages(documentIds),
        Promise.all(documentIds.map((id) => deps.metadata.getDocument(id))),
      ]);
      const filenames = new Map<string, string>();
      for (const doc of documents) {
        if (doc) filenames.set(doc.id, doc.filename);
      }
      return { images, filenames };
    } catch (err) {
      throw new RetrievalError('StoreUnavailable', `Could not load document details: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  return {
    ingest: (bytes, filename) => ingestDocument(deps, bytes, filename, ingestOptions),
    ingestMany: (files) => ingestMany(deps, files, ingestOptions),
    listDocuments: () => deps.metadata.listDocuments(),

    async deleteDocument(id) {
      const doc = await deps.metadata.getDocument(id);
      if (!doc) throw new NotFoundError(`Document ${id} not found`);
      await deps.vectors.deleteByDocument(id);
      await deps.metadata.deleteDocument(id);
      logger.info({ documentId: id, filename: doc.filename }, 'Document deleted');
    },

    async deleteAllDocuments() {
      await deps.vectors.deleteAll();
      const count = await deps.metadata.deleteAllDocuments();
      logger.info({ count }, 'All documents deleted');
      return count;
    },

    answer,
  };
}
