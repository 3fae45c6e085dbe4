import { describe, it, expect } from 'vitest';
import { createRagService, ragOptionsFromConfig } from './rag.js';
import { CHAT_INSTRUCTION, DOCUMENTS_INSTRUCTION, NO_MATCH_INSTRUCTION } from './context.js';
import { NotFoundError, RetrievalError } from '../errors.js';
import { loadConfig } from '../config/env.js';
import {
  FakeEmbedder,
  FakeParser,
  InMemoryMetadataStore,
  InMemoryVectorStore,
  ScriptedModel,
  reply,
  vectorWithScore,
} from '../testing/memory.js';

const QUERY = 'which fruit is mentioned?';

function setup(...script: string[]) {
  const parser = new FakeParser();
  const embedder = new FakeEmbedder();
  const vectors = new InMemoryVectorStore();
  const metadata = new InMemoryMetadataStore();
  const model = new ScriptedModel(...script);
  embedder.vectors.set(QUERY, [1, 0]);
  const service = createRagService({ parser, embedder, vectors, metadata, model });
  return { service, parser, embedder, vectors, metadata, model };
}

async function seedDocument(metadata: InMemoryMetadataStore, id: string, filename: string): Promise<void> {
  await metadata.reserveDocument(id, filename);
  await metadata.markReady(id, { chunkCount: 0, imageCount: 0 });
}

async function seedChunk(
  vectors: InMemoryVectorStore,
  documentId: string,
  chunkId: string,
  ordinal: number,
  text: string,
  score: number,
): Promise<void> {
  await vectors.upsert({
    documentId,
    chunkId,
    ordinal,
    text,
    pageStart: 1,
    pageEnd: 1,
    embedding: vectorWithScore(score),
  });
}

const PASSAGES: [string, number][] = [
  ['alpha apples', 0.92],
  ['bravo bananas', 0.41],
  ['charlie cherries', 0.2],
  ['delta dates', 0.1],
  ['echo elderberries', 0.05],
];

async function seedManual(ctx: ReturnType<typeof setup>): Promise<void> {
  await seedDocument(ctx.metadata, 'd1', 'manual.pdf');
  for (const [i, [text, score]] of PASSAGES.entries()) {
    await seedChunk(ctx.vectors, 'd1', `c${i}`, i, text, score);
  }
}

describe('answer', () => {
  it('grounds the prompt in the chunks above the relevance floor only', async () => {
    const ctx = setup(reply('Apples.', ['c0']));
    await seedManual(ctx);

    const response = await ctx.service.answer({ query: QUERY, scope: ['d1'], history: [] });

    expect(ctx.model.calls[0]).toEqual([
      { role: 'system', content: DOCUMENTS_INSTRUCTION },
      {
        role: 'system',
        content:
          'Context:\n[chunk:c0] manual.pdf p.1\nalpha apples\n\n---\n\n' +
          '[chunk:c1] manual.pdf p.1\nbravo bananas\n\n---\n\n' +
          '[chunk:c2] manual.pdf p.1\ncharlie cherries',
      },
      { role: 'user', content: QUERY },
    ]);
    expect(response.mode).toBe('documents');
    expect(response.answer).toBe('Apples.');
    expect(response.images).toEqual([]);
    expect(response.citations).toHaveLength(1);
    expect(response.citations[0]).toMatchObject({ chunkId: 'c0', documentId: 'd1', filename: 'manual.pdf' });
    expect(response.citations[0].score).toBeCloseTo(0.77 / 0.85, 10);
  });

  it('answers conversationally without retrieval when the scope is empty', async () => {
    const ctx = setup(reply('Sure, happy to help.', ['c0'], ['i1']));
    await seedManual(ctx);
    const history = [
      { role: 'user' as const, content: 'hello' },
      { role: 'assistant' as const, content: 'hi' },
    ];

    const response = await ctx.service.answer({ query: QUERY, scope: new Set<string>(), history });

    expect(response).toEqual({ mode: 'chat', answer: 'Sure, happy to help.', citations: [], images: [] });
    expect(ctx.embedder.singles).toEqual([]);
    expect(ctx.vectors.queries).toBe(0);
    expect(ctx.model.calls[0]).toEqual([
      { role: 'system', content: CHAT_INSTRUCTION },
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'hi' },
      { role: 'user', content: QUERY },
    ]);
  });

  it('ignores documents that are still being ingested or unknown', async () => {
    const ctx = setup(reply('No documents to go on.'));
    await ctx.metadata.reserveDocument('d2', 'pending.pdf');
    await seedChunk(ctx.vectors, 'd2', 'p0', 0, 'half written', 0.99);

    const response = await ctx.service.answer({ query: QUERY, scope: ['d2', 'missing'] });

    expect(response.mode).toBe('chat');
    expect(ctx.embedder.singles).toEqual([]);
    expect(ctx.vectors.queries).toBe(0);
  });

  it('says the documents had nothing relevant when no chunk clears the floor', async () => {
    const ctx = setup(reply('The manual does not cover that.'));
    await seedManual(ctx);

    const response = await ctx.service.answer({ query: QUERY, scope: ['d1'], minScore: 0.99 });

    expect(response.mode).toBe('chat');
    expect(ctx.vectors.queries).toBe(1);
    expect(ctx.model.calls[0]).toEqual([
      { role: 'system', content: NO_MATCH_INSTRUCTION },
      { role: 'user', content: QUERY },
    ]);
  });

  it('applies per-request retrieval overrides', async () => {
    const ctx = setup(reply('a'), reply('b'));
    await seedManual(ctx);

    await ctx.service.answer({ query: QUERY, scope: ['d1'], minScore: 0.5 });
    await ctx.service.answer({ query: QUERY, scope: ['d1'], topK: 2 });

    expect(ctx.model.calls[0][1].content).toBe('Context:\n[chunk:c0] manual.pdf p.1\nalpha apples');
    expect(ctx.model.calls[1][1].content).toBe(
      'Context:\n[chunk:c0] manual.pdf p.1\nalpha apples\n\n---\n\n[chunk:c1] manual.pdf p.1\nbravo bananas',
    );
  });

  it('returns images near the cited chunks', async () => {
    const ctx = setup();
    await seedManual(ctx);
    const image = await ctx.metadata.insertImage({
      documentId: 'd1',
      page: 1,
      ordinal: 0,
      mimeType: 'image/png',
      data: Buffer.from('diagram'),
    });
    const model = new ScriptedModel(reply('See the diagram.', ['c0'], [image.id]));
    const { parser, embedder, vectors, metadata } = ctx;
    const service = createRagService({ parser, embedder, vectors, metadata, model });

    const response = await service.answer({ query: QUERY, scope: ['d1'] });

    expect(response.images).toEqual([
      {
        imageId: image.id,
        documentId: 'd1',
        page: 1,
        mimeType: 'image/png',
        data: Buffer.from('diagram').toString('base64'),
      },
    ]);
    expect(model.calls[0][1].content).toContain(`[image:${image.id}] manual.pdf p.1`);
  });

  it('reports a failing embedding model as EmbeddingUnavailable', async () => {
    const ctx = setup(reply('unused'));
    await seedManual(ctx);
    ctx.embedder.failSingle = true;

    const err = await ctx.service.answer({ query: QUERY, scope: ['d1'] }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetrievalError);
    expect(err).toMatchObject({ kind: 'EmbeddingUnavailable', status: 502 });
    expect(ctx.model.calls).toHaveLength(0);
  });

  it('reports a failing vector store as StoreUnavailable', async () => {
    const ctx = setup(reply('unused'));
    await seedManual(ctx);
    ctx.vectors.failQueries = true;

    await expect(ctx.service.answer({ query: QUERY, scope: ['d1'] })).rejects.toMatchObject({
      kind: 'StoreUnavailable',
    });
    expect(ctx.model.calls).toHaveLength(0);
  });

  it('does nothing once the request is cancelled', async () => {
    const ctx = setup(reply('unused'));
    await seedManual(ctx);
    const controller = new AbortController();
    controller.abort(new Error('client went away'));

    await expect(ctx.service.answer({ query: QUERY, scope: ['d1'], signal: controller.signal })).rejects.toThrow(
      'client went away',
    );
    expect(ctx.embedder.singles).toEqual([]);
    expect(ctx.model.calls).toHaveLength(0);
  });

  it('rejects an empty query', async () => {
    const ctx = setup();

    await expect(ctx.service.answer({ query: '   ', scope: [] })).rejects.toMatchObject({ status: 400 });
  });
});

describe('documents', () => {
  it('deletes a document together with its chunks and images', async () => {
    const ctx = setup();
    const bytes = ctx.parser.register(Buffer.from('pdf-one'), {
      textBlocks: [{ page: 1, text: 'Only paragraph.' }],
      images: [{ page: 1, ordinal: 0, mimeType: 'image/png', data: Buffer.from('x') }],
    });
    const keep = ctx.parser.register(Buffer.from('pdf-two'), {
      textBlocks: [{ page: 1, text: 'Another paragraph.' }],
      images: [],
    });
    const { documentId } = await ctx.service.ingest(bytes, 'one.pdf');
    const other = await ctx.service.ingest(keep, 'two.pdf');

    await ctx.service.deleteDocument(documentId);

    expect(ctx.vectors.chunksOf(documentId)).toEqual([]);
    expect(ctx.metadata.imagesOf(documentId)).toEqual([]);
    expect((await ctx.service.listDocuments()).map((d) => d.id)).toEqual([other.documentId]);
    expect(ctx.vectors.chunksOf(other.documentId)).toHaveLength(1);
  });

  it('fails with NotFoundError for unknown documents', async () => {
    const ctx = setup();

    await expect(ctx.service.deleteDocument('nope')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('deletes everything and reports how many documents were removed', async () => {
    const ctx = setup();
    await seedManual(ctx);
    await seedDocument(ctx.metadata, 'd2', 'other.pdf');

    await expect(ctx.service.deleteAllDocuments()).resolves.toBe(2);
    expect(ctx.vectors.records.size).toBe(0);
    expect(await ctx.service.listDocuments()).toEqual([]);
  });

  it('lists ready documents newest first', async () => {
    const ctx = setup();
    await seedDocument(ctx.metadata, 'd1', 'first.pdf');
    await ctx.metadata.reserveDocument('d2', 'pending.pdf');
    await seedDocument(ctx.metadata, 'd3', 'third.pdf');

    expect((await ctx.service.listDocuments()).map((d) => d.filename)).toEqual(['third.pdf', 'first.pdf']);
  });

  it('ingests batches with per-file outcomes', async () => {
    const ctx = setup();
    const bytes = ctx.parser.register(Buffer.from('pdf-one'), {
      textBlocks: [{ page: 1, text: 'Only paragraph.' }],
      images: [],
    });

    const outcomes = await ctx.service.ingestMany([
      { bytes, filename: 'one.pdf' },
      { bytes, filename: 'one.pdf' },
    ]);

    expect(outcomes.map((o) => (o.ok ? 'ok' : o.error.kind))).toEqual(['ok', 'DuplicateFilename']);
  });
});

describe('ragOptionsFromConfig', () => {
  it('maps configuration onto the pipeline options', () => {
    const config = loadConfig({
      DATABASE_URL: 'postgres://localhost/test',
      OPENAI_API_KEY: 'test-secret',
      CHUNK_MAX_SIZE: '800',
      CHUNK_OVERLAP: '100',
      RETRIEVAL_MIN_SCORE: '0.3',
    });

    expect(ragOptionsFromConfig(config)).toEqual({
      ingest: { chunk: { maxSize: 800, overlap: 100 }, embedBatchSize: 32, writeConcurrency: 8, ingestConcurrency: 2 },
      retrieval: { topK: 8, minScore: 0.3, dedupThreshold: 0.9 },
      context: { historyTurns: 6, maxContextChars: 12_000, maxImages: 4, pageWindow: 0 },
    });
  });
});
