// src/server.ts
// What: HTTP server entrypoint.
// How: Loads and validates the environment, builds the pg pool, OpenAI client and adapters once, wires them into
//      the RAG service and the Express app, and listens on the configured port. SIGINT/SIGTERM close the server
//      and the pool.

import OpenAI from 'openai';
import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import { createPool } from './db/pool.js';
import { PgMetadataStore } from './db/metadataStore.js';
import { PgVectorStore } from './db/vectorStore.js';
import logger from './logging.js';
import { OpenAIChatModel } from './services/chatModel.js';
import { OpenAIEmbedder } from './services/embeddings.js';
import { MupdfDocumentParser } from './services/parser.js';
import { createRagService, ragOptionsFromConfig } from './services/rag.js';

const config = loadConfig();
const pool = createPool(config.DATABASE_URL);
const openai = new OpenAI({ apiKey: config.OPENAI_API_KEY });

const service = createRagService(
  {
    parser: new MupdfDocumentParser(),
    embedder: new OpenAIEmbedder(openai, { model: config.OPENAI_EMBED_MODEL, dimensions: config.EMBED_DIMENSIONS }),
    vectors: new PgVectorStore(pool),
    metadata: new PgMetadataStore(pool),
    model: new OpenAIChatModel(openai, { model: config.OPENAI_CHAT_MODEL }),
  },
  ragOptionsFromConfig(config),
);

const app = createApp(service);
const server = app.listen(config.PORT, () => {
  logger.info({ port: config.PORT, env: config.NODE_ENV }, 'Server listening');
});

const shutdown = (signal: string): void => {
  logger.info({ signal }, 'Shutting down');
  server.close((err) => {
    if (err) logger.error({ err }, 'HTTP server did not close cleanly');
    pool
      .end()
      .catch((poolErr: unknown) => logger.error({ err: poolErr }, 'Failed to close Postgres pool'))
      .finally(() => process.exit(err ? 1 : 0));
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
