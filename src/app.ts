// src/app.ts
// What: Express application factory.
// How: JSON body limit, root router over the given service, and a centralized error handler returning
//      { error: { message, code } }. Typed errors carry their own status; multer and body-parser errors are mapped
//      to 4xx; anything else is a 500 with a generic message.

import express, { ErrorRequestHandler, Express } from 'express';
import multer from 'multer';
import { AppError } from './errors.js';
import logger from './logging.js';
import { createRouter } from './routes/index.js';
import type { RagService } from './services/rag.js';

interface ErrorBody {
  status: number;
  code: string;
  message: string;
}

export function createApp(service: RagService): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createRouter(service));

  app.use((_req, res) => {
    res.status(404).json({ error: { message: 'Not Found', code: 'NotFound' } });
  });

  app.use(errorHandler);
  return app;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const { status, code, message } = describeError(err);
  if (status >= 500) {
    logger.error({ err, status, code }, 'Request failed');
  } else {
    logger.warn({ status, code, message }, 'Request rejected');
  }
  res.status(status).json({ error: { message, code } });
};

function describeError(err: unknown): ErrorBody {
  if (err instanceof AppError) {
    return { status: err.status, code: err.code, message: err.message };
  }
  if (err instanceof multer.MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    return { status, code: err.code, message: err.message };
  }
  // body-parser raises http-errors with a 4xx status for malformed or oversized bodies.
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return { status: err.status, code: 'BadRequest', message: err.message };
  }
  return { status: 500, code: 'InternalError', message: 'Internal Server Error' };
}
