// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health and mounts /documents and /chat over the given service.

import { Router, Request, Response } from 'express';
import type { RagService } from '../services/rag.js';
import { chatRouter } from './chat.js';
import { documentsRouter } from './documents.js';

export function createRouter(service: RagService): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.use('/documents', documentsRouter(service));
  router.use('/chat', chatRouter(service));

  return router;
}
