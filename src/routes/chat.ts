// src/routes/chat.ts
// What: /chat route: answers a question over the selected documents.
// How: Validates the body with zod, then calls the service with an AbortSignal that fires when the client
//      disconnects before the response is written. An empty documentIds list is a plain conversation.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import logger from '../logging.js';
import type { RagService } from '../services/rag.js';

const TurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

const schema = z.object({
  query: z.string().trim().min(1),
  documentIds: z.array(z.string().uuid()).max(100).optional().default([]),
  history: z.array(TurnSchema).max(100).optional().default([]),
  topK: z.number().int().positive().max(50).optional(),
  minScore: z.number().min(0).lt(1).optional(),
});

export function chatRouter(service: RagService): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) controller.abort(new Error('Client closed the connection'));
    };
    res.on('close', onClose);

    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'ValidationError' } });
        return;
      }
      const { query, documentIds, history, topK, minScore } = parsed.data;

      const result = await service.answer({
        query,
        scope: documentIds,
        history,
        topK,
        minScore,
        signal: controller.signal,
      });
      res.json(result);
    } catch (err) {
      if (controller.signal.aborted) {
        logger.info({ reason: String(controller.signal.reason) }, 'Chat request cancelled');
        return;
      }
      next(err);
    } finally {
      res.off('close', onClose);
    }
  });

  return router;
}
