// src/routes/documents.ts
// What: /documents routes: upload PDFs, list ready documents, delete one or all.
// How: Uses multer memory storage for multipart uploads (field `files`, PDF only, 25MB each, up to 10 per
//      request) and hands the buffers to the service's batch ingestion. Responds 200 when every file was
//      ingested and 207 with per-file outcomes otherwise.

import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { AppError, NotFoundError } from '../errors.js';
import logger from '../logging.js';
import type { RagService } from '../services/rag.js';

export const MAX_FILE_SIZE = 25 * 1024 * 1024;
export const MAX_FILES = 10;

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: MAX_FILE_SIZE,
    files: MAX_FILES,
  },
  fileFilter: (_req, file, cb) => {
    const isPdf = file.mimetype === 'application/pdf' || file.originalname.toLowerCase().endsWith('.pdf');
    if (isPdf) {
      cb(null, true);
    } else {
      cb(new AppError(`Only PDF files are allowed (got "${file.originalname}")`, 415, 'UnsupportedMediaType'));
    }
  },
});

const IdSchema = z.string().uuid();

export function documentsRouter(service: RagService): Router {
  const router = Router();

  router.post('/', upload.array('files', MAX_FILES), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      if (files.length === 0) {
        res.status(400).json({ error: { message: 'No files provided', code: 'ValidationError' } });
        return;
      }

      logger.info(
        { files: files.map((f) => ({ filename: f.originalname, size: f.size })) },
        'Upload request received',
      );
      const items = await service.ingestMany(files.map((f) => ({ bytes: f.buffer, filename: f.originalname })));
      const allOk = items.every((item) => item.ok);
      res.status(allOk ? 200 : 207).json({ items });
    } catch (err) {
      next(err);
    }
  });

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const items = await service.listDocuments();
      res.json({ items, total: items.length });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = IdSchema.safeParse(req.params.id);
      if (!id.success) {
        throw new NotFoundError(`Document ${req.params.id} not found`);
      }
      await service.deleteDocument(id.data);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  router.delete('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const deleted = await service.deleteAllDocuments();
      res.json({ deleted });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
