// src/db/metadataStore.ts
// What: Postgres store for document and image records.
// How: Reserves documents with INSERT ... ON CONFLICT (filename) DO NOTHING so the unique constraint settles
//      concurrent uploads of the same file; images reference documents with ON DELETE CASCADE.

import { v4 as uuidv4 } from 'uuid';
import type { Pool } from './pool.js';
import type { DocumentRecord, DocumentStatus, ImageRecord, MetadataStore, NewImage } from '../models/types.js';

interface DocumentRow {
  id: string;
  filename: string;
  status: DocumentStatus;
  chunk_count: number;
  image_count: number;
  created_at: Date;
}

interface ImageRow {
  id: string;
  document_id: string;
  page: number | null;
  ordinal: number;
  mime_type: string;
  data: Buffer;
}

const DOCUMENT_COLUMNS = 'id, filename, status, chunk_count, image_count, created_at';

function toDocument(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    filename: row.filename,
    status: row.status,
    chunkCount: Number(row.chunk_count),
    imageCount: Number(row.image_count),
    createdAt: new Date(row.created_at).toISOString(),
  };
}

function toImage(row: ImageRow): ImageRecord {
  return {
    id: row.id,
    documentId: row.document_id,
    page: row.page,
    ordinal: Number(row.ordinal),
    mimeType: row.mime_type,
    data: row.data,
  };
}

export class PgMetadataStore implements MetadataStore {
  constructor(private readonly pool: Pool) {}

  async reserveDocument(id: string, filename: string): Promise<boolean> {
    const r = await this.pool.query(
      `INSERT INTO documents (id, filename, status) VALUES ($1, $2, 'pending') ON CONFLICT (filename) DO NOTHING`,
      [id, filename],
    );
    return (r.rowCount ?? 0) > 0;
  }

  async markReady(id: string, counts: { chunkCount: number; imageCount: number }): Promise<void> {
    await this.pool.query(
      `UPDATE documents SET status = 'ready', chunk_count = $2, image_count = $3 WHERE id = $1`,
      [id, counts.chunkCount, counts.imageCount],
    );
  }

  async getDocument(id: string): Promise<DocumentRecord | null> {
    const r = await this.pool.query<DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1 LIMIT 1`, [
      id,
    ]);
    return r.rows[0] ? toDocument(r.rows[0]) : null;
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    const r = await this.pool.query<DocumentRow>(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE status = 'ready' ORDER BY created_at DESC, filename`,
    );
    return r.rows.map(toDocument);
  }

  async readyDocumentIds(ids: readonly string[]): Promise<string[]> {
    if (ids.length === 0) return [];
    const r = await this.pool.query<{ id: string }>(
      `SELECT id FROM documents WHERE status = 'ready' AND id = ANY($1::uuid[])`,
      [ids],
    );
    const ready = new Set(r.rows.map((row) => row.id));
    return ids.filter((id) => ready.has(id));
  }

  async deleteDocument(id: string): Promise<boolean> {
    const r = await this.pool.query('DELETE FROM documents WHERE id = $1', [id]);
    return (r.rowCount ?? 0) > 0;
  }

  async deleteAllDocuments(): Promise<number> {
    const r = await this.pool.query('DELETE FROM documents');
    return r.rowCount ?? 0;
  }

  async insertImage(image: NewImage): Promise<ImageRecord> {
    const r = await this.pool.query<ImageRow>(
      `INSERT INTO images (id, document_id, page, ordinal, mime_type, data)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING id, document_id, page, ordinal, mime_type, data`,
      [uuidv4(), image.documentId, image.page, image.ordinal, image.mimeType, image.data],
    );
    return toImage(r.rows[0]);
  }

  async listImages(documentIds: readonly string[]): Promise<ImageRecord[]> {
    if (documentIds.length === 0) return [];
    const r = await this.pool.query<ImageRow>(
      `SELECT id, document_id, page, ordinal, mime_type, data
       FROM images
       WHERE document_id = ANY($1::uuid[])
       ORDER BY document_id, page NULLS LAST, ordinal`,
      [documentIds],
    );
    return r.rows.map(toImage);
  }
}
