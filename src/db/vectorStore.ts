// src/db/vectorStore.ts
// What: pgvector-backed chunk store.
// How: Chunks live in the `chunks` table with a vector(N) column. A query first materializes the in-scope rows
//      (through the document_id index) and only then ranks them exactly by cosine distance, so a small document is
//      never crowded out by other documents' rows. Raw score is cosine similarity (1 - cosine distance).

import type { Queryable } from './pool.js';
import { similarityFromDistance, vectorToParam } from '../util/sql.js';
import type { ChunkRecord, VectorFilter, VectorMatch, VectorStore } from '../models/types.js';

interface ChunkMatchRow {
  id: string;
  document_id: string;
  ordinal: number;
  content: string;
  page_start: number | null;
  page_end: number | null;
  distance: number;
}

export class PgVectorStore implements VectorStore {
  constructor(private readonly pool: Queryable) {}

  async upsert(record: ChunkRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO chunks (id, document_id, ordinal, content, page_start, page_end, embedding)
       VALUES ($1, $2, $3, $4, $5, $6, $7::vector)
       ON CONFLICT (id) DO UPDATE
         SET content = EXCLUDED.content,
             ordinal = EXCLUDED.ordinal,
             page_start = EXCLUDED.page_start,
             page_end = EXCLUDED.page_end,
             embedding = EXCLUDED.embedding`,
      [
        record.chunkId,
        record.documentId,
        record.ordinal,
        record.text,
        record.pageStart,
        record.pageEnd,
        vectorToParam(record.embedding),
      ],
    );
  }

  async deleteByDocument(documentId: string): Promise<void> {
    // Single statement: either every chunk of the document goes or none does.
    await this.pool.query('DELETE FROM chunks WHERE document_id = $1', [documentId]);
  }

  async deleteAll(): Promise<void> {
    await this.pool.query('DELETE FROM chunks');
  }

  async query(vector: number[], filter: VectorFilter, topK: number): Promise<VectorMatch[]> {
    if (filter.documentIds.length === 0) return [];
    const { rows } = await this.pool.query<ChunkMatchRow>(
      `WITH scoped AS MATERIALIZED (
         SELECT id, document_id, ordinal, content, page_start, page_end, embedding
         FROM chunks
         WHERE document_id = ANY($2::uuid[])
       )
       SELECT id, document_id, ordinal, content, page_start, page_end,
              (embedding <=> $1::vector) AS distance
       FROM scoped
       ORDER BY distance
       LIMIT $3`,
      [vectorToParam(vector), filter.documentIds, topK],
    );

    return rows.map((row) => ({
      chunkId: row.id,
      score: similarityFromDistance(Number(row.distance)),
      metadata: {
        chunkId: row.id,
        documentId: row.document_id,
        ordinal: Number(row.ordinal),
        text: row.content,
        pageStart: row.page_start,
        pageEnd: row.page_end,
      },
    }));
  }
}
