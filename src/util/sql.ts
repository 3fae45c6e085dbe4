// src/util/sql.ts
// What: SQL helpers for vectors and scoring.
// How: vectorToParam formats an array for ::vector casting; similarityFromDistance turns a pgvector cosine
//      distance (<=>) into the raw cosine similarity the retrieval engine thresholds on.

export function vectorToParam(v: readonly number[]): string {
  // Postgres vector literal: [0.1, 0.2, ...]
  return `[${v.join(',')}]`;
}

export function similarityFromDistance(distance: number): number {
  return 1 - distance;
}
