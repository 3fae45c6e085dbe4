// src/services/embeddings.ts
// What: OpenAI embedding adapter.
// How: Wraps an OpenAI client and exposes embed/embedBatch using the configured embedding model, validating that
//      every vector has the dimensionality the chunks table was created with.

import type OpenAI from 'openai';
import type { Embedder } from '../models/types.js';

export interface OpenAIEmbedderOptions {
  model: string;
  dimensions: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly dimensions: number;
  private readonly model: string;

  constructor(
    private readonly client: OpenAI,
    options: OpenAIEmbedderOptions,
  ) {
    this.model = options.model;
    this.dimensions = options.dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const [vec] = await this.embedBatch([text]);
    return vec;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const res = await this.client.embeddings.create({
      model: this.model,
      input: texts,
    });
    if (res.data.length !== texts.length) {
      throw new Error(`Embedding count mismatch; expected ${texts.length}, got ${res.data.length}`);
    }
    // The API tags each vector with its input index; do not rely on response order.
    const vectors = new Array<number[]>(texts.length);
    for (const d of res.data) {
      assertDimensions(d.embedding, this.dimensions);
      vectors[d.index] = d.embedding;
    }
    return vectors;
  }
}

export function assertDimensions(vec: readonly number[] | undefined, expected: number): void {
  if (!vec || vec.length !== expected) {
    throw new Error(`Unexpected embedding size; expected ${expected}, got ${vec?.length ?? 'unknown'}`);
  }
}
