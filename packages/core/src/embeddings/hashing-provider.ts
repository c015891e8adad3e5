// Feature-hashing embeddings — deterministic bag-of-words vectors, no model and no network
// Lexical overlap only; meant for local runs, demos and smoke tests

import { createHash } from 'node:crypto';
import { computeValidatedEmbedding, validateEmbeddingBatch } from './embedding-guard.js';
import type { EmbeddingProvider } from './provider.js';

const TOKEN = /[\p{L}\p{N}]+/gu;

export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;

  constructor(readonly dimension = 384) {
    this.model = `hashing-${dimension}`;
  }

  async embed(text: string): Promise<number[]> {
    return computeValidatedEmbedding(async (t) => this.vectorize(t), text);
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    const vectors = texts.map(t => this.vectorize(t));
    validateEmbeddingBatch(texts, vectors);
    return vectors;
  }

  /**
   * Each lowercased token hashes to a bucket and a sign; the vector is the
   * signed bucket counts, L2-normalized. Text with no letters or digits
   * (rules, dashes, bare symbols) maps to the unit vector on the last axis.
   */
  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of text.toLowerCase().match(TOKEN) ?? []) {
      const digest = createHash('sha256').update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimension;
      vector[bucket] += (digest[4] & 1) === 0 ? 1 : -1;
    }

    let norm = 0;
    for (const v of vector) norm += v * v;
    if (norm === 0) {
      vector[this.dimension - 1] = 1;
      return vector;
    }
    norm = Math.sqrt(norm);
    return vector.map(v => v / norm);
  }
}
