import type { EmbeddingProvider } from '../src/embeddings/provider.js';

/** Each vocabulary word owns one axis; text with none of them lands on the last axis. */
export const VOCAB = ['revenue', 'growth', 'risk', 'debt', 'litigation', 'supply'] as const;
export const FAKE_DIMENSION = VOCAB.length + 1;
const AXES: readonly string[] = VOCAB;

export function fakeVector(text: string): number[] {
  const vector = new Array<number>(FAKE_DIMENSION).fill(0);
  for (const token of text.toLowerCase().match(/[a-z]+/g) ?? []) {
    const axis = AXES.indexOf(token);
    if (axis >= 0) vector[axis] += 1;
  }
  if (vector.every((v): boolean => v === 0)) vector[FAKE_DIMENSION - 1] = 1;
  return vector;
}

/**
 * Deterministic embedder with call counters and failure injection.
 * `failOnBatchCall` is 1-based over embedBatch calls.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-vocab';
  embedCalls: string[] = [];
  batchSizes: number[] = [];
  failOnBatchCall: number | null = null;
  dimension = FAKE_DIMENSION;

  async embed(text: string): Promise<number[]> {
    this.embedCalls.push(text);
    return this.resize(fakeVector(text));
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    this.batchSizes.push(texts.length);
    if (this.failOnBatchCall === this.batchSizes.length) {
      throw new Error('embedding service unavailable');
    }
    return texts.map(t => this.resize(fakeVector(t)));
  }

  private resize(vector: number[]): number[] {
    if (this.dimension === vector.length) return vector;
    return Array.from({ length: this.dimension }, (_, i) => vector[i] ?? 1);
  }
}

export const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');
export const fixedClock = () => FIXED_NOW;
