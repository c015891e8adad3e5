// Embedding quality guard — validates embedding vectors before storage/search
// Catches degenerate output (empty, non-finite, constant or zero vectors) and
// batches that came back short

import { EmbeddingError, FilingIndexError } from '../errors.js';

/**
 * Error thrown when an embedding fails quality validation.
 * `dispersion` is variance scaled by n/‖v‖², ~1 for real embeddings and 0 for constant vectors.
 */
export class EmbeddingQualityError extends FilingIndexError {
  constructor(
    message: string,
    public readonly dispersion: number,
    public readonly l2Norm: number,
  ) {
    super(message, 'embedding');
    this.name = 'EmbeddingQualityError';
  }
}

export interface EmbeddingGuardOptions {
  /** Minimum dispersion ratio. Default: 0.01 */
  minDispersion?: number;
}

function describe(text?: string): string {
  return text ? ` for text "${text.slice(0, 50)}..."` : '';
}

/**
 * Validate an embedding vector for quality.
 *
 * Checks:
 * 1. Non-empty, every component finite.
 * 2. Non-zero L2 norm — cosine similarity is undefined for a zero vector.
 * 3. Dispersion (variance · n / ‖v‖²) above the floor. A constant vector
 *    scores 0 regardless of dimension, where raw variance would depend on it.
 *
 * @throws EmbeddingQualityError if validation fails
 */
export function validateEmbedding(
  embedding: readonly number[],
  text?: string,
  options: EmbeddingGuardOptions = {},
): void {
  const n = embedding.length;
  if (n === 0) {
    throw new EmbeddingQualityError(`Empty embedding vector${describe(text)}`, 0, 0);
  }

  let sum = 0;
  let normSum = 0;
  for (let i = 0; i < n; i++) {
    const v = embedding[i];
    if (!Number.isFinite(v)) {
      throw new EmbeddingQualityError(
        `Embedding component ${i} is not finite (${v})${describe(text)}`,
        0,
        Number.NaN,
      );
    }
    sum += v;
    normSum += v * v;
  }
  const l2Norm = Math.sqrt(normSum);

  if (normSum === 0) {
    throw new EmbeddingQualityError(`Embedding is the zero vector${describe(text)}`, 0, 0);
  }

  const mean = sum / n;
  let varianceSum = 0;
  for (let i = 0; i < n; i++) {
    const diff = embedding[i] - mean;
    varianceSum += diff * diff;
  }
  const dispersion = varianceSum / normSum;

  const floor = options.minDispersion ?? 0.01;
  if (dispersion < floor) {
    throw new EmbeddingQualityError(
      `Embedding dispersion too low (${dispersion.toFixed(6)})${describe(text)}. ` +
      `Model output looks constant.`,
      dispersion,
      l2Norm,
    );
  }
}

/**
 * Validate a batch: exactly one vector per input, each passing validateEmbedding,
 * all of one length. Any failure rejects the whole batch.
 */
export function validateEmbeddingBatch(
  texts: readonly string[],
  vectors: readonly number[][],
  options: EmbeddingGuardOptions = {},
): void {
  if (vectors.length !== texts.length) {
    throw new EmbeddingError(
      `Embedding backend returned ${vectors.length} vectors for ${texts.length} inputs`,
    );
  }
  for (let i = 0; i < vectors.length; i++) {
    validateEmbedding(vectors[i], texts[i], options);
    if (vectors[i].length !== vectors[0].length) {
      throw new EmbeddingError(
        `Embedding backend returned mixed dimensions (${vectors[0].length} and ${vectors[i].length})`,
      );
    }
  }
}

/**
 * Compute embedding with quality validation.
 *
 * @throws EmbeddingQualityError if the embedding fails quality checks
 */
export async function computeValidatedEmbedding(
  computeFn: (text: string) => Promise<number[]>,
  text: string,
  options: EmbeddingGuardOptions = {},
): Promise<number[]> {
  const embedding = await computeFn(text);
  validateEmbedding(embedding, text, options);
  return embedding;
}
