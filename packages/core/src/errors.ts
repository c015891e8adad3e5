// Typed failures for the filing index
// Every error crossing the core's public surface is a FilingIndexError with a kind

export type FilingIndexErrorKind =
  | 'configuration'
  | 'validation'
  | 'transient'
  | 'dimension_mismatch'
  | 'embedding'
  | 'conflict';

export class FilingIndexError extends Error {
  constructor(
    message: string,
    public readonly kind: FilingIndexErrorKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'FilingIndexError';
  }
}

/** Embedding backend or vector store cannot be constructed or reached at startup. */
export class ConfigurationError extends FilingIndexError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'configuration', options);
    this.name = 'ConfigurationError';
  }
}

/** Caller input rejected before any network I/O. */
export class ValidationError extends FilingIndexError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'validation', options);
    this.name = 'ValidationError';
  }
}

/** Network, timeout or backend failure during an embed or store call. */
export class TransientIOError extends FilingIndexError {
  constructor(
    message: string,
    public readonly operation: string,
    options?: ErrorOptions,
  ) {
    super(message, 'transient', options);
    this.name = 'TransientIOError';
  }
}

/**
 * A vector's length disagrees with the collection it targets.
 * Usually means the embedding model changed under an existing collection.
 */
export class DimensionMismatchError extends FilingIndexError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly collection?: string,
  ) {
    const target = collection ? ` for collection "${collection}"` : '';
    super(`Vector dimension mismatch${target}: expected ${expected}, got ${actual}`, 'dimension_mismatch');
    this.name = 'DimensionMismatchError';
  }
}

/** The embedding backend could not produce one vector per input. */
export class EmbeddingError extends FilingIndexError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'embedding', options);
    this.name = 'EmbeddingError';
  }
}

export class CollectionExistsError extends FilingIndexError {
  constructor(public readonly collection: string, options?: ErrorOptions) {
    super(`Collection "${collection}" already exists`, 'conflict', options);
    this.name = 'CollectionExistsError';
  }
}

export class CollectionNotFoundError extends FilingIndexError {
  constructor(public readonly collection: string) {
    super(`Collection "${collection}" does not exist`, 'configuration');
    this.name = 'CollectionNotFoundError';
  }
}

/**
 * Raised when a batch fails during upsertDocuments.
 * `upsertedCount` is what completed batches wrote before the failure;
 * callers re-run the tail starting at `batchIndex`.
 */
export class IngestionError extends FilingIndexError {
  constructor(
    public readonly batchIndex: number,
    public readonly upsertedCount: number,
    public readonly reason: FilingIndexError,
  ) {
    super(
      `Ingestion aborted at batch ${batchIndex + 1} after ${upsertedCount} records: ${reason.message}`,
      reason.kind,
      { cause: reason },
    );
    this.name = 'IngestionError';
  }
}
