export {
  FilingVectorIndex,
  getFilingVectorIndex,
  closeFilingVectorIndex,
} from './filing-vector-index.js';
export type { FilingVectorIndexOptions } from './filing-vector-index.js';

export { loadSettings, VECTOR_STORE_BACKENDS, EMBEDDING_PROVIDERS } from './config/settings.js';
export type { Settings, VectorStoreBackend, EmbeddingProviderName } from './config/settings.js';
export { createVectorStore, createEmbeddingProvider } from './config/backends.js';

export {
  FilingIndexError,
  ConfigurationError,
  ValidationError,
  TransientIOError,
  DimensionMismatchError,
  EmbeddingError,
  CollectionExistsError,
  CollectionNotFoundError,
  IngestionError,
} from './errors.js';
export type { FilingIndexErrorKind } from './errors.js';

export { attempt, unwrap, callBoundary, toFilingIndexError } from './boundary.js';
export type { Result } from './boundary.js';

export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

export type { EmbeddingProvider } from './embeddings/provider.js';
export { OpenAIEmbeddingProvider } from './embeddings/openai-provider.js';
export type { OpenAIEmbeddingConfig } from './embeddings/openai-provider.js';
export { HashingEmbeddingProvider } from './embeddings/hashing-provider.js';
export {
  EmbeddingQualityError,
  validateEmbedding,
  validateEmbeddingBatch,
  computeValidatedEmbedding,
} from './embeddings/embedding-guard.js';

export type { VectorStore, StoreSearchRequest } from './stores/vector-store.js';
export { InMemoryVectorStore, cosineSimilarity } from './stores/memory-store.js';
export { PgVectorStore } from './stores/pg-store.js';
export { QdrantVectorStore } from './stores/qdrant-store.js';
export type { QdrantStoreConfig } from './stores/qdrant-store.js';
export type { PgConfig } from './db/pg-client.js';

export { deriveChunkId, ID_TEXT_PREFIX_LENGTH } from './identity/chunk-id.js';
export { CollectionManager, DIMENSION_PROBE_TEXT } from './collections/collection-manager.js';
export type { EnsuredCollection } from './collections/collection-manager.js';
export { IngestionPipeline, buildChunkRecord, DEFAULT_BATCH_SIZE } from './ingestion/pipeline.js';
export {
  RetrievalEngine,
  filterByKeywords,
  DEFAULT_TOP_K,
  DEFAULT_SCORE_THRESHOLD,
  HYBRID_OVERFETCH_FACTOR,
} from './retrieval/retrieval-engine.js';
export type { SearchOptions, HybridSearchOptions } from './retrieval/retrieval-engine.js';
export { CollectionAdmin } from './admin/collection-admin.js';

export {
  ChunkMetadataSchema,
  ChunkPayloadSchema,
  buildFilter,
  toSearchResult,
} from './types/chunks.js';
export type {
  ChunkMetadata,
  ParsedChunkMetadata,
  ChunkPayload,
  ChunkRecord,
  ScoredChunk,
  SearchResult,
  CollectionInfo,
  CollectionSpec,
  CollectionStatus,
  DistanceMetric,
  FieldMatch,
  FilterField,
  SearchFilterInput,
} from './types/chunks.js';
