import type {
  ChunkRecord,
  CollectionInfo,
  CollectionSpec,
  FieldMatch,
  ScoredChunk,
} from '../types/chunks.js';

export interface StoreSearchRequest {
  vector: number[];
  filter: FieldMatch[];
  limit: number;
  /** Results scoring below this are dropped by the store. */
  scoreThreshold?: number;
}

export interface VectorStore {
  readonly backend: string;

  listCollections(): Promise<string[]>;

  /**
   * Create a cosine collection with a fixed dimension.
   * Rejects with CollectionExistsError when the name is taken.
   */
  createCollection(name: string, spec: CollectionSpec): Promise<void>;

  /** Null when the collection does not exist. */
  getCollection(name: string): Promise<CollectionInfo | null>;

  /**
   * Store points, replacing any with the same id.
   * The batch is written as one operation (transaction where supported).
   */
  upsert(name: string, points: ChunkRecord[]): Promise<void>;

  /** Nearest neighbours by cosine similarity, best first. */
  search(name: string, request: StoreSearchRequest): Promise<ScoredChunk[]>;

  /** Remove every point matching all conditions in one filtered operation. */
  deleteByFilter(name: string, filter: FieldMatch[]): Promise<void>;

  close(): Promise<void>;
}
