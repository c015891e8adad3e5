// FilingVectorIndex — one entry point over collection setup, ingestion, retrieval and admin
// Handles are created lazily; the first operation ensures the collection

import { CollectionAdmin } from './admin/collection-admin.js';
import { attempt } from './boundary.js';
import { CollectionManager } from './collections/collection-manager.js';
import type { EnsuredCollection } from './collections/collection-manager.js';
import { createEmbeddingProvider, createVectorStore } from './config/backends.js';
import { loadSettings } from './config/settings.js';
import type { Settings } from './config/settings.js';
import type { EmbeddingProvider } from './embeddings/provider.js';
import { ValidationError } from './errors.js';
import { IngestionPipeline } from './ingestion/pipeline.js';
import { createLogger, setLogLevel } from './logger.js';
import { RetrievalEngine } from './retrieval/retrieval-engine.js';
import type { HybridSearchOptions, SearchOptions } from './retrieval/retrieval-engine.js';
import type { VectorStore } from './stores/vector-store.js';
import type { ChunkMetadata, CollectionInfo, SearchResult } from './types/chunks.js';

const log = createLogger('filing-index');

export interface FilingVectorIndexOptions {
  settings?: Settings;
  /** Injected store; the index does not close stores it did not create. */
  store?: VectorStore;
  embedder?: EmbeddingProvider;
  collectionName?: string;
  clock?: () => Date;
}

interface Components {
  store: VectorStore;
  embedder: EmbeddingProvider;
  collections: CollectionManager;
  pipeline: IngestionPipeline;
  retrieval: RetrievalEngine;
}

export class FilingVectorIndex {
  readonly settings: Settings;
  readonly collectionName: string;
  private storePromise: Promise<VectorStore> | null = null;
  private componentsPromise: Promise<Components> | null = null;
  private readonly ownsStore: boolean;

  constructor(private readonly options: FilingVectorIndexOptions = {}) {
    this.settings = options.settings ?? loadSettings();
    this.collectionName = options.collectionName ?? this.settings.vectorStore.collectionName;
    this.ownsStore = options.store === undefined;
  }

  /** Build the store and embedder handles and make sure the collection exists. */
  async initialize(): Promise<EnsuredCollection> {
    const { collections } = await this.components();
    return collections.ensureCollection(this.collectionName);
  }

  async upsertDocuments(
    texts: readonly string[],
    metadatas: readonly ChunkMetadata[],
    batchSize = this.settings.ingestion.batchSize,
  ): Promise<number> {
    const { pipeline } = await this.components();
    return pipeline.upsertDocuments(texts, metadatas, batchSize);
  }

  async search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
    const { retrieval } = await this.components();
    return retrieval.search(query, options);
  }

  async hybridSearch(
    query: string,
    keywords: readonly string[],
    options?: HybridSearchOptions,
  ): Promise<SearchResult[]> {
    const { retrieval } = await this.components();
    return retrieval.hybridSearch(query, keywords, options);
  }

  async deleteByTicker(ticker: string): Promise<boolean> {
    if (!ticker) {
      throw new ValidationError('ticker must be a non-empty string');
    }
    const ready = await attempt('initialize', () => this.initialize());
    if (!ready.ok) {
      log.error(`Error deleting documents for ${ticker}: ${ready.error.message}`);
      return false;
    }
    const admin = await this.admin();
    return admin ? admin.deleteByTicker(ticker) : false;
  }

  async getCollectionInfo(): Promise<CollectionInfo | null> {
    const admin = await this.admin();
    return admin ? admin.getCollectionInfo() : null;
  }

  async healthCheck(): Promise<boolean> {
    const admin = await this.admin();
    return admin ? admin.healthCheck() : false;
  }

  /** Close the store if this index created it. Safe to call more than once. */
  async shutdown(): Promise<void> {
    const pending = this.storePromise;
    this.storePromise = null;
    this.componentsPromise = null;
    if (!pending || !this.ownsStore) return;

    const store = await pending.catch((err: unknown) => {
      log.debug('shutdown: store was never created', err);
      return null;
    });
    if (store) {
      await store.close();
      log.info('Vector store connection closed');
    }
  }

  /** Admin needs only the store; null when the store cannot be created. */
  private async admin(): Promise<CollectionAdmin | null> {
    const store = await attempt('create vector store', () => this.store());
    if (!store.ok) {
      log.error(`Vector store unavailable: ${store.error.message}`);
      return null;
    }
    return new CollectionAdmin({ store: store.value, collectionName: this.collectionName });
  }

  private store(): Promise<VectorStore> {
    if (!this.storePromise) {
      this.storePromise = (this.options.store
        ? Promise.resolve(this.options.store)
        : createVectorStore(this.settings)
      ).catch((err: unknown) => {
        this.storePromise = null;
        throw err;
      });
    }
    return this.storePromise;
  }

  private components(): Promise<Components> {
    if (!this.componentsPromise) {
      this.componentsPromise = this.build().catch((err: unknown) => {
        this.componentsPromise = null;
        throw err;
      });
    }
    return this.componentsPromise;
  }

  private async build(): Promise<Components> {
    const store = await this.store();
    const embedder = this.options.embedder ?? (await createEmbeddingProvider(this.settings));
    const collections = new CollectionManager(store, embedder);
    const deps = { store, embedder, collections, collectionName: this.collectionName };

    log.info(`Using ${store.backend} store with embedding model ${embedder.model}`);
    return {
      store,
      embedder,
      collections,
      pipeline: new IngestionPipeline({ ...deps, clock: this.options.clock }),
      retrieval: new RetrievalEngine({ ...deps, defaults: this.settings.search }),
    };
  }
}

// Process-wide shared instance

let _index: FilingVectorIndex | null = null;

export function getFilingVectorIndex(): FilingVectorIndex {
  if (!_index) {
    const settings = loadSettings();
    setLogLevel(settings.logLevel);
    _index = new FilingVectorIndex({ settings });
  }
  return _index;
}

export async function closeFilingVectorIndex(): Promise<void> {
  const index = _index;
  _index = null;
  if (index) await index.shutdown();
}
