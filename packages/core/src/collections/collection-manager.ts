// Collection Manager — lazily creates the target collection sized to the embedding model
// Check-then-create is not atomic across processes; a concurrent creator's
// "already exists" counts as success and the postcondition is checked either way

import { attempt, callBoundary } from '../boundary.js';
import { CollectionExistsError, DimensionMismatchError, TransientIOError } from '../errors.js';
import type { EmbeddingProvider } from '../embeddings/provider.js';
import { createLogger } from '../logger.js';
import type { VectorStore } from '../stores/vector-store.js';

const log = createLogger('collection-manager');

/** Embedded once to discover the model's output dimension. */
export const DIMENSION_PROBE_TEXT = 'test';

export interface EnsuredCollection {
  name: string;
  dimension: number;
  /** True only when this call performed the creation. */
  created: boolean;
}

export class CollectionManager {
  private ensured = new Map<string, Promise<EnsuredCollection>>();

  constructor(
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingProvider,
  ) {}

  /**
   * Make sure `name` exists with the embedding model's dimension and cosine distance.
   * Concurrent callers share one in-flight check; a failed check is forgotten
   * so the next call tries again.
   */
  ensureCollection(name: string): Promise<EnsuredCollection> {
    const pending = this.ensured.get(name);
    if (pending) return pending;

    const promise = this.ensure(name).catch((err: unknown) => {
      this.ensured.delete(name);
      throw err;
    });
    this.ensured.set(name, promise);
    return promise;
  }

  /** Drop the cached result, e.g. after the collection was removed externally. */
  forget(name: string): void {
    this.ensured.delete(name);
  }

  private async ensure(name: string): Promise<EnsuredCollection> {
    const context = { collection: name, backend: this.store.backend };

    const existing = await callBoundary(log, 'list collections', context, () =>
      this.store.listCollections(),
    );
    if (existing.includes(name)) {
      log.info(`Collection '${name}' already exists`);
      return this.verify(name, undefined, false);
    }

    const probe = await callBoundary(log, 'embed dimension probe', { ...context, model: this.embedder.model }, () =>
      this.embedder.embed(DIMENSION_PROBE_TEXT),
    );
    const dimension = probe.length;

    const creation = await attempt('create collection', () =>
      this.store.createCollection(name, { dimension, distance: 'cosine' }),
    );
    if (creation.ok) {
      log.info(`Created collection '${name}' with dimension ${dimension}`);
      return this.verify(name, dimension, true);
    }
    if (creation.error instanceof CollectionExistsError) {
      log.info(`Collection '${name}' was created concurrently`);
      return this.verify(name, dimension, false);
    }
    log.error(`create collection failed: ${creation.error.message}`, { ...context, dimension });
    throw creation.error;
  }

  private async verify(
    name: string,
    expectedDimension: number | undefined,
    created: boolean,
  ): Promise<EnsuredCollection> {
    const info = await callBoundary(log, 'get collection', { collection: name }, () =>
      this.store.getCollection(name),
    );
    if (!info) {
      throw new TransientIOError(`Collection "${name}" missing after ensure`, 'ensure collection');
    }
    if (expectedDimension !== undefined && info.dimension !== expectedDimension) {
      log.error(`collection '${name}' has dimension ${info.dimension}, model produces ${expectedDimension}`);
      throw new DimensionMismatchError(info.dimension, expectedDimension, name);
    }
    return { name, dimension: info.dimension, created };
  }
}
