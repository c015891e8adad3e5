// Collection admin — ticker deletion, collection stats and liveness
// These report failure as false/null instead of throwing

import { attempt } from '../boundary.js';
import { ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { VectorStore } from '../stores/vector-store.js';
import type { CollectionInfo } from '../types/chunks.js';

const log = createLogger('collection-admin');

export interface CollectionAdminDeps {
  store: VectorStore;
  collectionName: string;
}

export class CollectionAdmin {
  constructor(private readonly deps: CollectionAdminDeps) {}

  /**
   * Remove every chunk stored for `ticker` in one filtered delete.
   * A ticker with no chunks still returns true.
   */
  async deleteByTicker(ticker: string): Promise<boolean> {
    if (!ticker) {
      throw new ValidationError('ticker must be a non-empty string');
    }
    const { store, collectionName } = this.deps;
    const result = await attempt('delete by ticker', () =>
      store.deleteByFilter(collectionName, [{ key: 'ticker', value: ticker }]),
    );
    if (!result.ok) {
      log.error(`Error deleting documents for ${ticker}: ${result.error.message}`, {
        collection: collectionName,
        kind: result.error.kind,
      });
      return false;
    }
    log.info(`Deleted all documents for ticker: ${ticker}`);
    return true;
  }

  async getCollectionInfo(): Promise<CollectionInfo | null> {
    const { store, collectionName } = this.deps;
    const result = await attempt('get collection info', () => store.getCollection(collectionName));
    if (!result.ok) {
      log.error(`Error getting collection info: ${result.error.message}`, { collection: collectionName });
      return null;
    }
    if (!result.value) {
      log.warn(`Collection '${collectionName}' does not exist`);
    }
    return result.value;
  }

  /** True when the store answers a collection listing. */
  async healthCheck(): Promise<boolean> {
    const result = await attempt('health check', () => this.deps.store.listCollections());
    if (!result.ok) {
      log.error(`Vector store health check failed: ${result.error.message}`, {
        backend: this.deps.store.backend,
      });
      return false;
    }
    return true;
  }
}
