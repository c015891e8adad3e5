import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CollectionAdmin } from '../src/admin/collection-admin.js';
import { ValidationError } from '../src/errors.js';
import { InMemoryVectorStore } from '../src/stores/memory-store.js';

describe('CollectionAdmin', () => {
  let store: InMemoryVectorStore;
  let admin: CollectionAdmin;

  beforeEach(async () => {
    store = new InMemoryVectorStore();
    await store.createCollection('sec_filings', { dimension: 2, distance: 'cosine' });
    admin = new CollectionAdmin({ store, collectionName: 'sec_filings' });
  });

  it('deletes with a single ticker condition', async () => {
    const del = vi.spyOn(store, 'deleteByFilter');
    expect(await admin.deleteByTicker('ACME')).toBe(true);
    expect(del).toHaveBeenCalledWith('sec_filings', [{ key: 'ticker', value: 'ACME' }]);
  });

  it('rejects an empty ticker', async () => {
    await expect(admin.deleteByTicker('')).rejects.toBeInstanceOf(ValidationError);
  });

  it('returns false when the collection is missing', async () => {
    const orphan = new CollectionAdmin({ store, collectionName: 'missing' });
    expect(await orphan.deleteByTicker('ACME')).toBe(false);
  });

  it('returns collection info', async () => {
    expect(await admin.getCollectionInfo()).toMatchObject({ name: 'sec_filings', dimension: 2, pointsCount: 0 });
  });

  it('health check lists collections', async () => {
    const list = vi.spyOn(store, 'listCollections');
    expect(await admin.healthCheck()).toBe(true);
    expect(list).toHaveBeenCalledOnce();
  });
});
