import { describe, it, expect, beforeEach } from 'vitest';
import { cosineSimilarity, InMemoryVectorStore } from '../src/stores/memory-store.js';
import {
  CollectionExistsError,
  CollectionNotFoundError,
  DimensionMismatchError,
  ValidationError,
} from '../src/errors.js';
import type { ChunkRecord } from '../src/types/chunks.js';

function record(id: string, vector: number[], ticker = 'ACME', section = 'mdna'): ChunkRecord {
  return {
    id,
    vector,
    payload: {
      text: `chunk ${id}`,
      ticker,
      section,
      fiscal_year: 2023,
      page: null,
      chunk_index: null,
      created_at: '2024-03-01T12:00:00.000Z',
    },
  };
}

describe('cosineSimilarity', () => {
  it('scores parallel, orthogonal and opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1);
  });

  it('returns 0 when either vector is zero', () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe('InMemoryVectorStore', () => {
  let store: InMemoryVectorStore;

  beforeEach(async () => {
    store = new InMemoryVectorStore();
    await store.createCollection('sec_filings', { dimension: 2, distance: 'cosine' });
  });

  it('lists and describes collections', async () => {
    expect(await store.listCollections()).toEqual(['sec_filings']);
    await store.upsert('sec_filings', [record('a', [1, 0])]);
    expect(await store.getCollection('sec_filings')).toEqual({
      name: 'sec_filings',
      dimension: 2,
      distance: 'cosine',
      pointsCount: 1,
      vectorsCount: 1,
      status: 'green',
    });
    expect(await store.getCollection('missing')).toBeNull();
  });

  it('refuses to create a collection twice', async () => {
    await expect(store.createCollection('sec_filings', { dimension: 2, distance: 'cosine' }))
      .rejects.toBeInstanceOf(CollectionExistsError);
  });

  it('refuses a non-positive dimension', async () => {
    await expect(store.createCollection('other', { dimension: 0, distance: 'cosine' }))
      .rejects.toBeInstanceOf(ValidationError);
  });

  it('replaces points with the same id', async () => {
    await store.upsert('sec_filings', [record('a', [1, 0])]);
    await store.upsert('sec_filings', [record('a', [0, 1])]);
    const hits = await store.search('sec_filings', { vector: [0, 1], filter: [], limit: 5 });
    expect(hits).toHaveLength(1);
    expect(hits[0].score).toBeCloseTo(1);
  });

  it('writes nothing when any vector in the batch has the wrong dimension', async () => {
    await expect(store.upsert('sec_filings', [record('a', [1, 0]), record('b', [1, 0, 0])]))
      .rejects.toBeInstanceOf(DimensionMismatchError);
    expect((await store.getCollection('sec_filings'))?.pointsCount).toBe(0);
  });

  it('searches best first with filter, threshold and limit', async () => {
    await store.upsert('sec_filings', [
      record('a', [1, 0]),
      record('b', [1, 1]),
      record('c', [0, 1]),
      record('d', [1, 0], 'GLOBX'),
    ]);

    const all = await store.search('sec_filings', {
      vector: [1, 0],
      filter: [{ key: 'ticker', value: 'ACME' }],
      limit: 10,
    });
    expect(all.map(h => h.id)).toEqual(['a', 'b', 'c']);

    const above = await store.search('sec_filings', {
      vector: [1, 0],
      filter: [{ key: 'ticker', value: 'ACME' }],
      limit: 10,
      scoreThreshold: 0.5,
    });
    expect(above.map(h => h.id)).toEqual(['a', 'b']);

    const limited = await store.search('sec_filings', { vector: [1, 0], filter: [], limit: 1 });
    expect(limited).toHaveLength(1);
  });

  it('rejects a query of the wrong dimension', async () => {
    await expect(store.search('sec_filings', { vector: [1, 0, 0], filter: [], limit: 1 }))
      .rejects.toThrow('Vector dimension mismatch for collection "sec_filings": expected 2, got 3');
  });

  it('deletes by filter', async () => {
    await store.upsert('sec_filings', [record('a', [1, 0]), record('b', [0, 1], 'GLOBX')]);
    await store.deleteByFilter('sec_filings', [{ key: 'ticker', value: 'ACME' }]);
    const hits = await store.search('sec_filings', { vector: [1, 1], filter: [], limit: 10 });
    expect(hits.map(h => h.id)).toEqual(['b']);
  });

  it('refuses an unconditional delete', async () => {
    await expect(store.deleteByFilter('sec_filings', [])).rejects.toBeInstanceOf(ValidationError);
  });

  it('throws for unknown collections', async () => {
    await expect(store.upsert('missing', [])).rejects.toBeInstanceOf(CollectionNotFoundError);
  });

  it('returns copies so callers cannot mutate stored payloads', async () => {
    await store.upsert('sec_filings', [record('a', [1, 0])]);
    const [hit] = await store.search('sec_filings', { vector: [1, 0], filter: [], limit: 1 });
    hit.payload.text = 'changed';
    const [again] = await store.search('sec_filings', { vector: [1, 0], filter: [], limit: 1 });
    expect(again.payload.text).toBe('chunk a');
  });
});
