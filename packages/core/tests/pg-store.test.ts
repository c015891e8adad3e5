import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CollectionExistsError, DimensionMismatchError, ValidationError } from '../src/errors.js';
import * as pgClient from '../src/db/pg-client.js';
import { PgVectorStore } from '../src/stores/pg-store.js';
import type { ChunkRecord } from '../src/types/chunks.js';

const mocks = vi.hoisted(() => {
  const clientQuery = vi.fn();
  const client = { query: clientQuery, release: vi.fn() };
  const poolQuery = vi.fn();
  const pool = { query: poolQuery, connect: vi.fn(async () => client) };
  return { clientQuery, client, poolQuery, pool };
});

vi.mock('../src/db/pg-client.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../src/db/pg-client.js')>()),
  getPool: vi.fn(async () => mocks.pool),
  runMigrations: vi.fn(async () => []),
  closePool: vi.fn(async () => undefined),
}));


const config = {
  host: 'localhost',
  port: 5433,
  user: 'filings',
  password: 'test-secret',
  database: 'filings',
};

function point(id: string, vector: number[]): ChunkRecord {
  return {
    id,
    vector,
    payload: {
      text: 'Revenue declined',
      ticker: 'ACME',
      section: 'mdna',
      fiscal_year: 2023,
      page: 12,
      chunk_index: 0,
      created_at: '2024-03-01T12:00:00.000Z',
    },
  };
}

/** SQL text of each client.query call, whitespace collapsed. */
function clientSql(): string[] {
  return mocks.clientQuery.mock.calls.map(([sql]) => String(sql).replace(/\s+/g, ' ').trim());
}

describe('PgVectorStore', () => {
  let store: PgVectorStore;

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.clientQuery.mockResolvedValue({ rows: [], rowCount: 0 });
    mocks.poolQuery.mockResolvedValue({ rows: [], rowCount: 0 });
    store = new PgVectorStore(config);
  });

  it('lists collections from the registry and migrates once', async () => {
    mocks.poolQuery.mockResolvedValue({ rows: [{ name: 'sec_filings' }], rowCount: 1 });

    expect(await store.listCollections()).toEqual(['sec_filings']);
    await store.listCollections();

    expect(pgClient.runMigrations).toHaveBeenCalledTimes(1);
    expect(mocks.poolQuery.mock.calls[0][0]).toBe('SELECT name FROM vector_collections ORDER BY name');
  });

  describe('createCollection', () => {
    it('registers the collection and creates its table and indexes in one transaction', async () => {
      await store.createCollection('sec_filings', { dimension: 384, distance: 'cosine' });

      const sql = clientSql();
      expect(sql[0]).toBe('BEGIN');
      expect(sql[1]).toBe('INSERT INTO vector_collections (name, dimension, distance) VALUES ($1, $2, $3)');
      expect(mocks.clientQuery.mock.calls[1][1]).toEqual(['sec_filings', 384, 'cosine']);
      expect(sql[2]).toContain('CREATE TABLE "sec_filings"');
      expect(sql[2]).toContain('embedding ruvector(384) NOT NULL');
      expect(sql[3]).toBe('CREATE INDEX "sec_filings_filter_idx" ON "sec_filings" (ticker, section)');
      expect(sql[4]).toBe(
        'CREATE INDEX "sec_filings_embedding_idx" ON "sec_filings" USING hnsw (embedding ruvector_cosine_ops)',
      );
      expect(sql[5]).toBe('COMMIT');
      expect(mocks.client.release).toHaveBeenCalledOnce();
    });

    it('maps a unique violation to CollectionExistsError and rolls back', async () => {
      mocks.clientQuery
        .mockResolvedValueOnce({ rows: [] })
        .mockRejectedValueOnce(Object.assign(new Error('duplicate key'), { code: '23505' }));

      await expect(store.createCollection('sec_filings', { dimension: 384, distance: 'cosine' }))
        .rejects.toBeInstanceOf(CollectionExistsError);
      expect(clientSql()).toEqual([
        'BEGIN',
        'INSERT INTO vector_collections (name, dimension, distance) VALUES ($1, $2, $3)',
        'ROLLBACK',
      ]);
      expect(mocks.client.release).toHaveBeenCalledOnce();
    });

    it('rethrows other failures', async () => {
      mocks.clientQuery
        .mockResolvedValueOnce({ rows: [] })
        .mockRejectedValueOnce(Object.assign(new Error('permission denied'), { code: '42501' }));

      await expect(store.createCollection('sec_filings', { dimension: 384, distance: 'cosine' }))
        .rejects.toThrow('permission denied');
      expect(mocks.client.release).toHaveBeenCalledWith(undefined);
    });

    it('keeps the original error and discards the client when ROLLBACK fails', async () => {
      const rollbackErr = new Error('connection terminated');
      mocks.clientQuery
        .mockResolvedValueOnce({ rows: [] })
        .mockRejectedValueOnce(Object.assign(new Error('permission denied'), { code: '42501' }))
        .mockRejectedValueOnce(rollbackErr);

      await expect(store.createCollection('sec_filings', { dimension: 384, distance: 'cosine' }))
        .rejects.toThrow('permission denied');
      expect(clientSql().at(-1)).toBe('ROLLBACK');
      expect(mocks.client.release).toHaveBeenCalledOnce();
      expect(mocks.client.release).toHaveBeenCalledWith(rollbackErr);
    });

    it('rejects names that are not safe identifiers', async () => {
      await expect(store.createCollection('Sec-Filings', { dimension: 384, distance: 'cosine' }))
        .rejects.toBeInstanceOf(ValidationError);
      expect(mocks.pool.connect).not.toHaveBeenCalled();
    });
  });

  describe('getCollection', () => {
    it('returns null for an unregistered collection', async () => {
      expect(await store.getCollection('sec_filings')).toBeNull();
    });

    it('reports dimension and row count', async () => {
      mocks.poolQuery
        .mockResolvedValueOnce({ rows: [{ name: 'sec_filings', dimension: 384 }] })
        .mockResolvedValueOnce({ rows: [{ count: 42 }] });

      expect(await store.getCollection('sec_filings')).toEqual({
        name: 'sec_filings',
        dimension: 384,
        distance: 'cosine',
        pointsCount: 42,
        vectorsCount: 42,
        status: 'green',
      });
      expect(mocks.poolQuery.mock.calls[1][0]).toBe('SELECT count(*)::int AS count FROM "sec_filings"');
    });
  });

  describe('upsert', () => {
    it('writes every point with ON CONFLICT update inside a transaction', async () => {
      mocks.clientQuery.mockImplementation(async (sql: string) =>
        sql.startsWith('SELECT dimension') ? { rows: [{ dimension: 2 }] } : { rows: [] },
      );

      await store.upsert('sec_filings', [point('a', [1, 0]), point('b', [0.5, 0.25])]);

      const sql = clientSql();
      expect(sql[0]).toBe('BEGIN');
      expect(sql.filter(s => s.startsWith('INSERT INTO "sec_filings"'))).toHaveLength(2);
      expect(sql[2]).toContain('ON CONFLICT (id) DO UPDATE SET');
      expect(sql.at(-1)).toBe('COMMIT');
      expect(mocks.clientQuery.mock.calls[2][1]).toEqual([
        'a',
        '[1.000000,0.000000]',
        'Revenue declined',
        'ACME',
        'mdna',
        2023,
        12,
        0,
        '2024-03-01T12:00:00.000Z',
      ]);
    });

    it('rejects the batch on a dimension mismatch', async () => {
      mocks.clientQuery.mockImplementation(async (sql: string) =>
        sql.startsWith('SELECT dimension') ? { rows: [{ dimension: 3 }] } : { rows: [] },
      );

      await expect(store.upsert('sec_filings', [point('a', [1, 0])])).rejects.toBeInstanceOf(
        DimensionMismatchError,
      );
      expect(clientSql().at(-1)).toBe('ROLLBACK');
      expect(clientSql().some(s => s.startsWith('INSERT'))).toBe(false);
    });

    it('does nothing for an empty batch', async () => {
      await store.upsert('sec_filings', []);
      expect(mocks.pool.connect).not.toHaveBeenCalled();
    });
  });

  describe('search', () => {
    it('orders by cosine distance with filter, threshold and limit parameters', async () => {
      mocks.poolQuery.mockResolvedValueOnce({
        rows: [
          {
            id: 'a',
            text: 'Revenue declined',
            ticker: 'ACME',
            section: 'mdna',
            fiscal_year: 2023,
            page: null,
            chunk_index: 3,
            created_at: new Date('2024-03-01T12:00:00.000Z'),
            score: '0.95',
          },
        ],
      });

      const hits = await store.search('sec_filings', {
        vector: [1, 0],
        filter: [{ key: 'ticker', value: 'ACME' }],
        limit: 5,
        scoreThreshold: 0.7,
      });

      const [sql, params] = mocks.poolQuery.mock.calls[0];
      const flat = String(sql).replace(/\s+/g, ' ');
      expect(flat).toContain('1 - (embedding <=> $1::ruvector) AS score');
      expect(flat).toContain('WHERE ticker = $2 AND 1 - (embedding <=> $1::ruvector) >= $3');
      expect(flat).toContain('ORDER BY embedding <=> $1::ruvector, id LIMIT $4');
      expect(params).toEqual(['[1.000000,0.000000]', 'ACME', 0.7, 5]);

      expect(hits).toEqual([
        {
          id: 'a',
          score: 0.95,
          payload: {
            text: 'Revenue declined',
            ticker: 'ACME',
            section: 'mdna',
            fiscal_year: 2023,
            page: null,
            chunk_index: 3,
            created_at: '2024-03-01T12:00:00.000Z',
          },
        },
      ]);
    });

    it('omits WHERE without filter or threshold', async () => {
      await store.search('sec_filings', { vector: [1, 0], filter: [], limit: 10 });
      const [sql, params] = mocks.poolQuery.mock.calls[0];
      expect(String(sql)).not.toContain('WHERE');
      expect(params).toEqual(['[1.000000,0.000000]', 10]);
    });
  });

  it('deletes by filter in one statement', async () => {
    await store.deleteByFilter('sec_filings', [
      { key: 'ticker', value: 'ACME' },
      { key: 'section', value: 'mdna' },
    ]);
    expect(mocks.poolQuery).toHaveBeenCalledWith(
      'DELETE FROM "sec_filings" WHERE ticker = $1 AND section = $2',
      ['ACME', 'mdna'],
    );
  });

  it('refuses an unconditional delete', async () => {
    await expect(store.deleteByFilter('sec_filings', [])).rejects.toBeInstanceOf(ValidationError);
  });

  it('close() ends the shared pool', async () => {
    await store.close();
    expect(pgClient.closePool).toHaveBeenCalledOnce();
  });
});
