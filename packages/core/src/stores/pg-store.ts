// PgVectorStore — PostgreSQL-backed VectorStore via ruvector-postgres
// One table per collection with a ruvector(dim) column and HNSW cosine index;
// vector_collections records each collection's fixed dimension

import {
  CollectionExistsError,
  CollectionNotFoundError,
  DimensionMismatchError,
  ValidationError,
} from '../errors.js';
import { closePool, getPool, runMigrations, toVectorLiteral, withTransaction } from '../db/pg-client.js';
import type { PgConfig } from '../db/pg-client.js';
import type { Pool } from 'pg';
import { createLogger } from '../logger.js';
import type {
  ChunkRecord,
  CollectionInfo,
  CollectionSpec,
  FieldMatch,
  FilterField,
  ScoredChunk,
} from '../types/chunks.js';
import type { StoreSearchRequest, VectorStore } from './vector-store.js';

const log = createLogger('pg-store');

// Leaves room for the _filter_idx / _embedding_idx suffixes within 63 chars
const COLLECTION_NAME = /^[a-z_][a-z0-9_]{0,47}$/;

const FILTER_COLUMNS: Record<FilterField, string> = {
  ticker: 'ticker',
  section: 'section',
};

interface ChunkRow {
  id: string;
  text: string;
  ticker: string;
  section: string;
  fiscal_year: number | null;
  page: number | null;
  chunk_index: number | null;
  created_at: Date | string;
  score: number;
}

function quoteIdent(name: string): string {
  if (!COLLECTION_NAME.test(name)) {
    throw new ValidationError(
      `Invalid collection name "${name}" for postgres backend (lowercase letters, digits and _ only, max 48 chars)`,
    );
  }
  return `"${name}"`;
}

function pgErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function whereClause(filter: FieldMatch[], params: unknown[]): string[] {
  return filter.map(c => {
    params.push(c.value);
    return `${FILTER_COLUMNS[c.key]} = $${params.length}`;
  });
}

export class PgVectorStore implements VectorStore {
  readonly backend = 'postgres';
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly config: PgConfig) {}

  async listCollections(): Promise<string[]> {
    const pool = await this.pool();
    const { rows } = await pool.query<{ name: string }>(
      'SELECT name FROM vector_collections ORDER BY name',
    );
    return rows.map(r => r.name);
  }

  async createCollection(name: string, spec: CollectionSpec): Promise<void> {
    const table = quoteIdent(name);
    if (!Number.isInteger(spec.dimension) || spec.dimension <= 0) {
      throw new ValidationError(`Collection dimension must be a positive integer, got ${spec.dimension}`);
    }

    const pool = await this.pool();
    try {
      await withTransaction(pool, async (client) => {
        await client.query(
          'INSERT INTO vector_collections (name, dimension, distance) VALUES ($1, $2, $3)',
          [name, spec.dimension, spec.distance],
        );
        await client.query(`
          CREATE TABLE ${table} (
            id          UUID PRIMARY KEY,
            embedding   ruvector(${spec.dimension}) NOT NULL,
            text        TEXT NOT NULL,
            ticker      TEXT NOT NULL DEFAULT '',
            section     TEXT NOT NULL DEFAULT '',
            fiscal_year INTEGER,
            page        INTEGER,
            chunk_index INTEGER,
            created_at  TIMESTAMPTZ NOT NULL
          )
        `);
        await client.query(`CREATE INDEX "${name}_filter_idx" ON ${table} (ticker, section)`);
        await client.query(
          `CREATE INDEX "${name}_embedding_idx" ON ${table} USING hnsw (embedding ruvector_cosine_ops)`,
        );
      });
    } catch (err: unknown) {
      const code = pgErrorCode(err);
      // 23505 unique_violation on the registry, 42P07 duplicate_table
      if (code === '23505' || code === '42P07') {
        throw new CollectionExistsError(name, { cause: err });
      }
      throw err;
    }

    log.info(`created collection ${name} (dimension ${spec.dimension}, cosine)`);
  }

  async getCollection(name: string): Promise<CollectionInfo | null> {
    const table = quoteIdent(name);
    const pool = await this.pool();
    const { rows } = await pool.query<{ name: string; dimension: number }>(
      'SELECT name, dimension FROM vector_collections WHERE name = $1',
      [name],
    );
    if (rows.length === 0) return null;

    const { rows: counts } = await pool.query<{ count: number }>(
      `SELECT count(*)::int AS count FROM ${table}`,
    );
    const count = counts[0]?.count ?? 0;

    return {
      name,
      dimension: rows[0].dimension,
      distance: 'cosine',
      pointsCount: count,
      vectorsCount: count,
      status: 'green',
    };
  }

  async upsert(name: string, points: ChunkRecord[]): Promise<void> {
    const table = quoteIdent(name);
    if (points.length === 0) return;

    const pool = await this.pool();
    await withTransaction(pool, async (client) => {
      const { rows } = await client.query<{ dimension: number }>(
        'SELECT dimension FROM vector_collections WHERE name = $1',
        [name],
      );
      if (rows.length === 0) throw new CollectionNotFoundError(name);
      const dimension = rows[0].dimension;
      const bad = points.find(p => p.vector.length !== dimension);
      if (bad) throw new DimensionMismatchError(dimension, bad.vector.length, name);

      for (const point of points) {
        const p = point.payload;
        await client.query(
          `INSERT INTO ${table}
             (id, embedding, text, ticker, section, fiscal_year, page, chunk_index, created_at)
           VALUES ($1, $2::ruvector, $3, $4, $5, $6, $7, $8, $9)
           ON CONFLICT (id) DO UPDATE SET
             embedding = EXCLUDED.embedding,
             text = EXCLUDED.text,
             ticker = EXCLUDED.ticker,
             section = EXCLUDED.section,
             fiscal_year = EXCLUDED.fiscal_year,
             page = EXCLUDED.page,
             chunk_index = EXCLUDED.chunk_index,
             created_at = EXCLUDED.created_at`,
          [
            point.id,
            toVectorLiteral(point.vector),
            p.text,
            p.ticker,
            p.section,
            p.fiscal_year,
            p.page,
            p.chunk_index,
            p.created_at,
          ],
        );
      }
    });
  }

  async search(name: string, request: StoreSearchRequest): Promise<ScoredChunk[]> {
    const table = quoteIdent(name);
    const params: unknown[] = [toVectorLiteral(request.vector)];
    const conditions = whereClause(request.filter, params);
    if (request.scoreThreshold !== undefined) {
      params.push(request.scoreThreshold);
      conditions.push(`1 - (embedding <=> $1::ruvector) >= $${params.length}`);
    }
    params.push(request.limit);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const pool = await this.pool();
    const { rows } = await pool.query<ChunkRow>(
      `SELECT id, text, ticker, section, fiscal_year, page, chunk_index, created_at,
              1 - (embedding <=> $1::ruvector) AS score
       FROM ${table}
       ${where}
       ORDER BY embedding <=> $1::ruvector, id
       LIMIT $${params.length}`,
      params,
    );

    return rows.map(r => ({
      id: r.id,
      score: Number(r.score),
      payload: {
        text: r.text,
        ticker: r.ticker,
        section: r.section,
        fiscal_year: r.fiscal_year,
        page: r.page,
        chunk_index: r.chunk_index,
        created_at: r.created_at instanceof Date ? r.created_at.toISOString() : r.created_at,
      },
    }));
  }

  async deleteByFilter(name: string, filter: FieldMatch[]): Promise<void> {
    const table = quoteIdent(name);
    if (filter.length === 0) {
      throw new ValidationError('deleteByFilter requires at least one condition');
    }
    const params: unknown[] = [];
    const conditions = whereClause(filter, params);
    const pool = await this.pool();
    const result = await pool.query(
      `DELETE FROM ${table} WHERE ${conditions.join(' AND ')}`,
      params,
    );
    log.debug(`deleted ${result.rowCount ?? 0} rows from ${name}`);
  }

  async close(): Promise<void> {
    this.schemaReady = null;
    await closePool();
  }

  private async pool(): Promise<Pool> {
    if (!this.schemaReady) {
      this.schemaReady = runMigrations(this.config)
        .then(() => undefined)
        .catch((err: unknown) => {
          this.schemaReady = null;
          throw err;
        });
    }
    await this.schemaReady;
    return getPool(this.config);
  }
}
