// Postgres access for the ruvector backend: one shared pool, transactions, schema migrations

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, PoolClient } from 'pg';
import { createLogger } from '../logger.js';

const log = createLogger('pg-client');

const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations/', import.meta.url));

// Serializes migration runs across processes sharing one database
const MIGRATION_LOCK_KEY = 7_420_113;

export interface PgConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMax?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  statementTimeoutMs?: number;
}

let shared: Promise<Pool> | null = null;

async function openPool(config: PgConfig): Promise<Pool> {
  // Loaded on demand so the other backends never pull in pg
  const { default: pg } = await import('pg');
  const pool = new pg.Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.poolMax ?? 10,
    idleTimeoutMillis: config.idleTimeoutMs ?? 30_000,
    connectionTimeoutMillis: config.connectionTimeoutMs ?? 10_000,
    statement_timeout: config.statementTimeoutMs ?? 30_000,
    application_name: 'filing-vectors',
  });

  pool.on('error', (err) => {
    // An idle client died; drop the pool so the next caller reconnects
    log.warn('idle client error, discarding pool:', err.message);
    if (shared) {
      shared = null;
      pool.end().catch((endErr: Error) => log.debug('ending discarded pool:', endErr.message));
    }
  });

  pool.on('connect', (client) => {
    client.query('SET ruvector.ef_search = 100').catch((err: Error) => {
      log.warn('could not set ruvector.ef_search:', err.message);
    });
  });

  return pool;
}

/** The process-wide pool. The first caller's config wins until closePool(). */
export function getPool(config: PgConfig): Promise<Pool> {
  if (!shared) {
    shared = openPool(config).catch((err: unknown) => {
      shared = null;
      throw err;
    });
  }
  return shared;
}

export async function closePool(): Promise<void> {
  const pending = shared;
  shared = null;
  if (pending) {
    const pool = await pending;
    await pool.end();
  }
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client. Any rejection rolls back
 * and is rethrown unchanged. A client whose ROLLBACK fails is destroyed, not
 * returned to the pool.
 */
export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr: unknown) {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      log.warn('rollback failed, discarding client:', broken.message);
    }
    throw err;
  } finally {
    client.release(broken);
  }
}

/**
 * Apply every migrations/*.sql file not yet recorded in schema_migrations, in
 * file-name order. Returns the versions applied by this call.
 */
export async function runMigrations(config: PgConfig): Promise<string[]> {
  const pool = await getPool(config);
  const files = (await readdir(MIGRATIONS_DIR)).filter(f => f.endsWith('.sql')).sort();

  return withTransaction(pool, async (client) => {
    await client.query('SELECT pg_advisory_xact_lock($1)', [MIGRATION_LOCK_KEY]);
    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         version    TEXT PRIMARY KEY,
         applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
       )`,
    );
    const { rows } = await client.query<{ version: string }>('SELECT version FROM schema_migrations');
    const done = new Set(rows.map(r => r.version));

    const applied: string[] = [];
    for (const file of files) {
      const version = file.slice(0, -'.sql'.length);
      if (done.has(version)) continue;
      await client.query(await readFile(join(MIGRATIONS_DIR, file), 'utf-8'));
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
      log.info(`applied migration ${version}`);
      applied.push(version);
    }
    return applied;
  });
}

/** ruvector text literal, six decimals per component: `[0.100000,-0.250000]`. */
export function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.map(v => v.toFixed(6)).join(',')}]`;
}
