// Settings — environment variables parsed once into typed configuration

import { z } from 'zod';
import type { PgConfig } from '../db/pg-client.js';
import { ConfigurationError } from '../errors.js';
import type { LogLevel } from '../logger.js';

export const VECTOR_STORE_BACKENDS = ['qdrant', 'postgres', 'memory'] as const;
export type VectorStoreBackend = (typeof VECTOR_STORE_BACKENDS)[number];

export const EMBEDDING_PROVIDERS = ['openai', 'hashing'] as const;
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

const lower = (v: unknown) => (typeof v === 'string' ? v.toLowerCase() : v);

const EnvSchema = z.object({
  VECTOR_STORE_BACKEND: z.preprocess(lower, z.enum(VECTOR_STORE_BACKENDS)).default('qdrant'),
  QDRANT_URL: z.string().url().optional(),
  QDRANT_HOST: z.string().default('localhost'),
  QDRANT_PORT: z.coerce.number().int().min(1).max(65535).default(6333),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION_NAME: z.string().min(1).default('sec_filings'),
  VECTOR_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  PG_HOST: z.string().default('localhost'),
  PG_PORT: z.coerce.number().int().min(1).max(65535).default(5433),
  PG_USER: z.string().default('filings'),
  PG_PASSWORD: z.string().default('filings_dev_pass'),
  PG_DATABASE: z.string().default('filings'),

  EMBEDDING_PROVIDER: z.preprocess(lower, z.enum(EMBEDDING_PROVIDERS)).default('openai'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_BASE_URL: z.string().url().optional(),
  OPENAI_API_KEY: z.string().optional(),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),

  INGEST_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  SEARCH_TOP_K: z.coerce.number().int().positive().default(5),
  SEARCH_SCORE_THRESHOLD: z.coerce.number().finite().default(0.7),
  LOG_LEVEL: z
    .preprocess(lower, z.enum(['debug', 'info', 'warn', 'error', 'silent']))
    .default('info'),
});

export interface Settings {
  vectorStore: {
    backend: VectorStoreBackend;
    collectionName: string;
    timeoutMs: number;
    qdrant: { url: string; apiKey?: string };
    postgres: PgConfig;
  };
  embedding: {
    provider: EmbeddingProviderName;
    model: string;
    baseURL?: string;
    apiKey?: string;
    /** Output size of the hashing provider. */
    dimensions: number;
  };
  ingestion: { batchSize: number };
  search: { topK: number; scoreThreshold: number };
  logLevel: LogLevel;
}

/**
 * Parse settings from `env`. Empty strings count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    vectorStore: {
      backend: e.VECTOR_STORE_BACKEND,
      collectionName: e.QDRANT_COLLECTION_NAME,
      timeoutMs: e.VECTOR_STORE_TIMEOUT_MS,
      qdrant: {
        url: e.QDRANT_URL ?? `http://${e.QDRANT_HOST}:${e.QDRANT_PORT}`,
        apiKey: e.QDRANT_API_KEY,
      },
      postgres: {
        host: e.PG_HOST,
        port: e.PG_PORT,
        user: e.PG_USER,
        password: e.PG_PASSWORD,
        database: e.PG_DATABASE,
        statementTimeoutMs: e.VECTOR_STORE_TIMEOUT_MS,
      },
    },
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      baseURL: e.EMBEDDING_BASE_URL,
      apiKey: e.OPENAI_API_KEY,
      dimensions: e.EMBEDDING_DIMENSIONS,
    },
    ingestion: { batchSize: e.INGEST_BATCH_SIZE },
    search: { topK: e.SEARCH_TOP_K, scoreThreshold: e.SEARCH_SCORE_THRESHOLD },
    logLevel: e.LOG_LEVEL,
  };
}
