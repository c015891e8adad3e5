// QdrantVectorStore — Qdrant REST backend; ticker/section filters become must/match conditions

import { QdrantClient } from '@qdrant/js-client-rest';
import {
  CollectionExistsError,
  CollectionNotFoundError,
  ValidationError,
} from '../errors.js';
import { createLogger } from '../logger.js';
import { ChunkPayloadSchema } from '../types/chunks.js';
import type {
  ChunkRecord,
  CollectionInfo,
  CollectionSpec,
  CollectionStatus,
  FieldMatch,
  ScoredChunk,
} from '../types/chunks.js';
import type { StoreSearchRequest, VectorStore } from './vector-store.js';

const log = createLogger('qdrant-store');

export interface QdrantStoreConfig {
  url: string;
  apiKey?: string;
  timeoutMs: number;
}

function toQdrantFilter(filter: FieldMatch[]) {
  return {
    must: filter.map(c => ({ key: c.key, match: { value: c.value } })),
  };
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function isAlreadyExists(err: unknown): boolean {
  if (httpStatus(err) === 409) return true;
  return err instanceof Error && /already exists/i.test(err.message);
}

function toStatus(value: string): CollectionStatus {
  switch (value) {
    case 'green':
    case 'yellow':
    case 'red':
    case 'grey':
      return value;
    default:
      return 'grey';
  }
}

export class QdrantVectorStore implements VectorStore {
  readonly backend = 'qdrant';
  private client: QdrantClient;

  constructor(config: QdrantStoreConfig) {
    this.client = new QdrantClient({
      url: config.url,
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      checkCompatibility: false,
    });
  }

  async listCollections(): Promise<string[]> {
    const { collections } = await this.client.getCollections();
    return collections.map(c => c.name);
  }

  async createCollection(name: string, spec: CollectionSpec): Promise<void> {
    try {
      await this.client.createCollection(name, {
        vectors: { size: spec.dimension, distance: 'Cosine' },
      });
    } catch (err: unknown) {
      if (isAlreadyExists(err)) throw new CollectionExistsError(name, { cause: err });
      throw err;
    }
    log.info(`created collection ${name} (dimension ${spec.dimension}, cosine)`);
  }

  async getCollection(name: string): Promise<CollectionInfo | null> {
    let info: Awaited<ReturnType<QdrantClient['getCollection']>>;
    try {
      info = await this.client.getCollection(name);
    } catch (err: unknown) {
      if (httpStatus(err) === 404) return null;
      throw err;
    }

    const vectors = info.config.params.vectors;
    const size = vectors && 'size' in vectors && typeof vectors.size === 'number' ? vectors.size : 0;
    const points = info.points_count ?? 0;

    return {
      name,
      dimension: size,
      distance: 'cosine',
      pointsCount: points,
      vectorsCount: info.indexed_vectors_count ?? points,
      status: toStatus(info.status),
    };
  }

  async upsert(name: string, points: ChunkRecord[]): Promise<void> {
    if (points.length === 0) return;
    await this.client.upsert(name, {
      wait: true,
      points: points.map(p => ({
        id: p.id,
        vector: p.vector,
        payload: {
          text: p.payload.text,
          ticker: p.payload.ticker,
          section: p.payload.section,
          fiscal_year: p.payload.fiscal_year,
          page: p.payload.page,
          chunk_index: p.payload.chunk_index,
          created_at: p.payload.created_at,
        },
      })),
    });
  }

  async search(name: string, request: StoreSearchRequest): Promise<ScoredChunk[]> {
    let hits: Awaited<ReturnType<QdrantClient['search']>>;
    try {
      hits = await this.client.search(name, {
        vector: request.vector,
        filter: request.filter.length > 0 ? toQdrantFilter(request.filter) : undefined,
        limit: request.limit,
        score_threshold: request.scoreThreshold,
        with_payload: true,
      });
    } catch (err: unknown) {
      if (httpStatus(err) === 404) throw new CollectionNotFoundError(name);
      throw err;
    }

    const results: ScoredChunk[] = [];
    for (const hit of hits) {
      const parsed = ChunkPayloadSchema.safeParse(hit.payload);
      if (!parsed.success) {
        log.warn(`skipping point ${String(hit.id)} with malformed payload`, parsed.error.issues);
        continue;
      }
      results.push({ id: String(hit.id), score: hit.score, payload: parsed.data });
    }
    return results;
  }

  async deleteByFilter(name: string, filter: FieldMatch[]): Promise<void> {
    if (filter.length === 0) {
      throw new ValidationError('deleteByFilter requires at least one condition');
    }
    await this.client.delete(name, {
      wait: true,
      filter: toQdrantFilter(filter),
    });
  }

  async close(): Promise<void> {
    // The REST client holds no persistent connections
  }
}
