// In-memory vector store — exact cosine search, no external dependency
// Used by tests and by VECTOR_STORE_BACKEND=memory for local runs

import {
  CollectionExistsError,
  CollectionNotFoundError,
  DimensionMismatchError,
  ValidationError,
} from '../errors.js';
import type {
  ChunkRecord,
  CollectionInfo,
  CollectionSpec,
  FieldMatch,
  ScoredChunk,
} from '../types/chunks.js';
import type { StoreSearchRequest, VectorStore } from './vector-store.js';

interface MemoryCollection {
  spec: CollectionSpec;
  points: Map<string, ChunkRecord>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0, normA = 0, normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

function matches(record: ChunkRecord, filter: FieldMatch[]): boolean {
  return filter.every(c => record.payload[c.key] === c.value);
}

export class InMemoryVectorStore implements VectorStore {
  readonly backend = 'memory';
  private collections = new Map<string, MemoryCollection>();

  async listCollections(): Promise<string[]> {
    return [...this.collections.keys()];
  }

  async createCollection(name: string, spec: CollectionSpec): Promise<void> {
    if (this.collections.has(name)) throw new CollectionExistsError(name);
    if (!Number.isInteger(spec.dimension) || spec.dimension <= 0) {
      throw new ValidationError(`Collection dimension must be a positive integer, got ${spec.dimension}`);
    }
    this.collections.set(name, { spec: { ...spec }, points: new Map() });
  }

  async getCollection(name: string): Promise<CollectionInfo | null> {
    const collection = this.collections.get(name);
    if (!collection) return null;
    return {
      name,
      dimension: collection.spec.dimension,
      distance: collection.spec.distance,
      pointsCount: collection.points.size,
      vectorsCount: collection.points.size,
      status: 'green',
    };
  }

  async upsert(name: string, points: ChunkRecord[]): Promise<void> {
    const collection = this.require(name);
    // Whole batch is checked before anything is written
    for (const point of points) {
      if (point.vector.length !== collection.spec.dimension) {
        throw new DimensionMismatchError(collection.spec.dimension, point.vector.length, name);
      }
    }
    for (const point of points) {
      collection.points.set(point.id, {
        id: point.id,
        vector: [...point.vector],
        payload: { ...point.payload },
      });
    }
  }

  async search(name: string, request: StoreSearchRequest): Promise<ScoredChunk[]> {
    const collection = this.require(name);
    if (request.vector.length !== collection.spec.dimension) {
      throw new DimensionMismatchError(collection.spec.dimension, request.vector.length, name);
    }

    const threshold = request.scoreThreshold;
    return [...collection.points.values()]
      .filter(record => matches(record, request.filter))
      .map(record => ({
        id: record.id,
        score: cosineSimilarity(request.vector, record.vector),
        payload: { ...record.payload },
      }))
      .filter(r => threshold === undefined || r.score >= threshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, request.limit);
  }

  async deleteByFilter(name: string, filter: FieldMatch[]): Promise<void> {
    if (filter.length === 0) {
      throw new ValidationError('deleteByFilter requires at least one condition');
    }
    const collection = this.require(name);
    for (const [id, record] of collection.points) {
      if (matches(record, filter)) collection.points.delete(id);
    }
  }

  async close(): Promise<void> {
    // Nothing to release; contents survive so a reopened index sees the same data
  }

  private require(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) throw new CollectionNotFoundError(name);
    return collection;
  }
}
