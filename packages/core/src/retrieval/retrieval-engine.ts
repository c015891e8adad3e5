// Retrieval Engine — filtered semantic search and two-stage hybrid search
// Hybrid = over-fetch semantically, keep keyword hits, truncate. No rank fusion
// and no second fetch: a short result set is an accepted outcome.

import { callBoundary } from '../boundary.js';
import type { CollectionManager } from '../collections/collection-manager.js';
import { DimensionMismatchError, ValidationError } from '../errors.js';
import type { EmbeddingProvider } from '../embeddings/provider.js';
import { createLogger } from '../logger.js';
import type { VectorStore } from '../stores/vector-store.js';
import { buildFilter, toSearchResult } from '../types/chunks.js';
import type { FieldMatch, SearchFilterInput, SearchResult } from '../types/chunks.js';

const log = createLogger('retrieval');

export const DEFAULT_TOP_K = 5;
export const DEFAULT_SCORE_THRESHOLD = 0.7;
/** Candidates fetched per requested hybrid result. */
export const HYBRID_OVERFETCH_FACTOR = 2;

export interface SearchOptions extends SearchFilterInput {
  topK?: number;
  scoreThreshold?: number;
}

export interface HybridSearchOptions extends SearchFilterInput {
  topK?: number;
}

export interface RetrievalEngineDeps {
  store: VectorStore;
  embedder: EmbeddingProvider;
  collections: CollectionManager;
  collectionName: string;
  defaults?: { topK?: number; scoreThreshold?: number };
}

function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new ValidationError(`topK must be a positive integer, got ${topK}`);
  }
}

/** Keep results containing any keyword, case-insensitively. Order is preserved. */
export function filterByKeywords(results: SearchResult[], keywords: readonly string[]): SearchResult[] {
  const needles = keywords.map(k => k.toLowerCase());
  return results.filter(r => {
    const haystack = r.text.toLowerCase();
    return needles.some(k => haystack.includes(k));
  });
}

export class RetrievalEngine {
  private readonly topK: number;
  private readonly scoreThreshold: number;

  constructor(private readonly deps: RetrievalEngineDeps) {
    this.topK = deps.defaults?.topK ?? DEFAULT_TOP_K;
    this.scoreThreshold = deps.defaults?.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;
  }

  /**
   * Top-K chunks by cosine similarity, restricted to the ticker/section given,
   * best first, none below the score threshold.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const topK = options.topK ?? this.topK;
    const scoreThreshold = options.scoreThreshold ?? this.scoreThreshold;
    assertTopK(topK);
    if (!Number.isFinite(scoreThreshold)) {
      throw new ValidationError(`scoreThreshold must be a finite number, got ${scoreThreshold}`);
    }

    const results = await this.semantic(query, buildFilter(options), topK, scoreThreshold);
    log.info(`Search returned ${results.length} results for query: '${query.slice(0, 50)}'`);
    return results;
  }

  /**
   * Semantic search for HYBRID_OVERFETCH_FACTOR × topK candidates with no threshold,
   * then keep those whose text contains at least one keyword, truncated to topK.
   */
  async hybridSearch(
    query: string,
    keywords: readonly string[],
    options: HybridSearchOptions = {},
  ): Promise<SearchResult[]> {
    const topK = options.topK ?? this.topK;
    assertTopK(topK);

    const candidates = await this.semantic(query, buildFilter(options), topK * HYBRID_OVERFETCH_FACTOR);
    const results = filterByKeywords(candidates, keywords).slice(0, topK);
    log.info(
      `Hybrid search kept ${results.length} of ${candidates.length} candidates for query: '${query.slice(0, 50)}'`,
    );
    return results;
  }

  private async semantic(
    query: string,
    filter: FieldMatch[],
    limit: number,
    scoreThreshold?: number,
  ): Promise<SearchResult[]> {
    const { store, embedder, collections, collectionName } = this.deps;
    const collection = await collections.ensureCollection(collectionName);
    const context = { collection: collectionName, filter, limit };

    const vector = await callBoundary(log, 'embed query', { ...context, model: embedder.model }, () =>
      embedder.embed(query),
    );
    if (vector.length !== collection.dimension) {
      throw new DimensionMismatchError(collection.dimension, vector.length, collectionName);
    }

    const hits = await callBoundary(log, 'search', context, () =>
      store.search(collectionName, { vector, filter, limit, scoreThreshold }),
    );

    // Array.prototype.sort is stable, so equal scores keep the store's order
    return hits
      .filter(h => scoreThreshold === undefined || h.score >= scoreThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(toSearchResult);
  }
}
