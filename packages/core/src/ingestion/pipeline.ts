// Ingestion Pipeline — batch embed + upsert of filing chunks
// Batches run in order; the first failed batch aborts the call

import { callBoundary, toFilingIndexError } from '../boundary.js';
import type { CollectionManager } from '../collections/collection-manager.js';
import { DimensionMismatchError, EmbeddingError, IngestionError, ValidationError } from '../errors.js';
import type { EmbeddingProvider } from '../embeddings/provider.js';
import { deriveChunkId } from '../identity/chunk-id.js';
import { createLogger } from '../logger.js';
import type { VectorStore } from '../stores/vector-store.js';
import { ChunkMetadataSchema } from '../types/chunks.js';
import type { ChunkMetadata, ChunkRecord, ParsedChunkMetadata } from '../types/chunks.js';

const log = createLogger('ingestion');

export const DEFAULT_BATCH_SIZE = 100;

export interface IngestionPipelineDeps {
  store: VectorStore;
  embedder: EmbeddingProvider;
  collections: CollectionManager;
  collectionName: string;
  /** Source of ingestion timestamps. */
  clock?: () => Date;
}

export function buildChunkRecord(
  text: string,
  metadata: ParsedChunkMetadata,
  vector: number[],
  createdAt: string,
): ChunkRecord {
  return {
    id: deriveChunkId(text, metadata),
    vector,
    payload: {
      text,
      ticker: metadata.ticker ?? '',
      section: metadata.section ?? '',
      fiscal_year: metadata.fiscal_year ?? null,
      page: metadata.page ?? null,
      chunk_index: metadata.chunk_index ?? null,
      created_at: createdAt,
    },
  };
}

export class IngestionPipeline {
  private readonly clock: () => Date;

  constructor(private readonly deps: IngestionPipelineDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Embed and upsert chunks in batches.
   *
   * Inputs are validated before any I/O. Returns the number of records written.
   *
   * @throws ValidationError on mismatched lengths, a bad batch size or malformed metadata
   * @throws IngestionError when a batch fails; carries the batch index and the count
   *   written by earlier batches
   */
  async upsertDocuments(
    texts: readonly string[],
    metadatas: readonly ChunkMetadata[],
    batchSize = DEFAULT_BATCH_SIZE,
  ): Promise<number> {
    if (texts.length !== metadatas.length) {
      throw new ValidationError(
        `texts and metadatas must have the same length (got ${texts.length} and ${metadatas.length})`,
      );
    }
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new ValidationError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    const parsed: ParsedChunkMetadata[] = metadatas.map((m, i) => {
      const result = ChunkMetadataSchema.safeParse(m);
      if (!result.success) {
        const issues = result.error.issues.map(iss => `${iss.path.join('.')}: ${iss.message}`).join('; ');
        throw new ValidationError(`metadata[${i}] is invalid: ${issues}`);
      }
      return result.data;
    });

    if (texts.length === 0) return 0;

    const { store, embedder, collections, collectionName } = this.deps;
    const collection = await collections.ensureCollection(collectionName);

    let upserted = 0;
    for (let start = 0, batchIndex = 0; start < texts.length; start += batchSize, batchIndex++) {
      const batchTexts = texts.slice(start, start + batchSize);
      const batchMetadata = parsed.slice(start, start + batchSize);
      const context = { collection: collectionName, batch: batchIndex + 1, size: batchTexts.length };

      try {
        const vectors = await callBoundary(log, 'embed batch', { ...context, model: embedder.model }, () =>
          embedder.embedBatch(batchTexts),
        );

        if (vectors.length !== batchTexts.length) {
          throw new EmbeddingError(
            `Embedding backend returned ${vectors.length} vectors for ${batchTexts.length} inputs`,
          );
        }
        for (const vector of vectors) {
          if (vector.length !== collection.dimension) {
            throw new DimensionMismatchError(collection.dimension, vector.length, collectionName);
          }
        }

        const createdAt = this.clock().toISOString();
        const points = batchTexts.map((text, i) =>
          buildChunkRecord(text, batchMetadata[i], vectors[i], createdAt),
        );

        await callBoundary(log, 'upsert batch', context, () => store.upsert(collectionName, points));

        upserted += points.length;
        log.info(`Upserted batch ${batchIndex + 1}: ${points.length} documents`);
      } catch (err: unknown) {
        const reason = toFilingIndexError('upsert documents', err);
        log.error(`Ingestion aborted at batch ${batchIndex + 1} after ${upserted} records`, {
          ...context,
          kind: reason.kind,
        });
        throw new IngestionError(batchIndex, upserted, reason);
      }
    }

    log.info(`Successfully upserted ${upserted} documents`);
    return upserted;
  }
}
