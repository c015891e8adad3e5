// Chunk records — the unit of embedding and retrieval over filing text

import { z } from 'zod';

/**
 * Metadata supplied with each chunk at ingestion. Ticker and section are the
 * filter keys; absent values are stored as empty strings. Unknown keys are dropped.
 */
export const ChunkMetadataSchema = z.object({
  ticker: z.string().optional(),
  section: z.string().optional(),
  fiscal_year: z.number().int().nullable().optional(),
  page: z.number().int().nullable().optional(),
  chunk_index: z.number().int().nullable().optional(),
});

export type ChunkMetadata = z.input<typeof ChunkMetadataSchema>;
export type ParsedChunkMetadata = z.infer<typeof ChunkMetadataSchema>;

/** Stored alongside each vector. `created_at` is the ISO-8601 ingestion time. */
export const ChunkPayloadSchema = z.object({
  text: z.string(),
  ticker: z.string(),
  section: z.string(),
  fiscal_year: z.number().int().nullable(),
  page: z.number().int().nullable(),
  chunk_index: z.number().int().nullable(),
  created_at: z.string(),
});

export type ChunkPayload = z.infer<typeof ChunkPayloadSchema>;

export interface ChunkRecord {
  id: string;
  vector: number[];
  payload: ChunkPayload;
}

export interface ScoredChunk {
  id: string;
  score: number;
  payload: ChunkPayload;
}

export interface SearchResult {
  id: string;
  text: string;
  score: number;
  ticker: string;
  section: string;
  fiscal_year: number | null;
  page: number | null;
  chunk_index: number | null;
  created_at: string;
}

export type DistanceMetric = 'cosine';

export interface CollectionSpec {
  dimension: number;
  distance: DistanceMetric;
}

export type CollectionStatus = 'green' | 'yellow' | 'red' | 'grey';

export interface CollectionInfo {
  name: string;
  dimension: number;
  distance: DistanceMetric;
  pointsCount: number;
  vectorsCount: number;
  status: CollectionStatus;
}

export type FilterField = 'ticker' | 'section';

/** One equality condition; a filter is the AND of its conditions. */
export interface FieldMatch {
  key: FilterField;
  value: string;
}

export interface SearchFilterInput {
  ticker?: string;
  section?: string;
}

export function toSearchResult(chunk: ScoredChunk): SearchResult {
  return {
    id: chunk.id,
    text: chunk.payload.text,
    score: chunk.score,
    ticker: chunk.payload.ticker,
    section: chunk.payload.section,
    fiscal_year: chunk.payload.fiscal_year,
    page: chunk.payload.page,
    chunk_index: chunk.payload.chunk_index,
    created_at: chunk.payload.created_at,
  };
}

/** Empty or absent ticker/section are omitted, never wildcarded. */
export function buildFilter(input: SearchFilterInput): FieldMatch[] {
  const filter: FieldMatch[] = [];
  if (input.ticker) filter.push({ key: 'ticker', value: input.ticker });
  if (input.section) filter.push({ key: 'section', value: input.section });
  return filter;
}
