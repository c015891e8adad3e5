import { z } from "zod";

const optionalInt = z.coerce.number().int().nullable().optional();

export const ChunkMetadataInputSchema = z.object({
  ticker: z.string().optional().describe("Company ticker symbol (e.g., ACME)"),
  section: z.string().optional().describe("Filing section (e.g., risk_factors, mdna)"),
  fiscal_year: optionalInt.describe("Fiscal year the filing covers"),
  page: optionalInt.describe("Page number in the source document"),
  chunk_index: optionalInt.describe("Position of the chunk within its section"),
});

export const IngestSchema = z.object({
  documents: z
    .array(
      z.object({
        text: z.string().min(1).describe("Chunk text"),
        metadata: ChunkMetadataInputSchema.default({}),
      }),
    )
    .min(1)
    .max(1000)
    .describe("Filing chunks to embed and store"),
  batch_size: z.coerce.number().int().min(1).max(1000).optional().describe("Chunks per embedding request"),
});

const FilterFields = {
  ticker: z.string().optional().describe("Only return chunks for this ticker"),
  section: z.string().optional().describe("Only return chunks from this section"),
};

export const SearchSchema = z.object({
  query: z.string().min(1).describe("Natural-language search query"),
  ...FilterFields,
  top_k: z.coerce.number().int().min(1).max(100).optional().describe("Maximum number of results"),
  score_threshold: z.coerce
    .number()
    .min(-1)
    .max(1)
    .optional()
    .describe("Minimum cosine similarity (default from SEARCH_SCORE_THRESHOLD)"),
});

export const HybridSearchSchema = z.object({
  query: z.string().min(1).describe("Natural-language search query"),
  keywords: z.array(z.string()).min(1).describe("Keep only chunks containing at least one of these (case-insensitive)"),
  ...FilterFields,
  top_k: z.coerce.number().int().min(1).max(100).optional().describe("Maximum number of results"),
});

export const DeleteTickerSchema = z.object({
  ticker: z.string().min(1).describe("Ticker whose chunks should be removed"),
});

export type IngestInput = z.infer<typeof IngestSchema>;
export type SearchInput = z.infer<typeof SearchSchema>;
export type HybridSearchInput = z.infer<typeof HybridSearchSchema>;
export type DeleteTickerInput = z.infer<typeof DeleteTickerSchema>;
