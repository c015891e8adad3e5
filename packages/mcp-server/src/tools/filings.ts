import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ValidationError } from "@filing-vectors/core";
import type { FilingVectorIndex } from "@filing-vectors/core";
import type { z } from "zod";
import {
  DeleteTickerSchema,
  HybridSearchSchema,
  IngestSchema,
  SearchSchema,
} from "../schemas/filings.js";
import { wrapError, wrapResponse } from "../formatters/response.js";

function parseArgs<T extends z.ZodTypeAny>(schema: T, params: unknown): z.infer<T> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid arguments: ${issues}`);
  }
  return parsed.data;
}

export async function ingestFilings(index: FilingVectorIndex, params: unknown) {
  const { documents, batch_size } = parseArgs(IngestSchema, params);
  const upserted = await index.upsertDocuments(
    documents.map(d => d.text),
    documents.map(d => d.metadata),
    batch_size,
  );
  return { upserted, collection: index.collectionName };
}

export async function searchFilings(index: FilingVectorIndex, params: unknown) {
  const { query, ticker, section, top_k, score_threshold } = parseArgs(SearchSchema, params);
  const results = await index.search(query, { ticker, section, topK: top_k, scoreThreshold: score_threshold });
  return { query, count: results.length, results };
}

export async function hybridSearchFilings(index: FilingVectorIndex, params: unknown) {
  const { query, keywords, ticker, section, top_k } = parseArgs(HybridSearchSchema, params);
  const results = await index.hybridSearch(query, keywords, { ticker, section, topK: top_k });
  return { query, keywords, count: results.length, results };
}

export async function deleteTickerFilings(index: FilingVectorIndex, params: unknown) {
  const { ticker } = parseArgs(DeleteTickerSchema, params);
  return { ticker, deleted: await index.deleteByTicker(ticker) };
}

export async function collectionInfo(index: FilingVectorIndex) {
  return { collection: index.collectionName, info: await index.getCollectionInfo() };
}

export async function healthStatus(index: FilingVectorIndex) {
  return { healthy: await index.healthCheck() };
}

async function run(fn: () => Promise<unknown>) {
  try {
    return wrapResponse(await fn());
  } catch (err: unknown) {
    return wrapError(err);
  }
}

export function registerFilingTools(server: McpServer, index: FilingVectorIndex) {
  server.tool(
    "filings_ingest",
    "Embed filing text chunks and store them with ticker, section, fiscal year, page and chunk index metadata. Re-ingesting the same chunk overwrites it. Returns the number of chunks written.",
    IngestSchema.shape,
    async (params) => run(() => ingestFilings(index, params)),
  );

  server.tool(
    "filings_search",
    "Semantic search over ingested filing chunks. Optionally restrict to a ticker and/or section. Returns chunks ranked by cosine similarity, none below the score threshold.",
    SearchSchema.shape,
    async (params) => run(() => searchFilings(index, params)),
  );

  server.tool(
    "filings_hybrid_search",
    "Semantic search that keeps only chunks containing at least one of the given keywords (case-insensitive). Over-fetches twice the requested count, so fewer than top_k results may come back.",
    HybridSearchSchema.shape,
    async (params) => run(() => hybridSearchFilings(index, params)),
  );

  server.tool(
    "filings_delete_ticker",
    "Delete every stored chunk for a ticker. Returns deleted=false when the vector store rejected the delete.",
    DeleteTickerSchema.shape,
    async (params) => run(() => deleteTickerFilings(index, params)),
  );

  server.tool(
    "filings_collection_info",
    "Report the filing collection's dimension, distance, point count and status. info is null when the store cannot answer.",
    async () => run(() => collectionInfo(index)),
  );

  server.tool(
    "filings_health",
    "Check that the vector store is reachable.",
    async () => run(() => healthStatus(index)),
  );
}
