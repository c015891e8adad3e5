// Backend factory — selects the vector store and embedding provider from Settings
// Each backend module is imported here on first use rather than at startup

import type { EmbeddingProvider } from '../embeddings/provider.js';
import type { VectorStore } from '../stores/vector-store.js';
import type { Settings } from './settings.js';

/**
 * - `qdrant`: QdrantVectorStore (REST client)
 * - `postgres`: PgVectorStore (ruvector-postgres)
 * - `memory`: InMemoryVectorStore (process-local, lost on exit)
 */
export async function createVectorStore(settings: Settings): Promise<VectorStore> {
  const { backend, qdrant, postgres, timeoutMs } = settings.vectorStore;

  switch (backend) {
    case 'postgres': {
      const { PgVectorStore } = await import('../stores/pg-store.js');
      return new PgVectorStore(postgres);
    }
    case 'memory': {
      const { InMemoryVectorStore } = await import('../stores/memory-store.js');
      return new InMemoryVectorStore();
    }
    case 'qdrant':
    default: {
      const { QdrantVectorStore } = await import('../stores/qdrant-store.js');
      return new QdrantVectorStore({ url: qdrant.url, apiKey: qdrant.apiKey, timeoutMs });
    }
  }
}

/**
 * - `openai`: OpenAIEmbeddingProvider (any OpenAI-compatible /embeddings endpoint)
 * - `hashing`: HashingEmbeddingProvider (local, lexical)
 */
export async function createEmbeddingProvider(settings: Settings): Promise<EmbeddingProvider> {
  const { provider, model, baseURL, apiKey, dimensions } = settings.embedding;

  switch (provider) {
    case 'hashing': {
      const { HashingEmbeddingProvider } = await import('../embeddings/hashing-provider.js');
      return new HashingEmbeddingProvider(dimensions);
    }
    case 'openai':
    default: {
      const { OpenAIEmbeddingProvider } = await import('../embeddings/openai-provider.js');
      return new OpenAIEmbeddingProvider({
        apiKey,
        model,
        baseURL,
        timeoutMs: settings.vectorStore.timeoutMs,
      });
    }
  }
}
