// OpenAI-compatible embeddings — one /embeddings request per batch
// baseURL points the client at any compatible server (vLLM, Ollama, TEI gateways)

import OpenAI from 'openai';
import { ConfigurationError } from '../errors.js';
import { createLogger } from '../logger.js';
import { validateEmbeddingBatch } from './embedding-guard.js';
import type { EmbeddingProvider } from './provider.js';

const log = createLogger('openai-embeddings');

export interface OpenAIEmbeddingConfig {
  apiKey?: string;
  model: string;
  baseURL?: string;
  timeoutMs?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private client: OpenAI;

  constructor(config: OpenAIEmbeddingConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is required for the openai embedding provider');
    }
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      // Retry policy is the caller's concern
      maxRetries: 0,
    });
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const started = Date.now();
    const response = await this.client.embeddings.create({
      model: this.model,
      input: [...texts],
    });

    // Rows carry their input position; order by it rather than trusting response order
    const vectors = [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(d => d.embedding);

    validateEmbeddingBatch(texts, vectors);
    log.debug(`embedded ${texts.length} texts with ${this.model} in ${Date.now() - started}ms`);
    return vectors;
  }
}
