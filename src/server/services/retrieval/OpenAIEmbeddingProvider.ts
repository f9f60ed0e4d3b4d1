import OpenAI from 'openai';
import { getEnv } from '../../config/env.js';
import { ExternalServiceError, ServiceConfigurationError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_TIMEOUTS, withTimeout } from '../../utils/withTimeout.js';
import type { EmbeddingProvider } from './EmbeddingProvider.js';

export interface OpenAIEmbeddingConfig {
  apiKey?: string;
  model: string;
  enabled: boolean;
  timeoutMs: number;
  /** Inputs per API call */
  batchSize: number;
}

// Embedding inputs are cut to stay well under the model's context window
const MAX_INPUT_CHARS = 8000;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private config: OpenAIEmbeddingConfig;
  private client: OpenAI | null = null;

  constructor(config?: Partial<OpenAIEmbeddingConfig>) {
    const env = getEnv();
    this.config = {
      apiKey: env.OPENAI_API_KEY,
      model: env.EMBEDDING_MODEL,
      enabled: env.EMBEDDING_ENABLED,
      timeoutMs: DEFAULT_TIMEOUTS.EMBEDDING,
      batchSize: 64,
      ...config,
    };
  }

  getName(): string {
    return `openai:${this.config.model}`;
  }

  async isAvailable(): Promise<boolean> {
    return this.config.enabled && Boolean(this.config.apiKey);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new ServiceConfigurationError('OpenAI embeddings', ['OPENAI_API_KEY']);
      }
      this.client = new OpenAI({ apiKey: this.config.apiKey });
    }
    return this.client;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    if (!vector) {
      throw new ExternalServiceError('OpenAI', 'Embedding response was empty', { model: this.config.model });
    }
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    const client = this.getClient();
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.config.batchSize) {
      const batch = texts.slice(start, start + this.config.batchSize).map(text => text.slice(0, MAX_INPUT_CHARS) || ' ');
      const response = await withTimeout(
        client.embeddings.create({ model: this.config.model, input: batch }),
        this.config.timeoutMs,
        'Embedding request'
      );
      if (response.data.length !== batch.length) {
        throw new ExternalServiceError('OpenAI', 'Embedding count does not match input count', {
          expected: batch.length,
          received: response.data.length,
        });
      }
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map(item => item.embedding));
    }

    logger.debug({ count: texts.length, model: this.config.model }, 'Computed embeddings');
    return vectors;
  }
}
