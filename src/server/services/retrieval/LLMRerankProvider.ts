import { z } from 'zod';
import { getEnv } from '../../config/env.js';
import { ExternalServiceError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_TIMEOUTS, withTimeout } from '../../utils/withTimeout.js';
import { extractJsonPayload, type LLMProvider } from '../llm/LLMProvider.js';
import type { RerankProvider } from './RerankProvider.js';

export interface LLMRerankConfig {
  enabled: boolean;
  model: string;
  timeoutMs: number;
  snippetLength: number;
}

const rerankResponseSchema = z.object({
  scores: z.array(
    z.object({
      index: z.number().int().min(0),
      score: z.number().min(0).max(1),
    })
  ),
});

/**
 * Reranker that asks a chat model to score every candidate in one call
 */
export class LLMRerankProvider implements RerankProvider {
  private config: LLMRerankConfig;

  constructor(private readonly llmProvider: LLMProvider, config?: Partial<LLMRerankConfig>) {
    const env = getEnv();
    this.config = {
      enabled: env.RERANKER_ENABLED,
      model: env.RERANKER_MODEL,
      timeoutMs: DEFAULT_TIMEOUTS.RERANK,
      snippetLength: 600,
      ...config,
    };
  }

  getName(): string {
    return `llm-rerank:${this.llmProvider.getName()}`;
  }

  async isAvailable(): Promise<boolean> {
    if (!this.config.enabled) {
      return false;
    }
    return this.llmProvider.isAvailable();
  }

  async rerank(query: string, texts: string[]): Promise<number[]> {
    if (texts.length === 0) {
      return [];
    }

    const documentsText = texts
      .map((text, index) => `Document ${index}:\n${text.slice(0, this.config.snippetLength)}`)
      .join('\n\n');

    const prompt = `Rate how well each document answers the query on a scale of 0.0 to 1.0.

Query: "${query}"

Documents:
${documentsText}

Consider whether the document directly addresses the query and whether its information is specific.

Respond in the following JSON format, with one entry per document:
{
  "scores": [
    { "index": 0, "score": 0.75 },
    { "index": 1, "score": 0.2 }
  ]
}`;

    const response = await withTimeout(
      this.llmProvider.generate(
        [
          {
            role: 'system',
            content: 'You are a relevance scorer for immigration programme information. Respond with JSON only.',
          },
          { role: 'user', content: prompt },
        ],
        { model: this.config.model, temperature: 0, maxTokens: 50 + texts.length * 20, json: true }
      ),
      this.config.timeoutMs,
      'Rerank request'
    );

    const parsed = rerankResponseSchema.safeParse(JSON.parse(extractJsonPayload(response.content)));
    if (!parsed.success) {
      throw new ExternalServiceError(this.llmProvider.getName(), 'Reranker returned an invalid shape', {
        issues: parsed.error.issues.length,
      });
    }

    const scores = new Map<number, number>();
    for (const entry of parsed.data.scores) {
      scores.set(entry.index, entry.score);
    }
    const result = texts.map((_, index) => scores.get(index));
    const missing = result.filter(score => score === undefined).length;
    if (missing > 0) {
      throw new ExternalServiceError(this.llmProvider.getName(), 'Reranker skipped candidates', { missing });
    }

    logger.debug({ count: texts.length, model: response.model }, 'Reranked candidate pool');
    return result.map(score => score ?? 0);
  }
}
