/**
 * Ranking stages as a tier chain. Each tier reports availability once, at
 * startup; the retrieval engine composes only the tiers that are available.
 */

import type { RankingStageName } from '../../contracts/types.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errorHandling.js';
import type { EmbeddingProvider } from './EmbeddingProvider.js';
import type { RerankProvider } from './RerankProvider.js';

const logger = createChildLogger({ component: 'RankingTiers' });

export interface RankingTier {
  readonly name: RankingStageName;
  isAvailable(): Promise<boolean>;
}

export interface ResolvedTiers {
  keyword: true;
  embedder: EmbeddingProvider | null;
  reranker: RerankProvider | null;
  stages: RankingStageName[];
}

class ProviderTier implements RankingTier {
  constructor(
    readonly name: RankingStageName,
    private readonly provider: { isAvailable(): Promise<boolean>; getName(): string } | null | undefined
  ) {}

  async isAvailable(): Promise<boolean> {
    if (!this.provider) {
      return false;
    }
    try {
      return await this.provider.isAvailable();
    } catch (error) {
      logger.warn({ tier: this.name, provider: this.provider.getName(), error: errorMessage(error) }, 'Availability check failed');
      return false;
    }
  }
}

/**
 * Resolve which optional tiers are usable. The keyword tier is always present.
 */
export async function resolveRankingTiers(
  embedder: EmbeddingProvider | null | undefined,
  reranker: RerankProvider | null | undefined
): Promise<ResolvedTiers> {
  const semanticTier = new ProviderTier('semantic', embedder);
  const rerankTier = new ProviderTier('rerank', reranker);
  const [semanticAvailable, rerankAvailable] = await Promise.all([semanticTier.isAvailable(), rerankTier.isAvailable()]);

  const stages: RankingStageName[] = ['keyword'];
  if (semanticAvailable) stages.push('semantic');
  if (rerankAvailable) stages.push('rerank');

  logger.info({ stages }, 'Ranking tiers resolved');
  return {
    keyword: true,
    embedder: semanticAvailable && embedder ? embedder : null,
    reranker: rerankAvailable && reranker ? reranker : null,
    stages,
  };
}
