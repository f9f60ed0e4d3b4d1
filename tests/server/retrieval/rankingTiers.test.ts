import { resolveRankingTiers } from '../../../src/server/services/retrieval/rankingTiers.js';
import type { EmbeddingProvider } from '../../../src/server/services/retrieval/EmbeddingProvider.js';
import type { RerankProvider } from '../../../src/server/services/retrieval/RerankProvider.js';

function embedder(available: boolean | Error): EmbeddingProvider {
  return {
    getName: () => 'test-embedder',
    isAvailable: async () => {
      if (available instanceof Error) throw available;
      return available;
    },
    embed: async () => [1],
    embedMany: async texts => texts.map(() => [1]),
  };
}

function reranker(available: boolean): RerankProvider {
  return {
    getName: () => 'test-reranker',
    isAvailable: async () => available,
    rerank: async (_query, texts) => texts.map(() => 0.5),
  };
}

describe('resolveRankingTiers', () => {
  it('always includes the keyword tier', async () => {
    const tiers = await resolveRankingTiers(null, undefined);

    expect(tiers).toEqual({ keyword: true, embedder: null, reranker: null, stages: ['keyword'] });
  });

  it('adds every available provider in stage order', async () => {
    const semantic = embedder(true);
    const rerank = reranker(true);

    const tiers = await resolveRankingTiers(semantic, rerank);

    expect(tiers.stages).toEqual(['keyword', 'semantic', 'rerank']);
    expect(tiers.embedder).toBe(semantic);
    expect(tiers.reranker).toBe(rerank);
  });

  it('skips providers that are unavailable or fail their check', async () => {
    const tiers = await resolveRankingTiers(embedder(new Error('no credentials')), reranker(false));

    expect(tiers.stages).toEqual(['keyword']);
    expect(tiers.embedder).toBeNull();
    expect(tiers.reranker).toBeNull();
  });
});
