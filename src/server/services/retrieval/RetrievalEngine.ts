import { getEnv } from '../../config/env.js';
import { defaultExtractionConfig, type ClassificationConfig } from '../../config/extraction/extractionConfig.js';
import type {
  ContextBundle,
  ContextItem,
  ProvenanceType,
  RankingStageName,
  StoredDocument,
  StoredRecord,
} from '../../contracts/types.js';
import { errorMessage } from '../../utils/errorHandling.js';
import { createChildLogger } from '../../utils/logger.js';
import { extractTerms } from '../../utils/textTerms.js';
import type { ContentStore } from '../content/ContentStore.js';
import { renderContext } from './ContextRenderer.js';
import type { EmbeddingProvider } from './EmbeddingProvider.js';
import { cosineSimilarity, keywordOverlap } from './keywordScorer.js';
import { resolveQueryFilter } from './QueryFilter.js';
import { resolveRankingTiers, type ResolvedTiers } from './rankingTiers.js';
import type { RerankProvider } from './RerankProvider.js';

const logger = createChildLogger({ component: 'RetrievalEngine' });

export interface RetrievalConfig {
  semanticWeight: number;
  keywordWeight: number;
  rerankPoolSize: number;
  maxItems: number;
  tokenBudget: number;
  /** Characters of document text shown for uncategorized documents */
  excerptLength: number;
}

export interface RetrieveOptions {
  topic?: string;
  category?: string;
  maxItems?: number;
}

export type RetrievalStore = Pick<ContentStore, 'getLatestRecords' | 'getLatestDocuments' | 'listTopics'>;

export interface RetrievalEngineDeps {
  store: RetrievalStore;
  embedder?: EmbeddingProvider | null;
  reranker?: RerankProvider | null;
  classification?: ClassificationConfig;
  config?: Partial<RetrievalConfig>;
}

interface Candidate {
  id: string;
  version: number;
  provenance: ProvenanceType;
  title: string;
  topic: string;
  category?: string;
  sourceUrls: string[];
  recency: number;
  /** Text the candidate is scored on */
  text: string;
  record?: StoredRecord;
  excerpt?: string;
}

interface ScoredCandidate {
  candidate: Candidate;
  score: number;
}

function defaultRetrievalConfig(): RetrievalConfig {
  const env = getEnv();
  return {
    semanticWeight: env.HYBRID_SEMANTIC_WEIGHT,
    keywordWeight: env.HYBRID_KEYWORD_WEIGHT,
    rerankPoolSize: env.RERANKER_POOL_SIZE,
    maxItems: env.CONTEXT_MAX_ITEMS,
    tokenBudget: env.CONTEXT_TOKEN_BUDGET,
    excerptLength: 500,
  };
}

function recordText(record: StoredRecord): string {
  const { fields } = record;
  return [
    record.name,
    record.category,
    fields.education,
    fields.fee,
    fields.processingTime,
    fields.language,
    fields.summary,
    ...(fields.keyPoints ?? []),
  ]
    .filter((part): part is string => Boolean(part))
    .join('\n');
}

function excerptOf(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength - 3).trimEnd()}...`;
}

/**
 * Ranked order: score descending, newer first on equal scores. Array sort is
 * stable, so fully tied candidates keep their input order.
 */
function byScoreThenRecency(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.score !== a.score) return b.score - a.score;
  return b.candidate.recency - a.candidate.recency;
}

/**
 * Hybrid multi-stage retrieval over the latest records and documents.
 *
 * filter -> keyword (+ semantic) scoring -> optional rerank -> render.
 * Optional stages are resolved once by initialize(); a stage that fails
 * during a query is skipped for that query only.
 */
export class RetrievalEngine {
  private readonly store: RetrievalStore;
  private readonly embedder: EmbeddingProvider | null;
  private readonly reranker: RerankProvider | null;
  private readonly classification: ClassificationConfig;
  private readonly config: RetrievalConfig;
  private tiersPromise: Promise<ResolvedTiers> | null = null;
  // One entry per record key or document URL; a newer version replaces the older vector
  private readonly embeddingCache = new Map<string, { version: number; vector: number[] }>();

  constructor(deps: RetrievalEngineDeps) {
    this.store = deps.store;
    this.embedder = deps.embedder ?? null;
    this.reranker = deps.reranker ?? null;
    this.classification = deps.classification ?? defaultExtractionConfig.classification;
    this.config = { ...defaultRetrievalConfig(), ...deps.config };
  }

  /**
   * Resolve which ranking tiers are available. Called lazily by retrieve().
   */
  initialize(): Promise<ResolvedTiers> {
    if (!this.tiersPromise) {
      this.tiersPromise = resolveRankingTiers(this.embedder, this.reranker);
    }
    return this.tiersPromise;
  }

  /** Number of records and documents with a cached embedding */
  get cachedEmbeddingCount(): number {
    return this.embeddingCache.size;
  }

  async availableStages(): Promise<RankingStageName[]> {
    const tiers = await this.initialize();
    return [...tiers.stages];
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<ContextBundle> {
    const tiers = await this.initialize();
    const maxItems = Math.max(1, options.maxItems ?? this.config.maxItems);

    const knownTopics = await this.store.listTopics();
    const explicit = { topic: options.topic, category: options.category };
    const filter = resolveQueryFilter(query, explicit, knownTopics, this.classification);

    let candidates = await this.loadCandidates(filter.topic, filter.category);
    if (candidates.length === 0 && filter.detected) {
      // A filter guessed from the query text never empties the result on its own
      logger.debug({ query, topic: filter.topic, category: filter.category }, 'Detected filter matched nothing');
      candidates = await this.loadCandidates(explicit.topic, explicit.category);
    }

    if (candidates.length === 0) {
      return { query, items: [], text: '', citations: [], stagesApplied: [] };
    }

    const stagesApplied: RankingStageName[] = ['keyword'];
    const semanticScores = tiers.embedder ? await this.semanticScores(tiers.embedder, query, candidates) : null;
    if (semanticScores) stagesApplied.push('semantic');

    const queryTerms = extractTerms(query);
    const ranked: ScoredCandidate[] = candidates
      .map((candidate, index) => {
        const keyword = keywordOverlap(queryTerms, extractTerms(candidate.text));
        const semantic = semanticScores?.[index];
        const score =
          semantic === undefined
            ? keyword
            : this.config.semanticWeight * semantic + this.config.keywordWeight * keyword;
        return { candidate, score };
      })
      .sort(byScoreThenRecency);

    let top = ranked.slice(0, maxItems);
    if (tiers.reranker) {
      const reranked = await this.rerank(tiers.reranker, query, ranked.slice(0, this.config.rerankPoolSize));
      if (reranked) {
        top = reranked.slice(0, maxItems);
        stagesApplied.push('rerank');
      }
    }

    const rendered = renderContext(top.map(scored => this.toContextItem(scored)), this.config.tokenBudget);
    logger.debug(
      { query, candidates: candidates.length, returned: rendered.items.length, stagesApplied },
      'Context bundle assembled'
    );
    return { query, ...rendered, stagesApplied };
  }

  private async loadCandidates(topic?: string, category?: string): Promise<Candidate[]> {
    const records = await this.store.getLatestRecords(topic, category);
    const candidates = records.map(record => this.recordCandidate(record));

    // Documents carry no category, so a category filter leaves records only
    if (category !== undefined) {
      return candidates;
    }

    const coveredUrls = new Set(records.flatMap(record => record.sourceUrls));
    const documents = await this.store.getLatestDocuments(topic);
    for (const document of documents) {
      if (!coveredUrls.has(document.url)) {
        candidates.push(this.documentCandidate(document));
      }
    }
    return candidates;
  }

  private recordCandidate(record: StoredRecord): Candidate {
    return {
      id: `record:${record.key}`,
      version: record.version,
      provenance: record.kind === 'categorized' ? 'categorized-record' : 'general-record',
      title: record.name,
      topic: record.topic,
      category: record.category,
      sourceUrls: [...record.sourceUrls],
      recency: record.createdAt.getTime(),
      text: recordText(record),
      record,
    };
  }

  private documentCandidate(document: StoredDocument): Candidate {
    return {
      id: `document:${document.url}`,
      version: document.version,
      provenance: 'document-excerpt',
      title: document.title,
      topic: document.topic,
      sourceUrls: [document.url],
      recency: document.fetchedAt.getTime(),
      text: `${document.title}\n${document.text}`,
      excerpt: excerptOf(document.text, this.config.excerptLength),
    };
  }

  /**
   * Semantic score per candidate, or null when embedding fails for this query
   */
  private async semanticScores(
    embedder: EmbeddingProvider,
    query: string,
    candidates: Candidate[]
  ): Promise<number[] | null> {
    try {
      const queryVector = await embedder.embed(query);

      const cachedVector = (candidate: Candidate): number[] | undefined => {
        const entry = this.embeddingCache.get(candidate.id);
        return entry && entry.version === candidate.version ? entry.vector : undefined;
      };
      const missing = candidates.filter(candidate => !cachedVector(candidate));
      if (missing.length > 0) {
        const vectors = await embedder.embedMany(missing.map(candidate => candidate.text));
        missing.forEach((candidate, index) => {
          const vector = vectors[index];
          if (vector) this.embeddingCache.set(candidate.id, { version: candidate.version, vector });
        });
      }

      return candidates.map(candidate => {
        const vector = cachedVector(candidate);
        return vector ? cosineSimilarity(queryVector, vector) : 0;
      });
    } catch (error) {
      logger.warn({ provider: embedder.getName(), error: errorMessage(error) }, 'Embedding failed, using keyword scores');
      return null;
    }
  }

  /**
   * Pool re-ordered by reranker score, or null when the reranker fails
   */
  private async rerank(
    reranker: RerankProvider,
    query: string,
    pool: ScoredCandidate[]
  ): Promise<ScoredCandidate[] | null> {
    try {
      const scores = await reranker.rerank(
        query,
        pool.map(scored => scored.candidate.text)
      );
      if (scores.length !== pool.length) {
        throw new Error(`Reranker returned ${scores.length} scores for ${pool.length} candidates`);
      }
      return pool
        .map((scored, index) => ({ candidate: scored.candidate, score: scores[index] ?? 0 }))
        .sort(byScoreThenRecency);
    } catch (error) {
      logger.warn({ provider: reranker.getName(), error: errorMessage(error) }, 'Rerank failed, using hybrid order');
      return null;
    }
  }

  private toContextItem({ candidate, score }: ScoredCandidate): ContextItem {
    return {
      provenance: candidate.provenance,
      title: candidate.title,
      topic: candidate.topic,
      category: candidate.category,
      score,
      sourceUrls: candidate.sourceUrls,
      record: candidate.record,
      excerpt: candidate.excerpt,
    };
  }
}
