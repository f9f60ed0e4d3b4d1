/**
 * Ingestion Orchestrator
 *
 * Runs the configured seed topics through crawl and extraction. Each topic
 * gets its own frontier and fetch strategy; topics run with bounded
 * concurrency.
 */

import { getEnv, type RateLimitScope } from '../../config/env.js';
import type { HttpGetClient } from '../../config/httpClient.js';
import type { SeedConfig, SeedEntry } from '../../config/seeds.js';
import type { CrawlSummary, ExtractionSummary, FetchStrategyName } from '../../contracts/types.js';
import { NotFoundError } from '../../types/errors.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { errorMessage } from '../../utils/errorHandling.js';
import { createChildLogger, withRunContext } from '../../utils/logger.js';
import type { DocumentSink } from '../content/ContentStore.js';
import type { ExtractionEngine } from '../extraction/ExtractionEngine.js';
import { CrawlFrontier } from '../scraping/CrawlFrontier.js';
import { createFetchStrategy, type FetchStrategy } from '../scraping/fetch/createFetchStrategy.js';
import { RateLimiter } from '../scraping/RateLimiter.js';
import { RobotsTxtParser } from '../scraping/robotsTxtParser.js';

const logger = createChildLogger({ component: 'IngestionOrchestrator' });

export interface IngestionConfig {
  concurrency: number;
  crawlDelayMs: number;
  rateLimitScope: RateLimitScope;
  respectRobots: boolean;
  fetchTimeoutMs: number;
  minContentLength: number;
  userAgent: string;
  /** Wall-clock limit for one run; undefined for none */
  runDeadlineMs?: number;
}

export interface IngestionOrchestratorDeps {
  store: DocumentSink;
  extraction: Pick<ExtractionEngine, 'extractTopic'>;
  /** Builds the fetch strategy for a topic; defaults to createFetchStrategy */
  strategyFactory?: (name: FetchStrategyName) => FetchStrategy;
  httpClient?: HttpGetClient;
  sleep?: (ms: number) => Promise<void>;
  config?: Partial<IngestionConfig>;
}

export interface IngestionRunOptions {
  /** Restrict the run to these seed topics */
  topics?: string[];
  signal?: AbortSignal;
}

export interface TopicIngestionResult {
  topic: string;
  crawl: CrawlSummary[];
  extraction: ExtractionSummary;
}

export interface IngestionRunResult {
  crawl: CrawlSummary[];
  extraction: ExtractionSummary[];
}

function defaultIngestionConfig(): IngestionConfig {
  const env = getEnv();
  return {
    concurrency: env.CRAWL_CONCURRENCY,
    crawlDelayMs: env.CRAWL_DELAY_MS,
    rateLimitScope: env.CRAWL_RATE_LIMIT_SCOPE,
    respectRobots: env.CRAWL_RESPECT_ROBOTS,
    fetchTimeoutMs: env.CRAWL_FETCH_TIMEOUT_MS,
    minContentLength: env.CRAWL_MIN_CONTENT_LENGTH,
    userAgent: env.SCRAPER_USER_AGENT,
    runDeadlineMs: env.CRAWL_RUN_DEADLINE_MS,
  };
}

export class IngestionOrchestrator {
  private readonly config: IngestionConfig;
  private readonly strategyFactory: (name: FetchStrategyName) => FetchStrategy;
  // Only set for the 'shared' scope: one limiter across every frontier
  private readonly sharedLimiter: RateLimiter | null;

  constructor(private readonly deps: IngestionOrchestratorDeps) {
    this.config = { ...defaultIngestionConfig(), ...deps.config };
    this.strategyFactory =
      deps.strategyFactory ?? (name => createFetchStrategy(name, { httpClient: deps.httpClient }));
    this.sharedLimiter =
      this.config.rateLimitScope === 'shared' ? this.createLimiter('domain') : null;
  }

  private createLimiter(scope: 'process' | 'domain'): RateLimiter {
    return new RateLimiter({ minDelayMs: this.config.crawlDelayMs, scope, sleep: this.deps.sleep });
  }

  private limiterForRun(): RateLimiter {
    if (this.sharedLimiter) {
      return this.sharedLimiter;
    }
    return this.createLimiter(this.config.rateLimitScope === 'domain' ? 'domain' : 'process');
  }

  /**
   * Crawl and extract every selected seed topic
   *
   * @throws {NotFoundError} when a requested topic is not in the seed configuration
   */
  async run(seedConfig: SeedConfig, options: IngestionRunOptions = {}): Promise<IngestionRunResult> {
    const entries = this.selectEntries(seedConfig, options.topics);
    const signal = this.runSignal(options.signal);

    logger.info({ topics: entries.map(entry => entry.topic), concurrency: this.config.concurrency }, 'Ingestion started');
    const results = await mapWithConcurrency(entries, this.config.concurrency, entry => this.runTopic(entry, signal));

    const result: IngestionRunResult = {
      crawl: results.flatMap(topicResult => topicResult.crawl),
      extraction: results.map(topicResult => topicResult.extraction),
    };
    logger.info({ topics: results.length }, 'Ingestion finished');
    return result;
  }

  /**
   * Crawl one seed topic with its own frontier, then extract its documents
   */
  runTopic(entry: SeedEntry, signal?: AbortSignal): Promise<TopicIngestionResult> {
    // Loggers created during the topic run carry the topic name
    return withRunContext({ topic: entry.topic }, () => this.crawlAndExtract(entry, signal));
  }

  private async crawlAndExtract(entry: SeedEntry, signal?: AbortSignal): Promise<TopicIngestionResult> {
    const policy = entry.crawlPolicy;
    const strategy = this.strategyFactory(policy.fetchStrategy);
    const robots = this.config.respectRobots
      ? new RobotsTxtParser({ userAgent: this.config.userAgent, httpClient: this.deps.httpClient })
      : undefined;

    let crawl: CrawlSummary[];
    try {
      const frontier = new CrawlFrontier({
        strategy,
        store: this.deps.store,
        rateLimiter: this.limiterForRun(),
        robots,
        fetchTimeoutMs: this.config.fetchTimeoutMs,
        minContentLength: this.config.minContentLength,
      });
      crawl = await frontier.crawl(
        entry.seedUrls.map(url => ({ url, topic: entry.topic })),
        {
          maxDepth: policy.maxDepth,
          maxDocsPerTopic: policy.maxDocsPerTopic,
          requiredKeywords: policy.requiredKeywords,
          optionalKeywords: policy.optionalKeywords,
          excludePatterns: policy.excludePatterns,
          signal,
        }
      );
    } finally {
      await strategy.close().catch((error: unknown) => {
        logger.warn({ topic: entry.topic, error: errorMessage(error) }, 'Fetch strategy did not close cleanly');
      });
    }

    const extraction = await this.deps.extraction.extractTopic(entry.topic);
    return { topic: entry.topic, crawl, extraction };
  }

  private selectEntries(seedConfig: SeedConfig, topics?: string[]): SeedEntry[] {
    if (!topics || topics.length === 0) {
      return seedConfig;
    }
    return topics.map(topic => {
      const entry = seedConfig.find(candidate => candidate.topic === topic);
      if (!entry) {
        throw new NotFoundError('Seed topic', topic);
      }
      return entry;
    });
  }

  private runSignal(signal?: AbortSignal): AbortSignal | undefined {
    if (this.config.runDeadlineMs === undefined) {
      return signal;
    }
    const deadline = AbortSignal.timeout(this.config.runDeadlineMs);
    return signal ? AbortSignal.any([signal, deadline]) : deadline;
  }
}
