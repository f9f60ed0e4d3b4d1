/**
 * Crawl Frontier
 *
 * Breadth-first, depth-bounded crawl over seed URLs. All crawl state (visited
 * set, queue, per-topic counters) belongs to one instance; only the rate
 * limiter may be shared between frontiers.
 */

import type { CrawlSummary, DocumentInput } from '../../contracts/types.js';
import { scraperConfig } from '../../config/scraperConfig.js';
import { StoreConflictError } from '../../types/errors.js';
import { computeContentHash } from '../../utils/contentHash.js';
import { createChildLogger, type Logger } from '../../utils/logger.js';
import { PatternSet } from '../../utils/patternMatcher.js';
import { normalizeUrl, isSameOrigin } from '../../utils/urlNormalizer.js';
import type { DocumentSink } from '../content/ContentStore.js';
import type { FetchStrategy } from './fetch/FetchStrategy.js';
import type { RateLimiter } from './RateLimiter.js';
import { RelevancePolicy } from './RelevancePolicy.js';
import type { RobotsTxtParser } from './robotsTxtParser.js';

export interface CrawlSeed {
    url: string;
    topic: string;
}

export interface CrawlOptions {
    maxDepth: number;
    maxDocsPerTopic: number;
    requiredKeywords: string[];
    optionalKeywords?: string[];
    excludePatterns?: string[];
    signal?: AbortSignal;
}

export interface CrawlFrontierDeps {
    strategy: FetchStrategy;
    store: DocumentSink;
    rateLimiter: RateLimiter;
    /** Omit to ignore robots.txt */
    robots?: RobotsTxtParser;
    fetchTimeoutMs: number;
    minContentLength: number;
    now?: () => Date;
}

interface QueueEntry {
    url: string;
    topic: string;
    depth: number;
}

function emptySummary(topic: string): CrawlSummary {
    return { topic, fetched: 0, accepted: 0, rejected: 0, errored: 0, cancelled: false };
}

export class CrawlFrontier {
    private readonly visited = new Set<string>();
    private readonly queue: QueueEntry[] = [];
    private readonly summaries = new Map<string, CrawlSummary>();
    private readonly robotsChecked = new Set<string>();
    private readonly logger: Logger;
    private readonly now: () => Date;
    private used = false;

    constructor(private readonly deps: CrawlFrontierDeps) {
        this.logger = createChildLogger({ component: 'CrawlFrontier', strategy: deps.strategy.name });
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Crawl from the seeds and return one summary per topic, in seed order.
     *
     * @throws {StoreConflictError} when a document version flip fails; the run stops
     */
    async crawl(seeds: CrawlSeed[], options: CrawlOptions): Promise<CrawlSummary[]> {
        if (this.used) {
            throw new Error('CrawlFrontier instances are single-use; create one per run');
        }
        this.used = true;

        const relevance = new RelevancePolicy({
            requiredKeywords: options.requiredKeywords,
            optionalKeywords: options.optionalKeywords ?? [],
            minContentLength: this.deps.minContentLength,
        });
        const exclusions = new PatternSet([...scraperConfig.defaultExcludePatterns, ...(options.excludePatterns ?? [])]);

        for (const seed of seeds) {
            const summary = this.summaryFor(seed.topic);
            const url = normalizeUrl(seed.url);
            if (!url) {
                this.logger.warn({ url: seed.url, topic: seed.topic }, 'Skipping invalid seed URL');
                summary.errored++;
                continue;
            }
            this.queue.push({ url, topic: seed.topic, depth: 0 });
        }

        let cancelled = false;
        while (this.queue.length > 0) {
            if (options.signal?.aborted) {
                cancelled = true;
                this.logger.info({ pending: this.queue.length }, 'Crawl cancelled');
                break;
            }

            const entry = this.queue.shift();
            if (!entry) break;
            const summary = this.summaryFor(entry.topic);

            if (this.visited.has(entry.url) || entry.depth > options.maxDepth) {
                continue;
            }
            if (summary.accepted >= options.maxDocsPerTopic) {
                continue;
            }

            const excludedBy = exclusions.firstMatch(entry.url);
            if (excludedBy) {
                this.visited.add(entry.url);
                summary.rejected++;
                this.logger.debug({ url: entry.url, pattern: excludedBy }, 'Excluded by pattern');
                continue;
            }

            if (this.deps.robots && !(await this.allowedByRobots(entry.url))) {
                this.visited.add(entry.url);
                summary.rejected++;
                this.logger.debug({ url: entry.url }, 'Disallowed by robots.txt');
                continue;
            }

            this.visited.add(entry.url);
            await this.processEntry(entry, summary, relevance, options.maxDepth);
        }

        const results = [...this.summaries.values()].map(summary => ({ ...summary, cancelled }));
        for (const result of results) {
            this.logger.info(result, 'Crawl finished');
        }
        return results;
    }

    private summaryFor(topic: string): CrawlSummary {
        let summary = this.summaries.get(topic);
        if (!summary) {
            summary = emptySummary(topic);
            this.summaries.set(topic, summary);
        }
        return summary;
    }

    private async allowedByRobots(url: string): Promise<boolean> {
        const robots = this.deps.robots;
        if (!robots) return true;

        const origin = new URL(url).origin;
        if (!this.robotsChecked.has(origin)) {
            this.robotsChecked.add(origin);
            const delaySeconds = await robots.getCrawlDelay(origin);
            if (delaySeconds !== null) {
                this.deps.rateLimiter.setDomainDelay(url, delaySeconds * 1000);
            }
        }
        return robots.isUrlAllowed(url);
    }

    private async processEntry(
        entry: QueueEntry,
        summary: CrawlSummary,
        relevance: RelevancePolicy,
        maxDepth: number
    ): Promise<void> {
        await this.deps.rateLimiter.acquire(entry.url);
        const outcome = await this.deps.strategy.fetch(entry.url, this.deps.fetchTimeoutMs);

        if (!outcome.ok) {
            summary.errored++;
            this.logger.warn(
                { url: entry.url, kind: outcome.kind, status: outcome.status, message: outcome.message },
                'Fetch failed'
            );
            return;
        }
        summary.fetched++;

        const decision = relevance.evaluate(outcome.contentText);
        if (!decision.accepted) {
            summary.rejected++;
            this.logger.debug({ url: entry.url, reason: decision.reason }, 'Page rejected by relevance policy');
            return;
        }

        const document: DocumentInput = {
            url: entry.url,
            topic: entry.topic,
            title: outcome.title,
            text: outcome.contentText,
            raw: outcome.contentRaw,
            links: outcome.links,
            breadcrumbs: outcome.breadcrumbs,
            attachments: outcome.attachments,
            depth: entry.depth,
            fetchedAt: this.now(),
            contentHash: computeContentHash(outcome.title, outcome.contentText, entry.url),
            fetchStrategy: this.deps.strategy.name,
            relevanceScore: decision.score,
        };

        try {
            const { written } = await this.deps.store.putDocument(document);
            this.logger.debug({ url: entry.url, depth: entry.depth, written }, 'Document accepted');
        } catch (error) {
            if (error instanceof StoreConflictError) {
                this.logger.error({ url: entry.url, error: error.message }, 'Document version flip failed, aborting crawl');
            }
            throw error;
        }
        summary.accepted++;

        const nextDepth = entry.depth + 1;
        if (nextDepth > maxDepth) {
            return;
        }
        for (const link of outcome.links) {
            const url = normalizeUrl(link);
            if (url && !this.visited.has(url) && isSameOrigin(url, entry.url)) {
                this.queue.push({ url, topic: entry.topic, depth: nextDepth });
            }
        }
    }
}
