/**
 * Robots.txt Parser Service
 *
 * Fetches and parses robots.txt files to respect crawl-delay and disallow rules
 */

import { createHttpClient, HTTP_TIMEOUTS, type HttpGetClient } from '../../config/httpClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errorHandling.js';

const logger = createChildLogger({ component: 'RobotsTxtParser' });

export interface RobotsTxtRules {
    crawlDelay?: number; // in seconds
    disallowPaths: string[]; // paths that should not be crawled
    allowPaths: string[]; // paths that are explicitly allowed
}

export interface ParsedRobotsTxt {
    rules: Map<string, RobotsTxtRules>; // key: user agent (or '*' for all)
    sitemaps: string[]; // sitemap URLs
    lastFetched: number; // timestamp
}

export interface RobotsTxtParserOptions {
    userAgent: string;
    httpClient?: HttpGetClient;
    cacheTTL?: number;
}

/**
 * Product token of a full User-Agent string: "VisaContextBot/1.0 (+...)" -> "visacontextbot"
 */
export function userAgentToken(userAgent: string): string {
    const token = userAgent.trim().split(/[\s/]/)[0] ?? '';
    return token.toLowerCase() || '*';
}

export class RobotsTxtParser {
    private cache: Map<string, ParsedRobotsTxt> = new Map();
    private readonly cacheTTL: number;
    private readonly httpClient: HttpGetClient;
    private readonly userAgent: string;
    private readonly agentToken: string;

    constructor(options: RobotsTxtParserOptions) {
        this.userAgent = options.userAgent;
        this.agentToken = userAgentToken(options.userAgent);
        this.cacheTTL = options.cacheTTL ?? 24 * 60 * 60 * 1000; // 24 hours
        this.httpClient = options.httpClient ?? createHttpClient({ timeout: HTTP_TIMEOUTS.SHORT });
    }

    /**
     * Fetch and parse robots.txt for an origin (e.g. "https://example.org")
     */
    async getRobotsTxt(origin: string): Promise<ParsedRobotsTxt | null> {
        const cached = this.cache.get(origin);
        if (cached && Date.now() - cached.lastFetched < this.cacheTTL) {
            return cached;
        }

        try {
            const response = await this.httpClient.get(`${origin}/robots.txt`, {
                timeout: HTTP_TIMEOUTS.SHORT,
                headers: { 'User-Agent': this.userAgent },
            });

            if (response.status >= 400 && response.status < 500) {
                // No robots.txt (or not readable), allow all
                const emptyRules: ParsedRobotsTxt = { rules: new Map(), sitemaps: [], lastFetched: Date.now() };
                this.cache.set(origin, emptyRules);
                return emptyRules;
            }
            if (response.status !== 200) {
                logger.warn({ origin, status: response.status }, 'robots.txt unavailable, allowing by default');
                return null;
            }

            const parsed = this.parseRobotsTxt(typeof response.data === 'string' ? response.data : '');
            this.cache.set(origin, parsed);
            return parsed;
        } catch (error) {
            logger.warn({ origin, error: errorMessage(error) }, 'Failed to fetch robots.txt, allowing by default');
            return null;
        }
    }

    /**
     * Parse robots.txt content. Consecutive User-agent lines share one group.
     */
    parseRobotsTxt(content: string): ParsedRobotsTxt {
        const rules = new Map<string, RobotsTxtRules>();
        const sitemaps: string[] = [];

        let currentRules: RobotsTxtRules | null = null;
        let lastWasAgent = false;

        for (const line of content.split(/\r?\n/)) {
            const trimmed = line.replace(/#.*$/, '').trim();
            if (!trimmed) {
                continue;
            }

            const colonIndex = trimmed.indexOf(':');
            if (colonIndex === -1) {
                continue;
            }

            const directive = trimmed.substring(0, colonIndex).trim().toLowerCase();
            const value = trimmed.substring(colonIndex + 1).trim();

            if (directive === 'user-agent') {
                if (!lastWasAgent) {
                    currentRules = { disallowPaths: [], allowPaths: [] };
                }
                const agent = value.toLowerCase();
                if (currentRules) {
                    rules.set(agent, currentRules);
                }
                lastWasAgent = true;
                continue;
            }
            lastWasAgent = false;

            if (directive === 'disallow' && currentRules) {
                // Empty disallow means allow all
                if (value) {
                    currentRules.disallowPaths.push(value);
                }
            } else if (directive === 'allow' && currentRules) {
                if (value) {
                    currentRules.allowPaths.push(value);
                }
            } else if (directive === 'crawl-delay' && currentRules) {
                const delay = parseFloat(value);
                if (!isNaN(delay) && delay > 0) {
                    currentRules.crawlDelay = delay;
                }
            } else if (directive === 'sitemap') {
                sitemaps.push(value);
            }
        }

        return { rules, sitemaps, lastFetched: Date.now() };
    }

    private rulesFor(robotsTxt: ParsedRobotsTxt): RobotsTxtRules | undefined {
        return robotsTxt.rules.get(this.agentToken) || robotsTxt.rules.get('*');
    }

    /**
     * Check if a URL is allowed by robots.txt. The longest matching rule wins;
     * an allow rule wins a tie.
     */
    async isUrlAllowed(url: string): Promise<boolean> {
        let urlObj: URL;
        try {
            urlObj = new URL(url);
        } catch {
            return true;
        }

        const robotsTxt = await this.getRobotsTxt(urlObj.origin);
        if (!robotsTxt) {
            return true;
        }

        const rules = this.rulesFor(robotsTxt);
        if (!rules) {
            return true;
        }

        const path = `${urlObj.pathname}${urlObj.search}`;
        const longestMatch = (patterns: string[]): number =>
            patterns.reduce((best, pattern) => (this.pathMatches(path, pattern) ? Math.max(best, pattern.length) : best), -1);

        const disallowed = longestMatch(rules.disallowPaths);
        if (disallowed < 0) {
            return true;
        }
        return longestMatch(rules.allowPaths) >= disallowed;
    }

    /**
     * Get crawl delay for an origin, in seconds
     */
    async getCrawlDelay(origin: string): Promise<number | null> {
        const robotsTxt = await this.getRobotsTxt(origin);
        if (!robotsTxt) {
            return null;
        }
        return this.rulesFor(robotsTxt)?.crawlDelay ?? null;
    }

    /**
     * Check if a path matches a pattern (`*` wildcard, `$` end anchor)
     */
    private pathMatches(path: string, pattern: string): boolean {
        const anchored = pattern.endsWith('$');
        const body = anchored ? pattern.slice(0, -1) : pattern;
        const regexPattern = body
            .split('*')
            .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
            .join('.*');

        return new RegExp(`^${regexPattern}${anchored ? '$' : ''}`).test(path);
    }

    /**
     * Clear cache for an origin (useful for testing)
     */
    clearCache(origin?: string): void {
        if (origin) {
            this.cache.delete(origin);
        } else {
            this.cache.clear();
        }
    }
}
