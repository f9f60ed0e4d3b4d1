/**
 * Fetch pacing for the crawl frontier
 *
 * Enforces a minimum delay between fetches. With scope 'process' one clock
 * covers every host the limiter sees; with scope 'domain' each hostname has
 * its own clock. Sharing one instance between frontiers gives the 'shared'
 * scope. robots.txt crawl-delay values raise the delay for their host.
 */

export type RateLimiterScope = 'process' | 'domain';

export interface RateLimiterOptions {
    minDelayMs: number;
    scope: RateLimiterScope;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

function hostOf(url: string): string {
    try {
        return new URL(url).hostname.toLowerCase();
    } catch {
        return url;
    }
}

export class RateLimiter {
    readonly scope: RateLimiterScope;
    private readonly minDelayMs: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    // Earliest time the next fetch on a clock may start
    private nextSlot: Map<string, number> = new Map();
    private domainDelays: Map<string, number> = new Map();

    constructor(options: RateLimiterOptions) {
        this.minDelayMs = Math.max(0, options.minDelayMs);
        this.scope = options.scope;
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Raise the delay for one host (robots.txt crawl-delay). Never lowers it below minDelayMs.
     */
    setDomainDelay(url: string, delayMs: number): void {
        this.domainDelays.set(hostOf(url), Math.max(0, delayMs));
    }

    delayFor(url: string): number {
        return Math.max(this.minDelayMs, this.domainDelays.get(hostOf(url)) ?? 0);
    }

    /**
     * Wait until a fetch of `url` may start. Concurrent callers on the same
     * clock are spaced out in call order.
     *
     * @returns milliseconds waited
     */
    async acquire(url: string): Promise<number> {
        const clock = this.scope === 'domain' ? hostOf(url) : '*';
        const now = this.now();
        const slot = Math.max(now, this.nextSlot.get(clock) ?? now);
        this.nextSlot.set(clock, slot + this.delayFor(url));

        const wait = slot - now;
        if (wait > 0) {
            await this.sleep(wait);
        }
        return wait;
    }
}
