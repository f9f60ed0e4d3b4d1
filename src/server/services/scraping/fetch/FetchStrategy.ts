import type { Attachment, FetchStrategyName } from '../../../contracts/types.js';

export type FetchFailureKind = 'timeout' | 'blocked' | 'notFound' | 'other';

export interface FetchResult {
    ok: true;
    status: number;
    /** Final URL after redirects */
    url: string;
    title: string;
    contentText: string;
    contentRaw: string;
    links: string[];
    breadcrumbs: string[];
    attachments: Attachment[];
}

export interface FetchFailure {
    ok: false;
    kind: FetchFailureKind;
    status?: number;
    message: string;
}

export type FetchOutcome = FetchResult | FetchFailure;

/**
 * Retrieves one page. Implementations never throw for per-URL problems;
 * they report a FetchFailure value instead.
 */
export interface FetchStrategy {
    readonly name: FetchStrategyName;
    fetch(url: string, timeoutMs: number): Promise<FetchOutcome>;
    /** Release held resources (browser processes); safe to call repeatedly */
    close(): Promise<void>;
}

/**
 * Map an HTTP status to a failure kind, or null when the status is a success
 */
export function classifyStatus(status: number): FetchFailureKind | null {
    if (status >= 200 && status < 300) return null;
    if (status === 403 || status === 429) return 'blocked';
    if (status === 404 || status === 410) return 'notFound';
    return 'other';
}
