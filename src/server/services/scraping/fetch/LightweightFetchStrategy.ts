import axios from 'axios';
import { createHttpClient, type HttpGetClient } from '../../../config/httpClient.js';
import { createChildLogger } from '../../../utils/logger.js';
import { errorMessage } from '../../../utils/errorHandling.js';
import { parseHtml } from './htmlParser.js';
import { classifyStatus, type FetchOutcome, type FetchStrategy } from './FetchStrategy.js';

const logger = createChildLogger({ component: 'LightweightFetchStrategy' });

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface LightweightFetchOptions {
    userAgent: string;
    /** Injected for tests; defaults to the pooled axios client */
    httpClient?: HttpGetClient;
}

/**
 * Direct HTTP GET plus static HTML parsing. No script execution.
 */
export class LightweightFetchStrategy implements FetchStrategy {
    readonly name = 'lightweight' as const;
    private readonly httpClient: HttpGetClient;
    private readonly userAgent: string;

    constructor(options: LightweightFetchOptions) {
        this.userAgent = options.userAgent;
        this.httpClient = options.httpClient ?? createHttpClient();
    }

    async fetch(url: string, timeoutMs: number): Promise<FetchOutcome> {
        try {
            const response = await this.httpClient.get(url, {
                timeout: timeoutMs,
                headers: {
                    'User-Agent': this.userAgent,
                    Accept: 'text/html,application/xhtml+xml',
                },
            });

            const failure = classifyStatus(response.status);
            if (failure) {
                logger.debug({ url, status: response.status, kind: failure }, 'Fetch returned error status');
                return { ok: false, kind: failure, status: response.status, message: `HTTP ${response.status}` };
            }

            const html = typeof response.data === 'string' ? response.data : '';
            const parsed = parseHtml(html, url);
            return {
                ok: true,
                status: response.status,
                url,
                title: parsed.title,
                contentText: parsed.text,
                contentRaw: parsed.raw,
                links: parsed.links,
                breadcrumbs: parsed.breadcrumbs,
                attachments: parsed.attachments,
            };
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const status = error.response?.status;
                if (error.code && TIMEOUT_CODES.has(error.code)) {
                    return { ok: false, kind: 'timeout', message: `Timed out after ${timeoutMs}ms` };
                }
                if (status !== undefined) {
                    return { ok: false, kind: classifyStatus(status) ?? 'other', status, message: error.message };
                }
            }
            return { ok: false, kind: 'other', message: errorMessage(error) };
        }
    }

    async close(): Promise<void> {
        // Pooled agents are shared process-wide; nothing to release per strategy
    }
}
