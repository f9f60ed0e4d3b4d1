import type { FetchStrategyName } from '../../../contracts/types.js';
import type { HttpGetClient } from '../../../config/httpClient.js';
import { getEnv } from '../../../config/env.js';
import type { FetchStrategy } from './FetchStrategy.js';
import { LightweightFetchStrategy } from './LightweightFetchStrategy.js';
import { RenderingFetchStrategy, type BrowserLauncher } from './RenderingFetchStrategy.js';

export interface FetchStrategyDeps {
    httpClient?: HttpGetClient;
    launcher?: BrowserLauncher;
}

/**
 * Select a fetch strategy by configured name
 */
export function createFetchStrategy(name: FetchStrategyName, deps: FetchStrategyDeps = {}): FetchStrategy {
    const env = getEnv();
    switch (name) {
        case 'lightweight':
            return new LightweightFetchStrategy({
                userAgent: env.SCRAPER_USER_AGENT,
                httpClient: deps.httpClient,
            });
        case 'rendering':
            return new RenderingFetchStrategy({
                userAgent: env.SCRAPER_USER_AGENT,
                executablePath: env.BROWSER_EXECUTABLE_PATH,
                launcher: deps.launcher,
            });
    }
}

export type { FetchStrategy, FetchOutcome, FetchResult, FetchFailure, FetchFailureKind } from './FetchStrategy.js';
