/**
 * src/sources/index.ts
 *
 * Adapter factory. Credential preconditions are checked here, before any
 * browser is launched or request is sent.
 */

import type { PipelineConfig } from '../config/pipelineConfig.js';
import { createBrowserSession } from './browserSession.js';
import type { BrowserSessionDeps } from './browserSession.js';
import { createSerpApiAdapter } from './serpApi.js';
import type { SerpApiDeps } from './serpApi.js';
import type { FetchAdapter } from './types.js';

export type AdapterFactory = () => FetchAdapter;

export interface AdapterDeps {
    browser?: BrowserSessionDeps;
    serpApi?: SerpApiDeps;
}

/**
 * Creates one adapter instance for the configured mode.
 * Throws MissingCredentialError in API mode without a usable key.
 */
export function createFetchAdapter(config: PipelineConfig, deps: AdapterDeps = {}): FetchAdapter {
    if (config.mode === 'api') {
        return createSerpApiAdapter(
            { apiKey: config.serpApi.apiKey, postingWindowSeconds: config.postingWindowSeconds },
            deps.serpApi,
        );
    }

    return createBrowserSession(
        { ...config.browser, postingWindowSeconds: config.postingWindowSeconds },
        deps.browser,
    );
}

export { buildQueries, queryKey } from './queryPlanner.js';
export type { FetchAdapter, FetchOutcome, FetchResult, PageCursor, RawPage, SearchQuery } from './types.js';
