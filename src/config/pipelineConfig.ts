/**
 * src/config/pipelineConfig.ts
 *
 * Typed run configuration. Built once from the validated environment; the
 * pipeline modules only ever see this object, never process.env.
 */

import type { Env } from './envSchema.js';
import type { LocationInput } from '../sources/queryPlanner.js';
import type { BrowserEngine } from '../sources/browserSession.js';
import type { SourceKind } from '../sources/types.js';
import type { RetryPolicy } from '../utils/backoff.js';
import { DEFAULT_RETRY_POLICY } from '../utils/backoff.js';
import { DEFAULT_POSTING_WINDOW_SECONDS } from './linkedin.js';

export interface PipelineConfig {
    mode: SourceKind;
    roles: string[];
    locations: LocationInput[];
    maxPagesPerQuery: number;
    retry: RetryPolicy;
    parallelSessions: number;
    postingWindowSeconds: number;
    browser: {
        engine: BrowserEngine;
        headless: boolean;
        minDelayMs: number;
        maxDelayMs: number;
        navigationTimeoutMs: number;
        blockTrackers: boolean;
        blockHeavyAssets: boolean;
    };
    serpApi: {
        apiKey: string | undefined;
    };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
    mode: 'browser',
    roles: ['Software Engineer', 'Backend Engineer', 'ML Engineer'],
    locations: [{ name: 'United States', code: 'us' }, { name: 'India', code: 'in' }],
    maxPagesPerQuery: 3,
    retry: { ...DEFAULT_RETRY_POLICY },
    parallelSessions: 1,
    postingWindowSeconds: DEFAULT_POSTING_WINDOW_SECONDS,
    browser: {
        engine: 'chromium',
        headless: true,
        minDelayMs: 2000,
        maxDelayMs: 5000,
        navigationTimeoutMs: 30_000,
        blockTrackers: true,
        blockHeavyAssets: false,
    },
    serpApi: { apiKey: undefined },
};

export function buildPipelineConfig(env: Env): PipelineConfig {
    const mode = env.DATA_SOURCE_MODE;
    const maxPagesPerQuery = mode === 'api' && env.SERPAPI_PAGES_PER_QUERY !== null
        ? Math.max(1, Math.floor(env.SERPAPI_PAGES_PER_QUERY))
        : env.SCRAPER_MAX_PAGES;

    return {
        mode,
        roles: env.SEARCH_ROLES,
        locations: env.SEARCH_LOCATIONS,
        maxPagesPerQuery,
        retry: {
            maxRetries: env.SCRAPER_MAX_RETRIES,
            backoffFactor: env.SCRAPER_BACKOFF_FACTOR,
            maxCaptchasPerQuery: DEFAULT_RETRY_POLICY.maxCaptchasPerQuery,
        },
        parallelSessions: env.SCRAPER_PARALLEL_SESSIONS,
        postingWindowSeconds: env.POSTING_WINDOW_SECONDS,
        browser: {
            engine: env.SCRAPER_BROWSER,
            headless: env.SCRAPER_HEADLESS,
            minDelayMs: env.SCRAPER_MIN_DELAY_MS,
            maxDelayMs: env.SCRAPER_MAX_DELAY_MS,
            navigationTimeoutMs: env.SCRAPER_NAV_TIMEOUT_MS,
            blockTrackers: env.SCRAPER_BLOCK_TRACKERS,
            blockHeavyAssets: env.SCRAPER_BLOCK_HEAVY_ASSETS,
        },
        serpApi: { apiKey: env.SERPAPI_API_KEY },
    };
}
