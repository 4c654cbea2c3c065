/**
 * src/sources/serpApi.ts
 *
 * API-mode fetch adapter: SerpApi's Google Jobs engine.
 *
 * No browser, no markup. Each page of `jobs_results` is handed to the
 * extraction stage as `SERPAPI_JSON::<json array>` so the extractor can route
 * on the prefix instead of sniffing content.
 *
 * PAGINATION
 * ──────────
 *  • Page 1 carries no cursor.
 *  • Later pages send `next_page_token` when the previous response had one,
 *    otherwise `start=(page-1)×10`.
 *  • The query ends after an empty page, or a short page (<10) with no token.
 *
 * ERRORS
 * ──────
 *  • Body with an `error` field → terminal soft failure (retrying the same
 *    request cannot help; on page 1 the query is reported as failed).
 *  • HTTP 429 → rate limited.
 *  • Other HTTP errors, network errors, timeouts, malformed bodies → soft
 *    failure, retried by the orchestrator.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { errorMessage, MissingCredentialError } from '../utils/errors.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import type { SleepFn } from '../utils/sleep.js';
import type {
    FetchAdapter,
    FetchOutcome,
    FetchResult,
    PageCursor,
    PauseKind,
    SearchQuery,
} from './types.js';

// ─── Constants ────────────────────────────────────────────────────────────────

export const SERPAPI_MARKER = 'SERPAPI_JSON::';

const API_URL = 'https://serpapi.com/search.json';
const FULL_PAGE_SIZE = 10;
const REQUEST_TIMEOUT_MS = 15_000;

const PAUSE_MS: Record<PauseKind, number> = {
    page: 400,
    query: 300,
};

/** Values people leave in .env files instead of a real key. */
const PLACEHOLDER_KEYS = new Set([
    '',
    'PASTE_YOUR_SERPAPI_KEY_HERE',
    'your_key_here',
    'YOUR_API_KEY',
    'serpapi_key',
    'xxxx',
]);

// ─── Response Shape ───────────────────────────────────────────────────────────

const SerpApiResponseSchema = z.object({
    error: z.string().optional(),
    jobs_results: z.array(z.unknown()).optional(),
    serpapi_pagination: z.object({
        next_page_token: z.string().optional(),
    }).nullish(),
});

// ─── Settings ─────────────────────────────────────────────────────────────────

export interface SerpApiSettings {
    apiKey: string | undefined;
    postingWindowSeconds: number;
}

export interface SerpApiDeps {
    sleep?: SleepFn;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Returns the trimmed key, or throws when it is empty or a placeholder. */
export function resolveApiKey(raw: string | undefined): string {
    const key = (raw ?? '').trim();
    if (PLACEHOLDER_KEYS.has(key)) {
        throw new MissingCredentialError('SERPAPI_API_KEY', 'get a key at https://serpapi.com');
    }
    return key;
}

/** Maps a posting-age window onto Google Jobs' date_posted chip. */
export function datePostedChip(windowSeconds: number): string | null {
    const days = windowSeconds / 86_400;
    if (days <= 1) return 'date_posted:today';
    if (days <= 3) return 'date_posted:3days';
    if (days <= 7) return 'date_posted:week';
    if (days <= 31) return 'date_posted:month';
    return null;
}

export function buildSerpApiParams(
    query: SearchQuery,
    cursor: PageCursor,
    apiKey: string,
    windowSeconds: number,
): URLSearchParams {
    const params = new URLSearchParams({
        engine: 'google_jobs',
        q: query.keywords,
        location: query.location,
        hl: 'en',
        api_key: apiKey,
    });

    const chip = datePostedChip(windowSeconds);
    if (chip) params.set('chips', chip);

    if (cursor.pageNumber > 1) {
        if (cursor.token) {
            params.set('next_page_token', cursor.token);
        } else {
            params.set('start', String(cursor.offset));
        }
    }
    return params;
}

export function serpApiSourceUrl(query: SearchQuery, cursor: PageCursor): string {
    return `serpapi://google_jobs/${query.keywords}@${query.location}?page=${cursor.pageNumber}`;
}

export function nextSerpApiCursor(
    cursor: PageCursor,
    resultCount: number,
    token: string | undefined,
): PageCursor | null {
    if (resultCount === 0) return null;
    if (resultCount < FULL_PAGE_SIZE && !token) return null;

    return {
        pageNumber: cursor.pageNumber + 1,
        offset: cursor.pageNumber * FULL_PAGE_SIZE,
        ...(token ? { token } : {}),
    };
}

// ─── Adapter ──────────────────────────────────────────────────────────────────

export function createSerpApiAdapter(
    settings: SerpApiSettings,
    deps: SerpApiDeps = {},
): FetchAdapter {
    const apiKey = resolveApiKey(settings.apiKey);
    const sleep = deps.sleep ?? defaultSleep;

    async function request(url: string): Promise<{ outcome: FetchOutcome; count: number; token?: string }> {
        let response: Response;
        try {
            response = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
        } catch (err) {
            return { outcome: { kind: 'soft_failure', reason: errorMessage(err) }, count: 0 };
        }

        if (response.status === 429) {
            return { outcome: { kind: 'rate_limited' }, count: 0 };
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (err) {
            const reason = `HTTP ${response.status}: unreadable body (${errorMessage(err)})`;
            return { outcome: { kind: 'soft_failure', reason }, count: 0 };
        }

        const parsed = SerpApiResponseSchema.safeParse(body);
        if (!parsed.success) {
            return { outcome: { kind: 'soft_failure', reason: 'unexpected response shape' }, count: 0 };
        }

        const data = parsed.data;
        if (data.error) {
            return { outcome: { kind: 'soft_failure', reason: data.error, terminal: true }, count: 0 };
        }
        if (!response.ok) {
            return { outcome: { kind: 'soft_failure', reason: `HTTP ${response.status}` }, count: 0 };
        }

        const jobs = data.jobs_results ?? [];
        return {
            outcome: { kind: 'success', payload: SERPAPI_MARKER + JSON.stringify(jobs) },
            count: jobs.length,
            token: data.serpapi_pagination?.next_page_token || undefined,
        };
    }

    async function fetchPage(query: SearchQuery, cursor: PageCursor): Promise<FetchResult> {
        const params = buildSerpApiParams(query, cursor, apiKey, settings.postingWindowSeconds);
        const { outcome, count, token } = await request(`${API_URL}?${params.toString()}`);
        const url = serpApiSourceUrl(query, cursor);

        if (outcome.kind === 'success') {
            log.info(`[SerpApi] "${query.keywords}" @ ${query.location} page ${cursor.pageNumber}: ${count} results`);
            return { url, outcome, next: nextSerpApiCursor(cursor, count, token) };
        }

        if (outcome.kind === 'soft_failure') {
            log.warning(`[SerpApi] "${query.keywords}" @ ${query.location} page ${cursor.pageNumber} failed: ${outcome.reason}`);
        }
        return { url, outcome, next: null };
    }

    return {
        kind: 'api',
        open: async () => {
            log.info('[SerpApi] Using Google Jobs engine');
        },
        fetch: fetchPage,
        pause: (kind, signal) => sleep(PAUSE_MS[kind], signal),
        close: async () => undefined,
    };
}
