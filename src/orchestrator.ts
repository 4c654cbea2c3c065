/**
 * src/orchestrator.ts
 *
 * PIPELINE ORCHESTRATOR
 *
 *   queries ─▶ fetch (per-page retry state machine) ─▶ raw pages
 *           ─▶ extract ─▶ normalize ─▶ skill backfill ─▶ dedup ─▶ run result
 *
 * RETRY STATE MACHINE (per page, attempts 0..maxRetries-1)
 * ─────────────────────────────────────────────────────────
 *   success        → keep the page, move on
 *   captcha        → count it against the query; at the limit the query is
 *                    abandoned and reported failed, otherwise back off
 *   rate limited   → back off
 *   soft failure   → back off; a terminal one ends the query at once
 *   adapter throws → treated as a soft failure
 *   out of attempts→ record a failed page and stop paginating the query
 *
 * Failures never escape a query: the run always moves on to the next one.
 * A query that produced no successful page is reported as failed, unless the
 * run was cancelled before it got one. A terminal failure after a successful
 * page is the provider's end of results and is not recorded.
 *
 * SESSIONS
 * ────────
 * Queries can be split into contiguous groups, each fetched by its own
 * adapter instance. Within a session fetches are strictly sequential.
 * Session results are merged in group order once every session is done.
 *
 * CANCELLATION
 * ────────────
 * When the abort signal fires, pending waits end early, no further page is
 * requested, adapters are closed, and whatever was already fetched still goes
 * through extraction, normalization and dedup.
 */

import { log } from 'crawlee';
import type { PipelineConfig } from './config/pipelineConfig.js';
import { extractRecords } from './extractors/index.js';
import type { CanonicalJobPosting } from './models/jobPosting.js';
import { backfillSkills, normalizeRecords } from './normalize/normalizer.js';
import { createFetchAdapter } from './sources/index.js';
import type { AdapterFactory } from './sources/index.js';
import { buildQueries, queryKey } from './sources/queryPlanner.js';
import type {
    FetchAdapter,
    FetchResult,
    PageCursor,
    RawJobRecord,
    RawPage,
    SearchQuery,
    SourceKind,
} from './sources/types.js';
import { getBackoffDelay, logViolation } from './utils/backoff.js';
import type { RetryPolicy, ViolationKind } from './utils/backoff.js';
import { dedupeJobsWithStats } from './utils/dedup.js';
import { errorMessage } from './utils/errors.js';
import { sleep as defaultSleep } from './utils/sleep.js';
import type { SleepFn } from './utils/sleep.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface FetchOptions {
    maxPagesPerQuery: number;
    retry: RetryPolicy;
    sleep: SleepFn;
    now: () => Date;
    signal?: AbortSignal;
}

export interface ScrapeResult {
    pages: RawPage[];
    totalPagesScraped: number;
    totalQueriesRun: number;
    failedQueries: string[];
    captchaEncountered: boolean;
    cancelled: boolean;
}

export interface ParsedJobBatch {
    jobs: CanonicalJobPosting[];
    /** Postings normalized before dedup. */
    totalExtracted: number;
    /** Unique postings after dedup. */
    totalParsed: number;
    totalFailed: number;
    duplicateCount: number;
    sourcePages: number;
}

export interface PipelineRunResult {
    jobs: CanonicalJobPosting[];
    totalExtracted: number;
    totalParsed: number;
    totalFailedPages: number;
    duplicateCount: number;
    sourcePages: number;
    failedQueries: string[];
    captchaEncountered: boolean;
    source: SourceKind;
    cancelled: boolean;
    durationMs: number;
}

export interface PipelineDeps {
    /** Called once per session. Defaults to the configured adapter. */
    createAdapter?: AdapterFactory;
    sleep?: SleepFn;
    now?: () => Date;
    signal?: AbortSignal;
    /** Overrides the roles × locations expansion. */
    queries?: readonly SearchQuery[];
}

type PageAttempt =
    | { status: 'success'; result: FetchResult; payload: string }
    | { status: 'failed'; result: FetchResult; reason: string; abandonQuery: boolean; terminal: boolean }
    | { status: 'cancelled' };

interface QueryState {
    captchaCount: number;
    captchaEncountered: boolean;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

const FIRST_PAGE: PageCursor = { pageNumber: 1, offset: 0 };

function failedPage(query: SearchQuery, cursor: PageCursor, url: string, reason: string, now: Date): RawPage {
    return Object.freeze({
        sourceUrl: url,
        payload: '',
        query: query.keywords,
        location: query.location,
        pageNumber: cursor.pageNumber,
        fetchedAt: now,
        succeeded: false,
        errorDetail: reason,
    });
}

function successfulPage(query: SearchQuery, cursor: PageCursor, url: string, payload: string, now: Date): RawPage {
    return Object.freeze({
        sourceUrl: url,
        payload,
        query: query.keywords,
        location: query.location,
        pageNumber: cursor.pageNumber,
        fetchedAt: now,
        succeeded: true,
    });
}

/** Splits `items` into at most `count` contiguous, non-empty groups. */
export function partition<T>(items: readonly T[], count: number): T[][] {
    const groups = Math.max(1, Math.min(Math.floor(count), items.length));
    const size = Math.ceil(items.length / groups);
    const result: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        result.push(items.slice(i, i + size));
    }
    return result;
}

// ─── Retry State Machine ──────────────────────────────────────────────────────

/** An adapter that throws instead of returning an outcome gets a soft failure. */
async function fetchOnce(adapter: FetchAdapter, query: SearchQuery, cursor: PageCursor): Promise<FetchResult> {
    try {
        return await adapter.fetch(query, cursor);
    } catch (err) {
        const reason = errorMessage(err);
        log.warning(`[Orchestrator] Adapter threw on page ${cursor.pageNumber} of "${query.keywords}": ${reason}`);
        return { url: '', outcome: { kind: 'soft_failure', reason }, next: null };
    }
}

async function fetchPageWithRetry(
    adapter: FetchAdapter,
    query: SearchQuery,
    cursor: PageCursor,
    state: QueryState,
    options: FetchOptions,
): Promise<PageAttempt> {
    const { retry, signal } = options;
    let last: FetchResult | null = null;

    for (let attempt = 0; attempt < retry.maxRetries; attempt++) {
        if (signal?.aborted) return { status: 'cancelled' };

        const result = await fetchOnce(adapter, query, cursor);
        last = result;
        const { outcome } = result;

        let kind: ViolationKind;
        let detail: string | null = null;

        switch (outcome.kind) {
            case 'success':
                return { status: 'success', result, payload: outcome.payload };

            case 'captcha':
                state.captchaEncountered = true;
                state.captchaCount++;
                if (state.captchaCount >= retry.maxCaptchasPerQuery) {
                    logViolation({ kind: 'captcha', url: result.url, query: queryKey(query), detail, attempt, backoffMs: 0 });
                    log.warning(
                        `[Orchestrator] ${state.captchaCount} CAPTCHAs for "${query.keywords}" in ` +
                        `"${query.location}", abandoning query`,
                    );
                    return { status: 'failed', result, reason: 'captcha', abandonQuery: true, terminal: false };
                }
                kind = 'captcha';
                break;

            case 'rate_limited':
                kind = 'rate_limited';
                break;

            case 'soft_failure':
                if (outcome.terminal) {
                    return { status: 'failed', result, reason: outcome.reason, abandonQuery: false, terminal: true };
                }
                kind = 'soft_failure';
                detail = outcome.reason;
                break;
        }

        const lastAttempt = attempt === retry.maxRetries - 1;
        const backoffMs = lastAttempt ? 0 : getBackoffDelay(kind, attempt, retry.backoffFactor);
        logViolation({ kind, url: result.url, query: queryKey(query), detail, attempt, backoffMs });
        if (lastAttempt) break;

        await options.sleep(backoffMs, signal);
    }

    if (!last) return { status: 'cancelled' };
    const reason = last.outcome.kind === 'soft_failure' ? last.outcome.reason : last.outcome.kind;
    return { status: 'failed', result: last, reason: `retries exhausted (${reason})`, abandonQuery: false, terminal: false };
}

// ─── Fetch Stage ──────────────────────────────────────────────────────────────

/**
 * Runs every query through one opened adapter, paginating each query up to
 * the page limit. Never throws for fetch-level failures.
 */
export async function collectPages(
    adapter: FetchAdapter,
    queries: readonly SearchQuery[],
    options: FetchOptions,
): Promise<ScrapeResult> {
    const pages: RawPage[] = [];
    const failedQueries: string[] = [];
    let captchaEncountered = false;
    let totalQueriesRun = 0;
    let cancelled = false;

    for (const [index, query] of queries.entries()) {
        if (options.signal?.aborted) {
            cancelled = true;
            break;
        }

        totalQueriesRun++;
        log.info(`[Orchestrator] Query ${index + 1}/${queries.length}: "${query.keywords}" in "${query.location}"`);

        const state: QueryState = { captchaCount: 0, captchaEncountered: false };
        let succeededPages = 0;
        let queryFailed = false;
        let cursor: PageCursor | null = FIRST_PAGE;

        while (cursor && cursor.pageNumber <= options.maxPagesPerQuery) {
            const attempt = await fetchPageWithRetry(adapter, query, cursor, state, options);

            if (attempt.status === 'cancelled') {
                cancelled = true;
                break;
            }

            if (attempt.status === 'failed') {
                if (attempt.terminal && succeededPages > 0) {
                    log.info(`[Orchestrator] Pagination ended after page ${cursor.pageNumber - 1}: ${attempt.reason}`);
                    break;
                }
                pages.push(failedPage(query, cursor, attempt.result.url, attempt.reason, options.now()));
                log.warning(`[Orchestrator] ✗ Page ${cursor.pageNumber} failed (${attempt.reason}), skipping remaining pages`);
                queryFailed = attempt.abandonQuery;
                break;
            }

            pages.push(successfulPage(query, cursor, attempt.result.url, attempt.payload, options.now()));
            succeededPages++;
            log.info(`[Orchestrator] ✓ Page ${cursor.pageNumber} fetched (${attempt.payload.length.toLocaleString()} chars)`);

            cursor = attempt.result.next;
            if (!cursor) {
                log.debug(`[Orchestrator] No more pages for "${query.keywords}" in "${query.location}"`);
                break;
            }
            if (cursor.pageNumber <= options.maxPagesPerQuery) {
                await adapter.pause('page', options.signal);
            }
        }

        captchaEncountered ||= state.captchaEncountered;
        if (queryFailed || (succeededPages === 0 && !cancelled)) {
            failedQueries.push(queryKey(query));
        }

        if (cancelled) break;
        if (index < queries.length - 1) {
            await adapter.pause('query', options.signal);
        }
    }

    return {
        pages,
        totalPagesScraped: pages.filter((p) => p.succeeded).length,
        totalQueriesRun,
        failedQueries,
        captchaEncountered,
        cancelled: cancelled || Boolean(options.signal?.aborted),
    };
}

/** Opens the adapter, collects its queries, and always closes it. */
async function runSession(
    adapter: FetchAdapter,
    queries: readonly SearchQuery[],
    options: FetchOptions,
    sessionIndex: number,
): Promise<ScrapeResult> {
    try {
        await adapter.open();
    } catch (err) {
        log.error(`[Orchestrator] Session ${sessionIndex + 1} could not start: ${errorMessage(err)}`);
        await adapter.close();
        return {
            pages: [],
            totalPagesScraped: 0,
            totalQueriesRun: 0,
            failedQueries: queries.map(queryKey),
            captchaEncountered: false,
            cancelled: Boolean(options.signal?.aborted),
        };
    }

    try {
        return await collectPages(adapter, queries, options);
    } finally {
        await adapter.close();
    }
}

// ─── Parse Stage ──────────────────────────────────────────────────────────────

export function parsePages(pages: readonly RawPage[], now: Date = new Date()): ParsedJobBatch {
    const records: RawJobRecord[] = [];
    let totalFailed = 0;

    for (const page of pages) {
        if (!page.succeeded) {
            totalFailed++;
            continue;
        }
        try {
            records.push(...extractRecords(page).records);
        } catch (err) {
            totalFailed++;
            log.warning(`[Orchestrator] Extraction failed for ${page.sourceUrl}: ${errorMessage(err)}`);
        }
    }

    const normalized = normalizeRecords(records, now);
    const withSkills = backfillSkills(normalized.jobs);
    const { uniqueJobs, duplicateCount, duplicatesById, duplicatesByContent } = dedupeJobsWithStats(withSkills);

    log.info(
        `[Orchestrator] Normalized ${withSkills.length} postings from ${pages.length} pages | ` +
        `Unique: ${uniqueJobs.length} | Duplicates: ${duplicateCount} ` +
        `[id:${duplicatesById} content:${duplicatesByContent}]`,
    );

    return {
        jobs: uniqueJobs,
        totalExtracted: withSkills.length,
        totalParsed: uniqueJobs.length,
        totalFailed,
        duplicateCount,
        sourcePages: pages.length,
    };
}

// ─── Public API ───────────────────────────────────────────────────────────────

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps = {}): Promise<PipelineRunResult> {
    const start = Date.now();
    const now = deps.now ?? (() => new Date());
    const createAdapter = deps.createAdapter ?? (() => createFetchAdapter(config));
    const queries = deps.queries ?? buildQueries(config.roles, config.locations);

    const options: FetchOptions = {
        maxPagesPerQuery: config.maxPagesPerQuery,
        retry: config.retry,
        sleep: deps.sleep ?? defaultSleep,
        now,
        signal: deps.signal,
    };

    // Adapters are all created up front so credential errors surface before any fetch.
    const plan = partition(queries, config.parallelSessions).map((group) => ({ group, adapter: createAdapter() }));
    const source = plan[0]?.adapter.kind ?? config.mode;

    log.info(
        `[Orchestrator] ${queries.length} queries via ${source} ` +
        `(${plan.length} session${plan.length === 1 ? '' : 's'}, ≤${config.maxPagesPerQuery} pages each)`,
    );

    const sessions = await Promise.all(
        plan.map(({ group, adapter }, i) => runSession(adapter, group, options, i)),
    );

    const pages = sessions.flatMap((s) => s.pages);
    const failedQueries = sessions.flatMap((s) => s.failedQueries);
    const captchaEncountered = sessions.some((s) => s.captchaEncountered);
    const cancelled = sessions.some((s) => s.cancelled) || Boolean(deps.signal?.aborted);

    if (cancelled) {
        log.warning(`[Orchestrator] Run cancelled, processing ${pages.length} pages already fetched`);
    }

    const batch = parsePages(pages, now());

    return {
        jobs: batch.jobs,
        totalExtracted: batch.totalExtracted,
        totalParsed: batch.totalParsed,
        totalFailedPages: batch.totalFailed,
        duplicateCount: batch.duplicateCount,
        sourcePages: batch.sourcePages,
        failedQueries,
        captchaEncountered,
        source,
        cancelled,
        durationMs: Date.now() - start,
    };
}
