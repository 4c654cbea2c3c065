/**
 * src/sources/types.ts
 *
 * Shared types for the fetch layer.
 *
 * Both adapters (browser session, structured API) implement FetchAdapter and
 * speak in FetchOutcome values. Neither of them retries: the retry/backoff
 * state machine lives in the orchestrator, which is the only caller.
 */

// ─── Queries ──────────────────────────────────────────────────────────────────

export interface SearchQuery {
    readonly keywords: string;     // e.g. "Backend Engineer"
    readonly location: string;     // e.g. "India", "United States"
}

export interface SearchLocation {
    readonly name: string;
    readonly code?: string;        // Short region code, informational only
}

/** Position within a query's result pages. `pageNumber` is 1-based. */
export interface PageCursor {
    readonly pageNumber: number;
    readonly offset: number;
    readonly token?: string;       // Provider continuation token (API mode)
}

// ─── Fetch Outcomes ───────────────────────────────────────────────────────────

export type FetchOutcome =
    | { readonly kind: 'success'; readonly payload: string }
    | { readonly kind: 'soft_failure'; readonly reason: string; readonly terminal?: boolean }
    | { readonly kind: 'captcha' }
    | { readonly kind: 'rate_limited' };

export type FetchOutcomeKind = FetchOutcome['kind'];

export interface FetchResult {
    readonly url: string;
    readonly outcome: FetchOutcome;
    /** Cursor of the following page, or null when the adapter knows there is none. */
    readonly next: PageCursor | null;
}

export type SourceKind = 'browser' | 'api';

export type PauseKind = 'page' | 'query';

export interface FetchAdapter {
    readonly kind: SourceKind;
    /** Acquires the adapter's resources. Must be called before fetch(). */
    open(): Promise<void>;
    fetch(query: SearchQuery, cursor: PageCursor): Promise<FetchResult>;
    /** Politeness delay between pages of one query, or between queries. */
    pause(kind: PauseKind, signal?: AbortSignal): Promise<void>;
    /** Releases resources. Safe to call more than once and after a failed open(). */
    close(): Promise<void>;
}

// ─── Raw Pages ────────────────────────────────────────────────────────────────

export interface RawPage {
    readonly sourceUrl: string;
    readonly payload: string;      // Markup, or SERPAPI_JSON:: + JSON array
    readonly query: string;
    readonly location: string;
    readonly pageNumber: number;
    readonly fetchedAt: Date;
    readonly succeeded: boolean;
    readonly errorDetail?: string;
}

// ─── Raw Job Records ──────────────────────────────────────────────────────────

export type RawRecordOrigin = 'card' | 'structured_data' | 'api';

/**
 * A listing as the extractor saw it, before any classification.
 * Hints carry provider-declared values that normalization prefers over
 * heuristics on the title.
 */
export interface RawJobRecord {
    origin: RawRecordOrigin;
    providerId?: string;
    title: string;
    company: string;
    location: string;
    postedText?: string;
    description?: string;
    url: string;
    employmentHint?: string;       // schedule_type / JSON-LD employmentType
    workplaceHint?: string;        // JSON-LD jobLocationType
    remoteFlag?: boolean;          // API work_from_home
    query: string;
    searchLocation: string;
    fetchedAt: Date;
}
