/**
 * src/utils/backoff.ts
 *
 * Backoff schedule for failed page fetches, plus an in-memory record of
 * every violation (CAPTCHA, throttling, soft failure) seen during the run.
 *
 * Delay formulas, with `attempt` 0-based and `f` the backoff factor:
 *   captcha       f^attempt     × 15 s
 *   soft failure  f^attempt     ×  3 s
 *   rate limited  f^(attempt+1) ×  5 s
 */

import { log } from 'crawlee';

// ─── Types ────────────────────────────────────────────────────────────────────

export type ViolationKind = 'captcha' | 'rate_limited' | 'soft_failure';

export interface RetryPolicy {
    /** Fetch attempts per page, including the first. */
    maxRetries: number;
    backoffFactor: number;
    /** CAPTCHAs tolerated per query before it is abandoned. */
    maxCaptchasPerQuery: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
    maxRetries: 3,
    backoffFactor: 2,
    maxCaptchasPerQuery: 2,
});

export interface ViolationRecord {
    kind: ViolationKind;
    url: string;
    query: string;
    detail: string | null;
    attempt: number;
    backoffMs: number;
    timestamp: Date;
}

// ─── Backoff Calculation ──────────────────────────────────────────────────────

const BASE_DELAY_MS: Record<ViolationKind, number> = {
    captcha: 15_000,
    soft_failure: 3_000,
    rate_limited: 5_000,
};

export function getBackoffDelay(kind: ViolationKind, attempt: number, factor: number): number {
    const exponent = kind === 'rate_limited' ? attempt + 1 : attempt;
    return Math.round(BASE_DELAY_MS[kind] * Math.pow(factor, exponent));
}

// ─── Violation History ────────────────────────────────────────────────────────

/** Ring buffer of the most recent violations across all queries. */
let VIOLATION_HISTORY: ViolationRecord[] = [];
const MAX_HISTORY = 200;

export function logViolation(record: Omit<ViolationRecord, 'timestamp'>): void {
    VIOLATION_HISTORY.push({ ...record, timestamp: new Date() });
    if (VIOLATION_HISTORY.length > MAX_HISTORY) VIOLATION_HISTORY.shift();

    const waitSec = (record.backoffMs / 1000).toFixed(1);
    log.warning(
        `[Backoff] ${record.kind} on "${record.query}"` +
        (record.detail ? ` (${record.detail})` : '') +
        ` | Attempt ${record.attempt + 1} | Backing off ${waitSec}s`,
    );
}

/** Returns a copy of the violation history. */
export function getViolationHistory(): ViolationRecord[] {
    return [...VIOLATION_HISTORY];
}

/** Per-kind counts over the current history. */
export function summarizeViolations(): Record<ViolationKind, number> {
    const counts: Record<ViolationKind, number> = { captcha: 0, rate_limited: 0, soft_failure: 0 };
    for (const v of VIOLATION_HISTORY) counts[v.kind]++;
    return counts;
}

export function __resetViolationHistoryForTests(): void {
    VIOLATION_HISTORY = [];
}
