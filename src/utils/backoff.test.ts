import { beforeEach, describe, it, expect } from 'vitest';
import {
    __resetViolationHistoryForTests,
    getBackoffDelay,
    getViolationHistory,
    logViolation,
    summarizeViolations,
} from './backoff.js';

describe('getBackoffDelay', () => {
    it('scales captcha waits from 15 s', () => {
        expect(getBackoffDelay('captcha', 0, 2)).toBe(15_000);
        expect(getBackoffDelay('captcha', 1, 2)).toBe(30_000);
    });

    it('scales soft failures from 3 s', () => {
        expect(getBackoffDelay('soft_failure', 0, 2)).toBe(3_000);
        expect(getBackoffDelay('soft_failure', 2, 2)).toBe(12_000);
    });

    it('starts rate-limit waits one step up', () => {
        expect(getBackoffDelay('rate_limited', 0, 2)).toBe(10_000);
        expect(getBackoffDelay('rate_limited', 1, 1.5)).toBe(11_250);
    });
});

describe('violation history', () => {
    beforeEach(() => {
        __resetViolationHistoryForTests();
    });

    it('records and counts violations by kind', () => {
        logViolation({ kind: 'captcha', url: 'u1', query: 'q|l', detail: null, attempt: 0, backoffMs: 15_000 });
        logViolation({ kind: 'soft_failure', url: 'u2', query: 'q|l', detail: 'timeout', attempt: 1, backoffMs: 6_000 });

        expect(getViolationHistory().map((v) => v.url)).toEqual(['u1', 'u2']);
        expect(summarizeViolations()).toEqual({ captcha: 1, rate_limited: 0, soft_failure: 1 });
    });

    it('keeps only the most recent 200 entries', () => {
        for (let i = 0; i < 205; i++) {
            logViolation({ kind: 'rate_limited', url: `u${i}`, query: 'q|l', detail: null, attempt: 0, backoffMs: 0 });
        }
        const history = getViolationHistory();
        expect(history).toHaveLength(200);
        expect(history[0]?.url).toBe('u5');
    });
});
