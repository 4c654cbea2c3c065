/**
 * src/utils/sleep.ts
 *
 * Timer helpers used for politeness delays and retry backoff.
 */

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects: callers
 * check `signal.aborted` afterwards to decide whether to continue.
 */
export const sleep: SleepFn = (ms, signal) => {
    if (ms <= 0 || signal?.aborted) return Promise.resolve();

    return new Promise((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
};

/** Uniformly sampled integer in [minMs, maxMs]. */
export function randomBetween(minMs: number, maxMs: number, random: () => number = Math.random): number {
    const lo = Math.min(minMs, maxMs);
    const hi = Math.max(minMs, maxMs);
    return Math.round(lo + random() * (hi - lo));
}
