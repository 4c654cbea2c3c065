/**
 * src/normalize/phrases.ts
 *
 * Phrase matching primitives shared by the classifiers and skill extraction.
 *
 * Two flavours:
 *   - substring match (role, experience, work and employment tables)
 *   - bounded match: the phrase may not touch a letter or digit on either
 *     side, so "us" does not fire inside "australia" and "C++" still matches
 *     even though it ends in punctuation.
 */

const patternCache = new Map<string, RegExp>();

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function boundedPattern(phrase: string): RegExp {
    const key = phrase.toLowerCase();
    let pattern = patternCache.get(key);
    if (!pattern) {
        pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(key)}(?![a-z0-9])`, 'i');
        patternCache.set(key, pattern);
    }
    return pattern;
}

/** Lowercases and collapses runs of whitespace. */
export function normalizeText(text: string): string {
    return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

export function containsAny(haystack: string, phrases: readonly string[]): boolean {
    return phrases.some((p) => haystack.includes(p));
}

export function containsAnyBounded(haystack: string, phrases: readonly string[]): boolean {
    return phrases.some((p) => boundedPattern(p).test(haystack));
}

/**
 * Walks an ordered rule table and returns the value of the first rule with a
 * phrase contained in `haystack`.
 */
export function firstMatch<T extends string>(
    haystack: string,
    rules: readonly { readonly value: T; readonly phrases: readonly string[] }[],
): T | null {
    for (const rule of rules) {
        if (containsAny(haystack, rule.phrases)) return rule.value;
    }
    return null;
}
