/**
 * src/normalize/dates.ts
 *
 * Posting-date resolution for the strings job boards put next to a listing:
 * ISO timestamps, "2024-03-01", "Mar 1, 2024", "3 days ago", "30+ days ago",
 * "Just now", "Yesterday".
 */

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const UNIT_MS: Record<string, number> = {
    second: SECOND,
    minute: MINUTE,
    hour: HOUR,
    day: DAY,
    week: 7 * DAY,
    month: 30 * DAY,
    year: 365 * DAY,
};

// First unit found wins, in this order.
const RELATIVE_PATTERNS: Array<[RegExp, number]> = Object.entries(UNIT_MS).map(
    ([unit, ms]) => [new RegExp(`(\\d+)\\+?\\s+${unit}`), ms],
);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;
const FOUR_DIGIT_YEAR = /\b(19|20)\d{2}\b/;

function parseAbsolute(text: string): Date | null {
    if (!ISO_DATE.test(text) && !FOUR_DIGIT_YEAR.test(text)) return null;
    const ms = Date.parse(text);
    return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Resolves a posting-date string against `now`. Returns null for empty or
 * unrecognised text.
 */
export function resolvePostedDate(
    text: string | null | undefined,
    now: Date = new Date(),
): Date | null {
    if (!text) return null;
    const trimmed = text.trim();
    if (!trimmed) return null;

    const absolute = parseAbsolute(trimmed);
    if (absolute) return absolute;

    const lower = trimmed.toLowerCase();
    for (const [pattern, unitMs] of RELATIVE_PATTERNS) {
        const m = pattern.exec(lower);
        if (m) return new Date(now.getTime() - Number(m[1]) * unitMs);
    }

    if (lower.includes('today') || lower.includes('just now')) return new Date(now.getTime());
    if (lower.includes('yesterday')) return new Date(now.getTime() - DAY);

    return null;
}
