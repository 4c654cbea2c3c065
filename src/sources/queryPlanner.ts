/**
 * src/sources/queryPlanner.ts
 *
 * Expands configured role terms and locations into the flat list of search
 * queries a run will execute.
 */

import type { SearchLocation, SearchQuery } from './types.js';

export type LocationInput = string | SearchLocation;

function locationName(location: LocationInput): string {
    return (typeof location === 'string' ? location : location.name).trim();
}

/** Trimmed, non-blank entries; later case-insensitive repeats are dropped. */
function distinct(values: readonly string[]): string[] {
    const seen = new Set<string>();
    return values
        .map((v) => v.trim())
        .filter((v) => {
            const key = v.toLowerCase();
            if (!v || seen.has(key)) return false;
            seen.add(key);
            return true;
        });
}

/**
 * Cross product of roles × locations, ordered role-major: every location of
 * the first role, then every location of the second, and so on.
 * Blank entries and case-insensitive repeats are skipped; an empty input on
 * either side yields no queries.
 */
export function buildQueries(
    roles: readonly string[],
    locations: readonly LocationInput[],
): SearchQuery[] {
    const names = distinct(locations.map(locationName));
    const queries: SearchQuery[] = [];

    for (const keywords of distinct(roles)) {
        for (const location of names) {
            queries.push({ keywords, location });
        }
    }

    return queries;
}

/** Key used in failed-query reports: "Backend Engineer|India". */
export function queryKey(query: SearchQuery): string {
    return `${query.keywords}|${query.location}`;
}
