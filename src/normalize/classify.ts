/**
 * src/normalize/classify.ts
 *
 * Heuristic classifiers over free text. All of them are total: every input,
 * including the empty string, maps to a declared enumeration value.
 */

import type {
    EmploymentType,
    ExperienceLevel,
    Region,
    RoleCategory,
    WorkType,
} from '../models/jobPosting.js';
import { getTaxonomy } from './taxonomy.js';
import { containsAny, containsAnyBounded, firstMatch, normalizeText } from './phrases.js';

// ─── Role / Experience ────────────────────────────────────────────────────────

export function classifyRole(title: string): RoleCategory {
    return firstMatch(normalizeText(title), getTaxonomy().roles) ?? 'Other';
}

export function detectExperienceLevel(text: string): ExperienceLevel {
    return firstMatch(normalizeText(text), getTaxonomy().experience) ?? 'Not Specified';
}

// ─── Work Arrangement ─────────────────────────────────────────────────────────

export function detectWorkType(text: string): WorkType {
    const haystack = normalizeText(text);
    const { workType } = getTaxonomy();
    if (containsAny(haystack, workType.hybrid)) return 'Hybrid';
    if (containsAny(haystack, workType.remote)) return 'Remote';
    if (containsAny(haystack, workType.onsite)) return 'Onsite';
    return 'Not Specified';
}

// ─── Employment Type ──────────────────────────────────────────────────────────

/**
 * Full-time is the default when nothing contradicts it. "Not Specified" is a
 * valid value of the type but never produced here.
 */
export function detectEmploymentType(text: string): EmploymentType {
    // Trailing pad so a phrase like "intern " also matches at the very end.
    const haystack = `${normalizeText(text)} `;
    const { employmentType } = getTaxonomy();
    if (containsAny(haystack, employmentType.contract)) return 'Contract';
    if (containsAny(haystack, employmentType.partTime)) return 'Part-time';
    if (containsAny(haystack, employmentType.internship)) return 'Internship';
    return 'Full-time';
}

// ─── Region / Location ────────────────────────────────────────────────────────

export function detectRegion(locationRaw: string, searchLocation: string): Region {
    const haystack = normalizeText(`${locationRaw} ${searchLocation}`);
    const { regions } = getTaxonomy();
    if (containsAnyBounded(haystack, regions.unitedStates)) return 'United States';
    if (containsAnyBounded(haystack, regions.india)) return 'India';
    return 'Other';
}

export interface LocationParts {
    city: string | null;
    country: string | null;
}

/** "Austin, Texas, United States" → city "Austin", country "United States". */
export function splitLocation(locationRaw: string): LocationParts {
    const parts = locationRaw.split(',').map((p) => p.trim());
    const city = parts[0] ? parts[0] : null;
    const last = parts[parts.length - 1];
    const country = parts.length > 1 && last ? last : null;
    return { city, country };
}

export function inferCountry(text: string): string | null {
    const region = detectRegion(text, '');
    return region === 'Other' ? null : region;
}
