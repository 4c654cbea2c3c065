/**
 * src/normalize/taxonomy.ts
 *
 * Loads the phrase tables and skill vocabularies from data/taxonomy.json.
 *
 * The file is read and validated once, on first use, then frozen. Table order
 * is significant: the classifiers walk `roles` and `experience` top-down and
 * stop at the first phrase that matches.
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { EXPERIENCE_LEVELS, ROLE_CATEGORIES } from '../models/jobPosting.js';
import type { ExperienceLevel, RoleCategory } from '../models/jobPosting.js';

// ─── Schema ───────────────────────────────────────────────────────────────────

const phraseList = z.array(z.string().min(1)).min(1);

const TaxonomySchema = z.object({
    skills: phraseList,
    aiKeywords: phraseList,
    roles: z.array(z.object({
        category: z.enum(ROLE_CATEGORIES),
        phrases: phraseList,
    })).min(1),
    experience: z.array(z.object({
        level: z.enum(EXPERIENCE_LEVELS),
        phrases: phraseList,
    })).min(1),
    workType: z.object({
        hybrid: phraseList,
        remote: phraseList,
        onsite: phraseList,
    }),
    employmentType: z.object({
        contract: phraseList,
        partTime: phraseList,
        internship: phraseList,
    }),
    regions: z.object({
        unitedStates: phraseList,
        india: phraseList,
    }),
});

export interface PhraseRule<T extends string> {
    readonly value: T;
    readonly phrases: readonly string[];
}

export interface Taxonomy {
    readonly skills: readonly string[];
    readonly aiKeywords: readonly string[];
    readonly roles: readonly PhraseRule<RoleCategory>[];
    readonly experience: readonly PhraseRule<ExperienceLevel>[];
    readonly workType: Readonly<Record<'hybrid' | 'remote' | 'onsite', readonly string[]>>;
    readonly employmentType: Readonly<Record<'contract' | 'partTime' | 'internship', readonly string[]>>;
    readonly regions: Readonly<Record<'unitedStates' | 'india', readonly string[]>>;
}

// ─── Loader ───────────────────────────────────────────────────────────────────

// Sources run from src/normalize/, the build from dist/src/normalize/.
const TAXONOMY_CANDIDATES = [
    new URL('../../data/taxonomy.json', import.meta.url),
    new URL('../../../data/taxonomy.json', import.meta.url),
];

let cached: Taxonomy | null = null;

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object') {
        for (const child of Object.values(value)) deepFreeze(child);
        Object.freeze(value);
    }
    return value;
}

/** Validates a raw taxonomy document. Exposed for tests. */
export function parseTaxonomy(raw: unknown): Taxonomy {
    const parsed = TaxonomySchema.parse(raw);
    return deepFreeze({
        skills: parsed.skills,
        aiKeywords: parsed.aiKeywords,
        roles: parsed.roles.map((r) => ({ value: r.category, phrases: r.phrases })),
        experience: parsed.experience.map((e) => ({ value: e.level, phrases: e.phrases })),
        workType: parsed.workType,
        employmentType: parsed.employmentType,
        regions: parsed.regions,
    });
}

export function getTaxonomy(): Taxonomy {
    if (!cached) {
        const path = TAXONOMY_CANDIDATES.find((candidate) => existsSync(candidate));
        if (!path) throw new Error('data/taxonomy.json not found');
        const text = readFileSync(path, 'utf8');
        cached = parseTaxonomy(JSON.parse(text));
    }
    return cached;
}
