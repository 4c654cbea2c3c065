/**
 * src/normalize/normalizer.ts
 *
 * RawJobRecord → CanonicalJobPosting.
 *
 * Which text feeds which classifier depends on where the record came from:
 *
 *   field         card               structured data          API
 *   ───────────   ────────────────   ──────────────────────   ─────────────────────────────────
 *   work type     title + location   jobLocationType + title  wfh flag, else title + location
 *                                                             + description + schedule type
 *   employment    title              employmentType, else     schedule type, else title +
 *                                    title                    location + description
 *   experience    title              title                    title + first 500 chars of description
 *   country       last comma part    last comma part, else inferred from the region signals
 *   skills        description only; title terms are added by backfillSkills
 *
 * Every posting is validated against the canonical schema and frozen.
 */

import { log } from 'crawlee';
import {
    CanonicalJobPostingSchema,
    MAX_DESCRIPTION_LENGTH,
} from '../models/jobPosting.js';
import type { CanonicalJobPosting, WorkType } from '../models/jobPosting.js';
import type { RawJobRecord } from '../sources/types.js';
import { errorMessage } from '../utils/errors.js';
import {
    classifyRole,
    detectEmploymentType,
    detectExperienceLevel,
    detectRegion,
    detectWorkType,
    inferCountry,
    splitLocation,
} from './classify.js';
import { resolvePostedDate } from './dates.js';
import { detectAiMention, extractSkills } from './skills.js';

const EXPERIENCE_DESCRIPTION_PREFIX = 500;

function joinText(...parts: Array<string | undefined>): string {
    return parts.filter((p): p is string => Boolean(p)).join(' ');
}

/** FULL_TIME / PART_TIME style enum values read as plain words. */
function hintText(hint: string | undefined): string | undefined {
    return hint?.replace(/_/g, ' ');
}

function resolveWorkType(raw: RawJobRecord): WorkType {
    switch (raw.origin) {
        case 'api':
            if (raw.remoteFlag) return 'Remote';
            return detectWorkType(joinText(raw.title, raw.location, raw.description, raw.employmentHint));
        case 'structured_data':
            return detectWorkType(joinText(hintText(raw.workplaceHint), raw.title));
        case 'card':
            return detectWorkType(joinText(raw.title, raw.location));
    }
}

function employmentInput(raw: RawJobRecord): string {
    const hint = hintText(raw.employmentHint);
    if (hint) return hint;
    if (raw.origin === 'api') return joinText(raw.title, raw.location, raw.description);
    return raw.title;
}

function experienceInput(raw: RawJobRecord): string {
    if (raw.origin === 'api') {
        return joinText(raw.title, raw.description?.slice(0, EXPERIENCE_DESCRIPTION_PREFIX));
    }
    return raw.title;
}

export function normalizeRecord(raw: RawJobRecord, now: Date = new Date()): CanonicalJobPosting {
    const { city, country } = splitLocation(raw.location);
    const locationCountry = country
        ?? (raw.origin === 'card' ? null : inferCountry(`${raw.location} ${raw.searchLocation}`));

    const description = raw.description ? raw.description.slice(0, MAX_DESCRIPTION_LENGTH) : null;
    const freeText = joinText(raw.title, raw.description);
    const { hasAiMention, aiKeywords } = detectAiMention(freeText);

    const posting = CanonicalJobPostingSchema.parse({
        jobId: raw.providerId?.trim() || null,
        title: raw.title,
        category: classifyRole(raw.title),
        company: raw.company,
        locationRaw: raw.location,
        locationCity: city,
        locationCountry,
        region: detectRegion(raw.location, raw.searchLocation),
        workType: resolveWorkType(raw),
        postedAt: resolvePostedDate(raw.postedText, now),
        postedRaw: raw.postedText ?? null,
        skills: extractSkills(raw.description ?? ''),
        experienceLevel: detectExperienceLevel(experienceInput(raw)),
        employmentType: detectEmploymentType(employmentInput(raw)),
        description,
        sourceUrl: raw.url,
        searchQuery: raw.query,
        searchLocation: raw.searchLocation,
        fetchedAt: raw.fetchedAt,
        hasAiMention,
        aiKeywords,
        origin: raw.origin,
    });

    return Object.freeze(posting);
}

export interface NormalizationBatch {
    jobs: CanonicalJobPosting[];
    rejected: number;
}

/** Normalizes a batch; a record that fails validation is logged and skipped. */
export function normalizeRecords(records: readonly RawJobRecord[], now: Date = new Date()): NormalizationBatch {
    const jobs: CanonicalJobPosting[] = [];
    let rejected = 0;

    for (const raw of records) {
        try {
            jobs.push(normalizeRecord(raw, now));
        } catch (err) {
            rejected++;
            log.debug(`[Normalizer] Rejected "${raw.title}" @ "${raw.company}": ${errorMessage(err)}`);
        }
    }
    return { jobs, rejected };
}

/**
 * Fills the skill set of postings that ended up with none, from title plus
 * description. Search cards carry no description, so this is where their
 * title terms come from. Postings that already have skills are returned as-is.
 */
export function backfillSkills(jobs: readonly CanonicalJobPosting[]): CanonicalJobPosting[] {
    return jobs.map((job) => {
        if (job.skills.length > 0) return job;
        const skills = extractSkills(joinText(job.title, job.description ?? undefined));
        if (skills.length === 0) return job;
        return Object.freeze({ ...job, skills });
    });
}
