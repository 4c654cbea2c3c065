/**
 * src/models/jobPosting.ts
 *
 * Canonical job posting model.
 *
 * Every extraction path (markup cards, structured data, structured API) ends
 * up here. Enumerated fields are closed string unions backed by `as const`
 * arrays shared by the zod schema and the TypeScript types.
 */

import { z } from 'zod';

// ─── Enumerations ─────────────────────────────────────────────────────────────

export const ROLE_CATEGORIES = [
    'Backend Engineer',
    'Frontend Engineer',
    'Full Stack Engineer',
    'ML/AI Engineer',
    'Data Engineer',
    'Data Scientist',
    'DevOps/Platform/SRE',
    'Engineering Manager/Tech Lead',
    'Software Engineer',
    'Forward Deployed Engineer',
    'Product/Program Management',
    'Other',
] as const;
export type RoleCategory = (typeof ROLE_CATEGORIES)[number];

export const EXPERIENCE_LEVELS = [
    'Entry',
    'Mid',
    'Senior',
    'Staff',
    'Principal',
    'Manager',
    'Not Specified',
] as const;
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export const WORK_TYPES = ['Remote', 'Hybrid', 'Onsite', 'Not Specified'] as const;
export type WorkType = (typeof WORK_TYPES)[number];

export const EMPLOYMENT_TYPES = [
    'Full-time',
    'Part-time',
    'Contract',
    'Internship',
    'Not Specified',
] as const;
export type EmploymentType = (typeof EMPLOYMENT_TYPES)[number];

export const REGIONS = ['United States', 'India', 'Other'] as const;
export type Region = (typeof REGIONS)[number];

/** Which extraction path produced a record. */
export type RecordOrigin = 'card' | 'structured_data' | 'api';

/** Hard cap on stored description length. */
export const MAX_DESCRIPTION_LENGTH = 2000;

// ─── Canonical Posting ────────────────────────────────────────────────────────

export const CanonicalJobPostingSchema = z.object({
    jobId: z.string().min(1).nullable(),
    title: z.string().min(1),
    category: z.enum(ROLE_CATEGORIES),
    company: z.string().min(1),
    locationRaw: z.string(),
    locationCity: z.string().nullable(),
    locationCountry: z.string().nullable(),
    region: z.enum(REGIONS),
    workType: z.enum(WORK_TYPES),
    postedAt: z.date().nullable(),
    postedRaw: z.string().nullable(),
    skills: z.array(z.string().min(1)),
    experienceLevel: z.enum(EXPERIENCE_LEVELS),
    employmentType: z.enum(EMPLOYMENT_TYPES),
    description: z.string().max(MAX_DESCRIPTION_LENGTH).nullable(),
    sourceUrl: z.string(),
    searchQuery: z.string(),
    searchLocation: z.string(),
    fetchedAt: z.date(),
    hasAiMention: z.boolean(),
    aiKeywords: z.array(z.string()),
    origin: z.enum(['card', 'structured_data', 'api']),
});

export type CanonicalJobPosting = Readonly<z.infer<typeof CanonicalJobPostingSchema>>;
