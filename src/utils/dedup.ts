/**
 * src/utils/dedup.ts
 *
 * In-run deduplication of canonical postings.
 *
 * Two keys, checked in order for every record (first-seen wins):
 *   1. provider id: when present and already seen → duplicate
 *   2. content key: lowercased/trimmed (title, company) already seen → duplicate
 * A unique record registers both its id (if any) and its content key.
 */

import { log } from 'crawlee';
import type { CanonicalJobPosting } from '../models/jobPosting.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type DuplicateReason = 'id' | 'content' | 'none';

export type DedupableJob = Pick<CanonicalJobPosting, 'jobId' | 'title' | 'company'>;

export interface DedupStats<T> {
    uniqueJobs: T[];
    duplicateCount: number;
    duplicatesById: number;
    duplicatesByContent: number;
}

// ─── Keys ─────────────────────────────────────────────────────────────────────

export function contentKey(job: DedupableJob): string {
    return `${job.title.trim().toLowerCase()}\u0000${job.company.trim().toLowerCase()}`;
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function dedupeJobsWithStats<T extends DedupableJob>(jobs: readonly T[]): DedupStats<T> {
    const seenIds = new Set<string>();
    const seenContent = new Set<string>();
    const uniqueJobs: T[] = [];
    let duplicatesById = 0;
    let duplicatesByContent = 0;

    for (const job of jobs) {
        const reason = duplicateReason(job, seenIds, seenContent);
        if (reason === 'id') {
            duplicatesById++;
            continue;
        }
        if (reason === 'content') {
            duplicatesByContent++;
            log.debug(`[Dedup] SKIP content duplicate: "${job.title}" @ "${job.company}"`);
            continue;
        }

        if (job.jobId) seenIds.add(job.jobId);
        seenContent.add(contentKey(job));
        uniqueJobs.push(job);
    }

    return {
        uniqueJobs,
        duplicateCount: duplicatesById + duplicatesByContent,
        duplicatesById,
        duplicatesByContent,
    };
}

export function dedupeJobs<T extends DedupableJob>(jobs: readonly T[]): T[] {
    return dedupeJobsWithStats(jobs).uniqueJobs;
}

function duplicateReason(
    job: DedupableJob,
    seenIds: ReadonlySet<string>,
    seenContent: ReadonlySet<string>,
): DuplicateReason {
    if (job.jobId && seenIds.has(job.jobId)) return 'id';
    if (seenContent.has(contentKey(job))) return 'content';
    return 'none';
}
