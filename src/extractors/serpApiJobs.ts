/**
 * src/extractors/serpApiJobs.ts
 *
 * API path of the extraction engine: SerpApi Google Jobs `jobs_results`
 * items mapped straight onto raw records. Items that do not validate, or have
 * no title, are dropped one by one.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import type { RawJobRecord } from '../sources/types.js';
import type { ExtractionContext } from './linkedinCards.js';
import { cleanText } from './text.js';

// ─── Item Shape ───────────────────────────────────────────────────────────────

const LinkList = z.array(
    z.object({ link: z.string().optional().catch(undefined) }).passthrough(),
).nullish().catch(null);

const SerpApiJobSchema = z.object({
    title: z.string().optional().catch(undefined),
    company_name: z.string().optional().catch(undefined),
    location: z.string().optional().catch(undefined),
    description: z.string().optional().catch(undefined),
    job_id: z.union([z.string(), z.number()]).optional().catch(undefined),
    detected_extensions: z.object({
        posted_at: z.string().optional().catch(undefined),
        schedule_type: z.string().optional().catch(undefined),
        work_from_home: z.boolean().optional().catch(undefined),
    }).passthrough().nullish().catch(null),
    related_links: LinkList,
    apply_options: LinkList,
    job_apply_link: z.string().optional().catch(undefined),
    share_link: z.string().optional().catch(undefined),
}).passthrough();

export type SerpApiJob = z.infer<typeof SerpApiJobSchema>;

export interface ApiItemContext extends ExtractionContext {
    pageNumber: number;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function firstHttpLink(links: SerpApiJob['related_links']): string {
    for (const entry of links ?? []) {
        const href = entry.link?.trim();
        if (href && href.startsWith('http')) return href;
    }
    return '';
}

export function serpApiSourceLink(item: SerpApiJob): string {
    return firstHttpLink(item.related_links)
        || firstHttpLink(item.apply_options)
        || cleanText(item.job_apply_link)
        || cleanText(item.share_link);
}

/** Stable id for items the provider did not assign one to. */
export function synthesizeJobId(ctx: ApiItemContext, index: number): string {
    return `serpapi:${ctx.query}@${ctx.searchLocation}:p${ctx.pageNumber}:${index}`;
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function serpApiItemToRecord(raw: unknown, index: number, ctx: ApiItemContext): RawJobRecord | null {
    const parsed = SerpApiJobSchema.safeParse(raw);
    if (!parsed.success) return null;

    const item = parsed.data;
    const title = cleanText(item.title);
    if (!title) return null;

    const ext = item.detected_extensions;
    const providerId = item.job_id === undefined ? '' : String(item.job_id).trim();
    const description = item.description?.trim() ?? '';

    return {
        origin: 'api',
        providerId: providerId || synthesizeJobId(ctx, index),
        title,
        company: cleanText(item.company_name) || 'Unknown Company',
        location: cleanText(item.location) || ctx.searchLocation,
        postedText: cleanText(ext?.posted_at) || undefined,
        description: description || undefined,
        url: serpApiSourceLink(item),
        employmentHint: cleanText(ext?.schedule_type) || undefined,
        remoteFlag: ext?.work_from_home === true,
        query: ctx.query,
        searchLocation: ctx.searchLocation,
        fetchedAt: ctx.fetchedAt,
    };
}

/** Maps a decoded `jobs_results` array. Anything other than an array yields no records. */
export function extractSerpApiJobs(items: unknown, ctx: ApiItemContext): RawJobRecord[] {
    if (!Array.isArray(items)) {
        log.debug(`[Extractor] ${ctx.sourceUrl}: API payload is not an array`);
        return [];
    }

    const records: RawJobRecord[] = [];
    items.forEach((item: unknown, index) => {
        const record = serpApiItemToRecord(item, index, ctx);
        if (record) {
            records.push(record);
        } else {
            log.debug(`[Extractor] ${ctx.sourceUrl}: dropped API item #${index}`);
        }
    });
    return records;
}
