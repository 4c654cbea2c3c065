/**
 * src/extractors/structuredData.ts
 *
 * Fallback extraction from schema.org JobPosting blocks
 * (`<script type="application/ld+json">`).
 *
 * A block may hold a single object, an array of objects, or a `@graph`
 * container; all three are walked. A block that is not valid JSON is skipped
 * and the remaining blocks still count.
 */

import type { CheerioAPI } from 'cheerio';
import { log } from 'crawlee';
import { z } from 'zod';
import { LinkedInSelectors } from '../config/linkedin.js';
import type { RawJobRecord } from '../sources/types.js';
import { cleanText, stripHtml } from './text.js';
import type { ExtractionContext } from './linkedinCards.js';

// ─── Schema ───────────────────────────────────────────────────────────────────

const NamedThing = z.union([
    z.string(),
    z.object({ name: z.string().optional() }).passthrough(),
]);

const AddressSchema = z.object({
    streetAddress: z.string().optional().catch(undefined),
    addressLocality: z.string().optional().catch(undefined),
    addressRegion: z.string().optional().catch(undefined),
    addressCountry: NamedThing.optional().catch(undefined),
}).passthrough();

const PlaceSchema = z.object({
    name: z.string().optional().catch(undefined),
    address: z.union([AddressSchema, z.string()]).optional().catch(undefined),
}).passthrough();

const IdentifierSchema = z.union([
    z.string(),
    z.number(),
    z.object({ value: z.union([z.string(), z.number()]).optional() }).passthrough(),
]);

const JsonLdJobPostingSchema = z.object({
    title: z.string(),
    hiringOrganization: NamedThing.optional().catch(undefined),
    jobLocation: z.union([PlaceSchema, z.array(PlaceSchema)]).optional().catch(undefined),
    datePosted: z.string().optional().catch(undefined),
    description: z.string().optional().catch(undefined),
    url: z.string().optional().catch(undefined),
    employmentType: z.union([z.string(), z.array(z.string())]).optional().catch(undefined),
    jobLocationType: z.string().optional().catch(undefined),
    identifier: IdentifierSchema.optional().catch(undefined),
}).passthrough();

type JsonLdJobPosting = z.infer<typeof JsonLdJobPostingSchema>;
type NamedValue = z.infer<typeof NamedThing>;

// ─── Graph Walking ────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJobPostingType(type: unknown): boolean {
    if (type === 'JobPosting') return true;
    return Array.isArray(type) && type.includes('JobPosting');
}

/** Collects every JobPosting node reachable through arrays and @graph. */
export function collectJobPostingNodes(node: unknown, out: Record<string, unknown>[] = []): Record<string, unknown>[] {
    if (Array.isArray(node)) {
        for (const child of node) collectJobPostingNodes(child, out);
        return out;
    }
    if (!isRecord(node)) return out;

    if (isJobPostingType(node['@type'])) out.push(node);
    if ('@graph' in node) collectJobPostingNodes(node['@graph'], out);
    return out;
}

// ─── Field Mapping ────────────────────────────────────────────────────────────

function nameOf(value: NamedValue | undefined): string {
    if (value === undefined) return '';
    return cleanText(typeof value === 'string' ? value : value.name);
}

function formatLocation(jobLocation: JsonLdJobPosting['jobLocation']): string {
    const places = Array.isArray(jobLocation) ? jobLocation : jobLocation ? [jobLocation] : [];

    for (const place of places) {
        const address = place.address;
        if (typeof address === 'string') {
            const text = cleanText(address);
            if (text) return text;
            continue;
        }
        if (address) {
            const parts = [
                address.streetAddress,
                address.addressLocality,
                address.addressRegion,
                nameOf(address.addressCountry),
            ].map((p) => cleanText(p)).filter((p) => p.length > 0);
            if (parts.length > 0) return parts.join(', ');
        }
        const name = cleanText(place.name);
        if (name) return name;
    }
    return '';
}

function identifierOf(identifier: JsonLdJobPosting['identifier']): string | undefined {
    if (identifier === undefined) return undefined;
    const raw = typeof identifier === 'object' ? identifier.value : identifier;
    const text = raw === undefined ? '' : String(raw).trim();
    return text || undefined;
}

export function jobPostingToRecord(node: unknown, ctx: ExtractionContext): RawJobRecord | null {
    const parsed = JsonLdJobPostingSchema.safeParse(node);
    if (!parsed.success) return null;

    const job = parsed.data;
    const title = cleanText(job.title);
    if (!title) return null;

    const employment = Array.isArray(job.employmentType)
        ? job.employmentType.join(' ')
        : job.employmentType;
    const description = job.description ? stripHtml(job.description) : '';

    return {
        origin: 'structured_data',
        providerId: identifierOf(job.identifier),
        title,
        company: nameOf(job.hiringOrganization) || 'Unknown',
        location: formatLocation(job.jobLocation) || ctx.searchLocation,
        postedText: cleanText(job.datePosted) || undefined,
        description: description || undefined,
        url: cleanText(job.url),
        employmentHint: cleanText(employment) || undefined,
        workplaceHint: cleanText(job.jobLocationType) || undefined,
        query: ctx.query,
        searchLocation: ctx.searchLocation,
        fetchedAt: ctx.fetchedAt,
    };
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function extractStructuredData($: CheerioAPI, ctx: ExtractionContext): RawJobRecord[] {
    const records: RawJobRecord[] = [];

    $(LinkedInSelectors.structuredData).each((index, el) => {
        const content = $(el).html() ?? '';
        if (!content.includes('JobPosting')) return;

        let data: unknown;
        try {
            data = JSON.parse(content);
        } catch (err) {
            log.debug(`[Extractor] Skipping malformed JSON-LD block #${index} on ${ctx.sourceUrl}: ${String(err)}`);
            return;
        }

        for (const node of collectJobPostingNodes(data)) {
            const record = jobPostingToRecord(node, ctx);
            if (record) records.push(record);
        }
    });

    return records;
}
