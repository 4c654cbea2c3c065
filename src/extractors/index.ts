/**
 * src/extractors/index.ts
 *
 * Extraction engine entry point. Routes a raw page to the API-JSON path when
 * its payload carries the SerpApi marker, to the markup path otherwise.
 */

import { log } from 'crawlee';
import { SERPAPI_MARKER } from '../sources/serpApi.js';
import type { RawJobRecord, RawPage } from '../sources/types.js';
import { errorMessage } from '../utils/errors.js';
import { ExtractionError } from './errors.js';
import { extractFromMarkup } from './linkedinCards.js';
import type { ExtractionContext, MarkupStrategy } from './linkedinCards.js';
import { extractSerpApiJobs } from './serpApiJobs.js';

export type ExtractionStrategy = MarkupStrategy | 'api';

export interface PageExtraction {
    strategy: ExtractionStrategy;
    records: RawJobRecord[];
}

export function isApiPayload(payload: string): boolean {
    return payload.startsWith(SERPAPI_MARKER);
}

/**
 * Extracts raw records from one successfully fetched page.
 * Throws ExtractionError only when the payload as a whole cannot be decoded.
 */
export function extractRecords(page: RawPage): PageExtraction {
    const ctx: ExtractionContext = {
        sourceUrl: page.sourceUrl,
        query: page.query,
        searchLocation: page.location,
        fetchedAt: page.fetchedAt,
    };

    if (isApiPayload(page.payload)) {
        let items: unknown;
        try {
            items = JSON.parse(page.payload.slice(SERPAPI_MARKER.length));
        } catch (err) {
            throw new ExtractionError(page.sourceUrl, `invalid API payload: ${errorMessage(err)}`);
        }
        const records = extractSerpApiJobs(items, { ...ctx, pageNumber: page.pageNumber });
        return { strategy: 'api', records };
    }

    const { strategy, records, droppedCards } = extractFromMarkup(page.payload, ctx);
    if (droppedCards > 0) {
        log.debug(`[Extractor] ${page.sourceUrl}: ${droppedCards} card(s) dropped`);
    }
    if (strategy === 'none') {
        log.debug(`[Extractor] ${page.sourceUrl}: no cards and no structured data`);
    }
    return { strategy, records };
}

export { ExtractionError } from './errors.js';
