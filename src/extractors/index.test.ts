import { describe, it, expect } from 'vitest';
import { SERPAPI_MARKER } from '../sources/serpApi.js';
import type { RawPage } from '../sources/types.js';
import { ExtractionError, extractRecords, isApiPayload } from './index.js';

function page(payload: string): RawPage {
    return {
        sourceUrl: 'serpapi://google_jobs/SRE@India?page=1',
        payload,
        query: 'SRE',
        location: 'India',
        pageNumber: 1,
        fetchedAt: new Date('2024-06-15T12:00:00.000Z'),
        succeeded: true,
    };
}

describe('extractRecords', () => {
    it('routes marked payloads to the API path', () => {
        const result = extractRecords(page(SERPAPI_MARKER + JSON.stringify([{ title: 'SRE', job_id: 'j1' }])));

        expect(result.strategy).toBe('api');
        expect(result.records).toHaveLength(1);
        expect(result.records[0]?.providerId).toBe('j1');
        expect(result.records[0]?.searchLocation).toBe('India');
    });

    it('throws when the API payload is not JSON', () => {
        expect(() => extractRecords(page(`${SERPAPI_MARKER}[{"title":`))).toThrow(ExtractionError);
    });

    it('routes everything else to the markup path', () => {
        const result = extractRecords(page('<ul class="jobs-search__results-list"><li><h3>SRE</h3></li></ul>'));

        expect(result.strategy).toBe('cards');
        expect(result.records[0]?.origin).toBe('card');
    });
});

describe('isApiPayload', () => {
    it('checks for the marker prefix only', () => {
        expect(isApiPayload(`${SERPAPI_MARKER}[]`)).toBe(true);
        expect(isApiPayload(`<p>${SERPAPI_MARKER}</p>`)).toBe(false);
    });
});
