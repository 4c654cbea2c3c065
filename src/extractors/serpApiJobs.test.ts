import { describe, it, expect } from 'vitest';
import { extractSerpApiJobs, serpApiItemToRecord, serpApiSourceLink, synthesizeJobId } from './serpApiJobs.js';
import type { ApiItemContext } from './serpApiJobs.js';

const CTX: ApiItemContext = {
    sourceUrl: 'serpapi://google_jobs/ML Engineer@United States?page=2',
    query: 'ML Engineer',
    searchLocation: 'United States',
    fetchedAt: new Date('2024-06-15T12:00:00.000Z'),
    pageNumber: 2,
};

const ITEM = {
    title: 'Machine Learning Engineer',
    company_name: 'Globex',
    location: 'Seattle, WA',
    description: 'Train models.',
    job_id: 'abc123',
    detected_extensions: { posted_at: '2 days ago', schedule_type: 'Full-time', work_from_home: true },
    related_links: [{ link: 'javascript:void(0)' }, { link: 'https://globex.example/careers/1' }],
    share_link: 'https://www.google.com/search?q=share',
};

describe('serpApiItemToRecord', () => {
    it('maps a Google Jobs item', () => {
        expect(serpApiItemToRecord(ITEM, 0, CTX)).toEqual({
            origin: 'api',
            providerId: 'abc123',
            title: 'Machine Learning Engineer',
            company: 'Globex',
            location: 'Seattle, WA',
            postedText: '2 days ago',
            description: 'Train models.',
            url: 'https://globex.example/careers/1',
            employmentHint: 'Full-time',
            remoteFlag: true,
            query: 'ML Engineer',
            searchLocation: 'United States',
            fetchedAt: CTX.fetchedAt,
        });
    });

    it('synthesizes an id when the provider gives none', () => {
        const record = serpApiItemToRecord({ title: 'SRE' }, 7, CTX);
        expect(record?.providerId).toBe('serpapi:ML Engineer@United States:p2:7');
        expect(record?.company).toBe('Unknown Company');
        expect(record?.location).toBe('United States');
        expect(record?.remoteFlag).toBe(false);
        expect(record?.url).toBe('');
    });

    it('drops items without a title', () => {
        expect(serpApiItemToRecord({ company_name: 'Globex' }, 0, CTX)).toBeNull();
        expect(serpApiItemToRecord('not an object', 0, CTX)).toBeNull();
    });
});

describe('serpApiSourceLink', () => {
    it('prefers related links, then apply options, then the apply and share links', () => {
        expect(serpApiSourceLink({ apply_options: [{ link: 'https://apply.example/1' }], share_link: 'https://share.example' }))
            .toBe('https://apply.example/1');
        expect(serpApiSourceLink({ job_apply_link: ' https://apply.example/2 ' })).toBe('https://apply.example/2');
        expect(serpApiSourceLink({ share_link: 'https://share.example' })).toBe('https://share.example');
    });
});

describe('extractSerpApiJobs', () => {
    it('keeps valid items in order and skips the rest', () => {
        const records = extractSerpApiJobs([ITEM, { title: '' }, { title: 'Data Engineer' }], CTX);
        expect(records.map((r) => r.title)).toEqual(['Machine Learning Engineer', 'Data Engineer']);
        expect(records[1]?.providerId).toBe(synthesizeJobId(CTX, 2));
    });

    it('returns nothing for a non-array payload', () => {
        expect(extractSerpApiJobs({ jobs: [] }, CTX)).toEqual([]);
    });
});
