import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { collectJobPostingNodes, extractStructuredData, jobPostingToRecord } from './structuredData.js';
import type { ExtractionContext } from './linkedinCards.js';

const CTX: ExtractionContext = {
    sourceUrl: 'https://www.linkedin.com/jobs/search/?keywords=SRE&location=India&start=0',
    query: 'SRE',
    searchLocation: 'India',
    fetchedAt: new Date('2024-06-15T12:00:00.000Z'),
};

function ldScript(body: string): string {
    return `<script type="application/ld+json">${body}</script>`;
}

describe('collectJobPostingNodes', () => {
    it('walks arrays and @graph containers', () => {
        const nodes = collectJobPostingNodes([
            { '@type': 'JobPosting', title: 'A' },
            { '@graph': [{ '@type': 'Organization' }, { '@type': ['JobPosting', 'Thing'], title: 'B' }] },
        ]);
        expect(nodes.map((n) => n['title'])).toEqual(['A', 'B']);
    });
});

describe('jobPostingToRecord', () => {
    it('maps schema.org fields onto a raw record', () => {
        const record = jobPostingToRecord({
            '@type': 'JobPosting',
            title: ' Site Reliability Engineer ',
            hiringOrganization: { '@type': 'Organization', name: 'Initech' },
            jobLocation: [{ '@type': 'Place', address: { addressLocality: 'Pune', addressCountry: { name: 'India' } } }],
            datePosted: '2024-06-01',
            description: '<p>Run <b>Kubernetes</b> &amp; Terraform</p><ul><li>On call</li></ul>',
            url: 'https://example.com/jobs/42',
            employmentType: ['FULL_TIME', 'CONTRACTOR'],
            jobLocationType: 'TELECOMMUTE',
            identifier: { '@type': 'PropertyValue', value: 42 },
        }, CTX);

        expect(record).toEqual({
            origin: 'structured_data',
            providerId: '42',
            title: 'Site Reliability Engineer',
            company: 'Initech',
            location: 'Pune, India',
            postedText: '2024-06-01',
            description: 'Run Kubernetes & Terraform On call',
            url: 'https://example.com/jobs/42',
            employmentHint: 'FULL_TIME CONTRACTOR',
            workplaceHint: 'TELECOMMUTE',
            query: 'SRE',
            searchLocation: 'India',
            fetchedAt: CTX.fetchedAt,
        });
    });

    it('defaults company and location', () => {
        const record = jobPostingToRecord({ '@type': 'JobPosting', title: 'SRE' }, CTX);
        expect(record?.company).toBe('Unknown');
        expect(record?.location).toBe('India');
        expect(record?.providerId).toBeUndefined();
    });

    it('tolerates malformed optional fields', () => {
        const record = jobPostingToRecord({ '@type': 'JobPosting', title: 'SRE', datePosted: 20240601, jobLocation: 'Pune' }, CTX);
        expect(record?.postedText).toBeUndefined();
        expect(record?.location).toBe('India');
    });

    it('rejects nodes without a title', () => {
        expect(jobPostingToRecord({ '@type': 'JobPosting', title: '   ' }, CTX)).toBeNull();
        expect(jobPostingToRecord({ '@type': 'JobPosting' }, CTX)).toBeNull();
    });
});

describe('extractStructuredData', () => {
    it('skips malformed blocks and keeps the rest', () => {
        const $ = cheerio.load([
            ldScript('{"@type":"JobPosting","title":'),
            ldScript('{"@type":"JobPosting","title":"SRE","hiringOrganization":"Initech"}'),
            ldScript('{"@type":"BreadcrumbList"}'),
        ].join('\n'));

        const records = extractStructuredData($, CTX);

        expect(records).toHaveLength(1);
        expect(records[0]?.company).toBe('Initech');
    });
});
