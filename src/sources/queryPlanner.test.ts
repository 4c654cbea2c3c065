import { describe, it, expect } from 'vitest';
import { buildQueries, queryKey } from './queryPlanner.js';

describe('buildQueries', () => {
    it('expands roles × locations role-major', () => {
        const queries = buildQueries(
            ['Backend Engineer', 'ML Engineer'],
            [{ name: 'United States', code: 'us' }, 'India'],
        );

        expect(queries).toEqual([
            { keywords: 'Backend Engineer', location: 'United States' },
            { keywords: 'Backend Engineer', location: 'India' },
            { keywords: 'ML Engineer', location: 'United States' },
            { keywords: 'ML Engineer', location: 'India' },
        ]);
    });

    it('trims and skips blank entries', () => {
        expect(buildQueries(['  SRE ', ' '], ['', ' India '])).toEqual([{ keywords: 'SRE', location: 'India' }]);
    });

    it('drops case-insensitive repeats, keeping the first spelling', () => {
        expect(buildQueries(['Backend Engineer', 'backend engineer '], ['India', { name: 'india' }])).toEqual([
            { keywords: 'Backend Engineer', location: 'India' },
        ]);
    });

    it('yields nothing when either side is empty', () => {
        expect(buildQueries([], ['India'])).toEqual([]);
        expect(buildQueries(['SRE'], [])).toEqual([]);
    });
});

describe('queryKey', () => {
    it('joins keywords and location', () => {
        expect(queryKey({ keywords: 'Backend Engineer', location: 'India' })).toBe('Backend Engineer|India');
    });
});
