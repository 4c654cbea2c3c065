import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { getTaxonomy, parseTaxonomy } from './taxonomy.js';

const minimal = {
    skills: ['Python'],
    aiKeywords: ['LLM'],
    roles: [{ category: 'Backend Engineer', phrases: ['backend'] }],
    experience: [{ level: 'Senior', phrases: ['senior'] }],
    workType: { hybrid: ['hybrid'], remote: ['remote'], onsite: ['onsite'] },
    employmentType: { contract: ['contract'], partTime: ['part-time'], internship: ['internship'] },
    regions: { unitedStates: ['usa'], india: ['india'] },
};

describe('parseTaxonomy', () => {
    it('turns category tables into value rules', () => {
        const taxonomy = parseTaxonomy(minimal);
        expect(taxonomy.roles).toEqual([{ value: 'Backend Engineer', phrases: ['backend'] }]);
        expect(Object.isFrozen(taxonomy.roles[0])).toBe(true);
    });

    it('rejects categories outside the canonical set', () => {
        const bad = { ...minimal, roles: [{ category: 'Astronaut', phrases: ['space'] }] };
        expect(() => parseTaxonomy(bad)).toThrow(ZodError);
    });

    it('rejects empty phrase lists', () => {
        expect(() => parseTaxonomy({ ...minimal, skills: [] })).toThrow(ZodError);
    });
});

describe('getTaxonomy', () => {
    it('loads the bundled tables once', () => {
        const taxonomy = getTaxonomy();
        expect(getTaxonomy()).toBe(taxonomy);
        expect(taxonomy.roles[0]?.value).toBe('ML/AI Engineer');
        expect(taxonomy.roles[taxonomy.roles.length - 1]?.value).toBe('Software Engineer');
        expect(taxonomy.skills).toContain('Kubernetes');
    });
});
