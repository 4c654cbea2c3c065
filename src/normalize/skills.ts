/**
 * src/normalize/skills.ts
 *
 * Vocabulary-driven skill and AI keyword extraction.
 */

import { getTaxonomy } from './taxonomy.js';
import { boundedPattern } from './phrases.js';

/**
 * Returns every vocabulary term found in `text` using its canonical spelling,
 * deduplicated case-insensitively and sorted.
 */
export function matchVocabulary(text: string, vocabulary: readonly string[]): string[] {
    if (!text.trim()) return [];
    const found = vocabulary.filter((term) => boundedPattern(term).test(text));
    return uniqueTerms(found).sort();
}

/** Trims entries and drops case-insensitive repeats, keeping the first spelling. */
export function uniqueTerms(terms: readonly string[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const raw of terms) {
        const term = raw.trim();
        const key = term.toLowerCase();
        if (!term || seen.has(key)) continue;
        seen.add(key);
        result.push(term);
    }
    return result;
}

export function extractSkills(text: string): string[] {
    return matchVocabulary(text, getTaxonomy().skills);
}

export interface AiMention {
    hasAiMention: boolean;
    aiKeywords: string[];
}

export function detectAiMention(text: string): AiMention {
    const aiKeywords = matchVocabulary(text, getTaxonomy().aiKeywords);
    return { hasAiMention: aiKeywords.length > 0, aiKeywords };
}
