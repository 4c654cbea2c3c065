/**
 * src/extractors/text.ts
 *
 * Text clean-up shared by the extraction paths.
 */

import * as cheerio from 'cheerio';

const TAG = /<[^>]*>/g;

/** Collapses whitespace runs and trims. */
export function cleanText(text: string | null | undefined): string {
    return (text ?? '').replace(/\s+/g, ' ').trim();
}

/** Strips markup (including entity-escaped markup) down to plain text. */
export function stripHtml(html: string): string {
    const decoded = cheerio.load(html.replace(TAG, ' '), null, false).text();
    return cleanText(decoded.replace(TAG, ' '));
}
