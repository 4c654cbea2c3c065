/**
 * src/extractors/linkedinCards.ts
 *
 * Markup path of the extraction engine: LinkedIn guest search result cards.
 *
 * STRATEGY
 * ────────
 *  1. Try each card selector in order; the first one that matches anything
 *     defines the card set (the other selectors are not consulted).
 *  2. Resolve every field of a card through its own ordered candidate list,
 *     taking the first non-empty value.
 *  3. A card that throws or has no title is dropped on its own; the rest of
 *     the page is unaffected.
 *  4. No card selector matched at all → fall back to JSON-LD JobPosting
 *     blocks embedded in the page.
 */

import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { log } from 'crawlee';
import { LinkedInSelectors, absoluteLinkedInUrl, jobIdFromUrn } from '../config/linkedin.js';
import type { RawJobRecord } from '../sources/types.js';
import { errorMessage } from '../utils/errors.js';
import { extractStructuredData } from './structuredData.js';
import { cleanText } from './text.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ExtractionContext {
    sourceUrl: string;
    query: string;
    searchLocation: string;
    fetchedAt: Date;
}

export type MarkupStrategy = 'cards' | 'structured_data' | 'none';

export interface MarkupExtraction {
    strategy: MarkupStrategy;
    records: RawJobRecord[];
    droppedCards: number;
}

// ─── Field Resolution ─────────────────────────────────────────────────────────

function firstText($card: Cheerio<Element>, selectors: readonly string[]): string {
    for (const selector of selectors) {
        const text = cleanText($card.find(selector).first().text());
        if (text) return text;
    }
    return '';
}

function cardJobId($card: Cheerio<Element>): string | undefined {
    const holders = [
        $card,
        $card.find('[data-job-id], [data-occludable-job-id], [data-entity-urn]').first(),
    ];

    for (const $el of holders) {
        for (const attr of LinkedInSelectors.jobIdAttrs) {
            const value = $el.attr(attr)?.trim();
            if (value) return value;
        }
        const urn = $el.attr(LinkedInSelectors.entityUrnAttr);
        const fromUrn = urn ? jobIdFromUrn(urn) : null;
        if (fromUrn) return fromUrn;
    }
    return undefined;
}

function cardPostedText($card: Cheerio<Element>): string | undefined {
    for (const selector of LinkedInSelectors.cardDate) {
        const $date = $card.find(selector).first();
        if ($date.length === 0) continue;
        const value = cleanText($date.attr('datetime')) || cleanText($date.text());
        if (value) return value;
    }
    return undefined;
}

function cardLink($card: Cheerio<Element>): string {
    for (const selector of LinkedInSelectors.cardLink) {
        const href = $card.find(selector).first().attr('href')?.trim();
        if (href) return absoluteLinkedInUrl(href);
    }
    return '';
}

export function parseCard($card: Cheerio<Element>, ctx: ExtractionContext): RawJobRecord | null {
    const title = firstText($card, LinkedInSelectors.cardTitle);
    if (!title) return null;

    return {
        origin: 'card',
        providerId: cardJobId($card),
        title,
        company: firstText($card, LinkedInSelectors.cardCompany) || 'Unknown Company',
        location: firstText($card, LinkedInSelectors.cardLocation) || ctx.searchLocation,
        postedText: cardPostedText($card),
        url: cardLink($card),
        query: ctx.query,
        searchLocation: ctx.searchLocation,
        fetchedAt: ctx.fetchedAt,
    };
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function extractFromMarkup(html: string, ctx: ExtractionContext): MarkupExtraction {
    const $ = cheerio.load(html);

    let cards: Cheerio<Element> | null = null;
    for (const selector of LinkedInSelectors.jobCards) {
        const found = $.root().find(selector);
        if (found.length > 0) {
            cards = found;
            break;
        }
    }

    if (!cards) {
        const records = extractStructuredData($, ctx);
        return { strategy: records.length > 0 ? 'structured_data' : 'none', records, droppedCards: 0 };
    }

    const records: RawJobRecord[] = [];
    let droppedCards = 0;

    cards.each((index, el) => {
        try {
            const record = parseCard($(el), ctx);
            if (record) {
                records.push(record);
            } else {
                droppedCards++;
            }
        } catch (err) {
            droppedCards++;
            log.debug(`[Extractor] Card #${index} on ${ctx.sourceUrl} failed: ${errorMessage(err)}`);
        }
    });

    return { strategy: 'cards', records, droppedCards };
}
