/**
 * src/config/linkedin.ts
 *
 * Selector map, search URL builder and page-classification tokens for
 * LinkedIn public job search (no login required).
 *
 * LAYOUT VARIANTS
 * ───────────────
 * The guest search page ships at least two card layouts depending on which
 * A/B variant is served:
 *   - the older `ul.jobs-search__results-list > li` list with
 *     `.job-search-card` children
 *   - the newer `div.base-card` cards with `data-entity-urn`
 * Selector arrays are ordered: the extractor uses the first candidate that
 * matches anything and ignores the rest.
 *
 * PAGINATION
 * ───────────
 * ?start=N, 25 results per page. `f_TPR=r<seconds>` restricts results to
 * postings newer than the given age.
 */

export const LINKEDIN_ORIGIN = 'https://www.linkedin.com';
export const LINKEDIN_PAGE_SIZE = 25;

/** Two years, in seconds. */
export const DEFAULT_POSTING_WINDOW_SECONDS = 63_072_000;

export const LinkedInSelectors = {

    // ── Search Results Page ─────────────────────────────────────────────────

    /** Card containers, newest-layout-last. First selector with a match wins. */
    jobCards: [
        'li.jobs-search__results-list > .job-search-card',
        'ul.jobs-search__results-list li',
        '.base-card',
        'li[data-occludable-job-id]',
        '.job-search-card',
    ],

    cardTitle: [
        'h3.base-search-card__title',
        '.job-search-card__title',
        'h3',
        '[class*="title"]',
    ],

    cardCompany: [
        'h4.base-search-card__subtitle',
        'a[data-tracking-control-name="public_jobs_jserp-result_job-search-card-subtitle"]',
        '.job-search-card__company-name',
        'h4',
    ],

    cardLocation: [
        '.job-search-card__location',
        'span.job-result-card__location',
        '[class*="location"]',
    ],

    cardDate: [
        'time',
        '[class*="date"]',
        '[class*="time"]',
    ],

    cardLink: [
        'a[href*="/jobs/view/"]',
        'a[href]',
    ],

    /** Identifier attributes, in resolution order. */
    jobIdAttrs: ['data-job-id', 'data-occludable-job-id'],
    entityUrnAttr: 'data-entity-urn',

    structuredData: 'script[type="application/ld+json"]',
} as const;

// ─── Page Classification ──────────────────────────────────────────────────────

/**
 * Challenge page fingerprints. Matched case-sensitively against the rendered
 * markup, so both spellings of "captcha" are listed.
 */
export const CAPTCHA_SIGNALS: readonly string[] = [
    'captcha',
    'CAPTCHA',
    'cf-captcha-container',
    'recaptcha',
    'challenge-form',
    'hCaptcha',
    'Please verify you are a human',
    'bot detection',
];

/**
 * Throttling fingerprints, matched case-insensitively. A bare "429" is not
 * listed: numeric job ids routinely contain it.
 */
export const RATE_LIMIT_SIGNALS: readonly string[] = [
    'too many requests',
    'rate limit',
    'slow down',
    'temporarily blocked',
];

/** Markers meaning the current page is the last one for the query. */
export const NO_RESULTS_SIGNALS: readonly string[] = [
    'No matching jobs found',
];
export const NO_RESULTS_CLASS = 'no-results';

// ─── URLs ─────────────────────────────────────────────────────────────────────

/**
 * Builds a LinkedIn public job search URL.
 *
 * @param keywords       e.g. "Backend Engineer"
 * @param location       plain text works, e.g. "India"
 * @param start          pagination offset: 0, 25, 50…
 * @param windowSeconds  maximum posting age
 */
export function buildLinkedInSearchUrl(
    keywords: string,
    location: string,
    start: number,
    windowSeconds: number = DEFAULT_POSTING_WINDOW_SECONDS,
): string {
    const params = new URLSearchParams({
        keywords,
        location,
        f_TPR: `r${windowSeconds}`,
        start: String(start),
        sortBy: 'DD',
    });
    return `${LINKEDIN_ORIGIN}/jobs/search/?${params.toString()}`;
}

/**
 * Extracts the trailing id from a "urn:li:jobPosting:3812345678" style value.
 * Returns null when there is no non-empty trailing segment.
 */
export function jobIdFromUrn(urn: string): string | null {
    const segment = urn.split(':').pop()?.trim();
    return segment ? segment : null;
}

/** Qualifies a relative href against the site origin. */
export function absoluteLinkedInUrl(href: string): string {
    if (/^https?:\/\//i.test(href)) return href;
    return new URL(href, LINKEDIN_ORIGIN).toString();
}
