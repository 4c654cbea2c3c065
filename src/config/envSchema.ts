import { z } from 'zod';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const numOrNullFromTruthy = z.preprocess((v) => {
    if (v === undefined) return null;
    if (typeof v === 'string') return v ? Number(v) : null;
    return v;
}, z.number().finite().nullable());

function jsonFromEnv<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess((v, ctx) => {
        if (typeof v !== 'string') return v;
        try {
            return JSON.parse(v);
        } catch {
            ctx.addIssue({ code: 'custom', message: 'Invalid JSON', fatal: true });
            return z.NEVER;
        }
    }, schema);
}

const locationEntry = z.union([
    z.string().min(1),
    z.object({ name: z.string().min(1), code: z.string().optional() }),
]);

export const envSchema = z.object({
    DATA_SOURCE_MODE: z.enum(['browser', 'api']).default('browser'),

    SEARCH_ROLES: jsonFromEnv(z.array(z.string().min(1)).min(1, 'Expected at least one role'))
        .default(['Software Engineer', 'Backend Engineer', 'ML Engineer']),
    SEARCH_LOCATIONS: jsonFromEnv(z.array(locationEntry).min(1, 'Expected at least one location'))
        .default([{ name: 'United States', code: 'us' }, { name: 'India', code: 'in' }]),

    SCRAPER_HEADLESS: boolUnlessFalse.default(true),
    SCRAPER_BROWSER: z.enum(['chromium', 'firefox', 'webkit']).default('chromium'),
    SCRAPER_MIN_DELAY_MS: numFromEnv.pipe(z.number().min(0)).default(2000),
    SCRAPER_MAX_DELAY_MS: numFromEnv.pipe(z.number().min(0)).default(5000),
    SCRAPER_MAX_PAGES: numFromEnv.pipe(z.number().int().min(1)).default(3),
    SCRAPER_MAX_RETRIES: numFromEnv.pipe(z.number().int().min(1)).default(3),
    SCRAPER_BACKOFF_FACTOR: numFromEnv.pipe(z.number().min(1)).default(2),
    SCRAPER_NAV_TIMEOUT_MS: numFromEnv.pipe(z.number().int().min(1000)).default(30_000),
    SCRAPER_BLOCK_TRACKERS: boolUnlessFalse.default(true),
    SCRAPER_BLOCK_HEAVY_ASSETS: boolStrictTrue.default(false),
    SCRAPER_PARALLEL_SESSIONS: numFromEnv.pipe(z.number().int().min(1).max(8)).default(1),

    POSTING_WINDOW_SECONDS: numFromEnv.pipe(z.number().int().min(3600)).default(63_072_000),

    SERPAPI_API_KEY: z.string().optional(),
    SERPAPI_PAGES_PER_QUERY: numOrNullFromTruthy.default(null),

    VERBOSE: boolStrictTrue.default(false),
    CRAWLEE_LOG_LEVEL: z.string().default(''),
}).passthrough().superRefine((env, ctx) => {
    if (env.SCRAPER_MIN_DELAY_MS > env.SCRAPER_MAX_DELAY_MS) {
        ctx.addIssue({
            code: 'custom',
            path: ['SCRAPER_MIN_DELAY_MS'],
            message: 'Must not exceed SCRAPER_MAX_DELAY_MS',
        });
    }
});

export type Env = z.infer<typeof envSchema>;

/** Unset-equivalent: blank values fall back to schema defaults. */
export function withoutBlankValues(raw: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    const next: NodeJS.ProcessEnv = {};
    for (const [key, value] of Object.entries(raw)) {
        if (value !== undefined && value.trim() !== '') next[key] = value;
    }
    return next;
}

export function formatEnvIssues(err: z.ZodError): string {
    const lines = err.issues.map((i) => {
        const key = i.path.join('.') || '(root)';
        return `- ${key}: ${i.message}`;
    });
    return 'Invalid environment variables:\n' + lines.join('\n');
}
