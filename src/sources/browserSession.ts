/**
 * src/sources/browserSession.ts
 *
 * Browser-mode fetch adapter: one stealth-configured Playwright browser and
 * context per session, one short-lived page per fetch.
 *
 * ANTI-DETECTION
 * ──────────────
 *  • Chromium launch flags that drop the AutomationControlled marker.
 *  • An init script, installed on the context before the first navigation,
 *    that hides navigator.webdriver, fakes plugins/languages, answers the
 *    notifications permission query and stubs window.chrome.
 *  • Fixed desktop viewport/locale/timezone with realistic Accept headers.
 *  • A fresh random User-Agent header on every page.
 *  • Tracker and analytics requests (and, when configured, images, fonts
 *    and media) aborted via request interception.
 *
 * FETCH
 * ─────
 * goto(domcontentloaded) → random delay → three staged scrolls (1/3, 2/3,
 * bottom) to trigger lazy rendering → page.content() → classify.
 * The page is closed on every exit path. The adapter never retries; the
 * orchestrator owns the retry/backoff state machine.
 */

import { log } from 'crawlee';
import { chromium, firefox, webkit } from 'playwright';
import {
    CAPTCHA_SIGNALS,
    LINKEDIN_PAGE_SIZE,
    NO_RESULTS_CLASS,
    NO_RESULTS_SIGNALS,
    RATE_LIMIT_SIGNALS,
    buildLinkedInSearchUrl,
} from '../config/linkedin.js';
import { installRequestInterception } from '../utils/requestInterception.js';
import type { MinimalRoutablePage } from '../utils/requestInterception.js';
import { errorMessage } from '../utils/errors.js';
import { randomBetween, sleep as defaultSleep } from '../utils/sleep.js';
import type { SleepFn } from '../utils/sleep.js';
import type {
    FetchAdapter,
    FetchOutcome,
    FetchResult,
    PageCursor,
    PauseKind,
    SearchQuery,
} from './types.js';

// ─── Minimal Browser Surface ──────────────────────────────────────────────────
// The subset of Playwright's Browser/BrowserContext/Page this adapter touches.
// Real Playwright objects satisfy these; tests pass in-process fakes.

export interface SessionPage extends MinimalRoutablePage {
    setExtraHTTPHeaders(headers: Record<string, string>): Promise<void>;
    goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>;
    evaluate(expression: string): Promise<unknown>;
    content(): Promise<string>;
    close(): Promise<void>;
}

export interface SessionContextOptions {
    userAgent: string;
    viewport: { width: number; height: number };
    locale: string;
    timezoneId: string;
    extraHTTPHeaders: Record<string, string>;
}

export interface SessionContext {
    addInitScript(script: () => void): Promise<unknown>;
    newPage(): Promise<SessionPage>;
}

export interface SessionBrowser {
    newContext(options: SessionContextOptions): Promise<SessionContext>;
    close(): Promise<void>;
}

export type BrowserEngine = 'chromium' | 'firefox' | 'webkit';

export interface LaunchSettings {
    engine: BrowserEngine;
    headless: boolean;
    args: string[];
}

export type BrowserLauncher = (settings: LaunchSettings) => Promise<SessionBrowser>;

// ─── Settings ─────────────────────────────────────────────────────────────────

export interface BrowserSessionSettings {
    engine: BrowserEngine;
    headless: boolean;
    minDelayMs: number;
    maxDelayMs: number;
    navigationTimeoutMs: number;
    postingWindowSeconds: number;
    blockTrackers: boolean;
    blockHeavyAssets: boolean;
}

export interface BrowserSessionDeps {
    launch?: BrowserLauncher;
    sleep?: SleepFn;
    random?: () => number;
}

export interface BrowserSessionAdapter extends FetchAdapter {
    readonly kind: 'browser';
    fetchPage(url: string): Promise<FetchOutcome>;
    randomDelay(signal?: AbortSignal): Promise<void>;
}

// ─── Constants ────────────────────────────────────────────────────────────────

export const USER_AGENTS = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:128.0) Gecko/20100101 Firefox/128.0',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4_1) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4.1 Safari/605.1.15',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
];

const CHROMIUM_ARGS = [
    '--disable-blink-features=AutomationControlled',
    '--disable-dev-shm-usage',
    '--no-sandbox',
    '--disable-setuid-sandbox',
    '--disable-infobars',
    '--window-size=1920,1080',
];

const CONTEXT_HEADERS: Record<string, string> = {
    'Accept-Language': 'en-US,en;q=0.9',
    'Accept-Encoding': 'gzip, deflate, br',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Upgrade-Insecure-Requests': '1',
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
};

/** Scroll targets as fractions of the document height, with the pause after each. */
const SCROLL_STEPS: ReadonlyArray<readonly [fraction: number, pauseMs: number]> = [
    [1 / 3, 1_000],
    [2 / 3, 1_000],
    [1, 1_500],
];

// ─── Stealth ──────────────────────────────────────────────────────────────────

/** Runs inside the page before any site script. */
export function stealthInitScript(): void {
    Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
    Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
    Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });

    const permissions = window.navigator.permissions;
    if (permissions) {
        const originalQuery = permissions.query.bind(permissions);
        Object.defineProperty(permissions, 'query', {
            value: (parameters: PermissionDescriptor) =>
                parameters.name === 'notifications'
                    ? Promise.resolve({ state: Notification.permission })
                    : originalQuery(parameters),
        });
    }

    Object.defineProperty(window, 'chrome', {
        value: { runtime: {}, loadTimes: () => undefined, csi: () => undefined, app: {} },
        configurable: true,
    });
}

export function randomUA(random: () => number = Math.random): string {
    const index = Math.min(Math.floor(random() * USER_AGENTS.length), USER_AGENTS.length - 1);
    return USER_AGENTS[index];
}

// ─── Classification ───────────────────────────────────────────────────────────

/** CAPTCHA beats throttling; anything else is a usable page. */
export function classifyMarkup(html: string): FetchOutcome {
    if (CAPTCHA_SIGNALS.some((signal) => html.includes(signal))) {
        return { kind: 'captcha' };
    }
    const lower = html.toLowerCase();
    if (RATE_LIMIT_SIGNALS.some((signal) => lower.includes(signal))) {
        return { kind: 'rate_limited' };
    }
    return { kind: 'success', payload: html };
}

export function hasNextPage(html: string): boolean {
    if (NO_RESULTS_SIGNALS.some((signal) => html.includes(signal))) return false;
    return !html.toLowerCase().includes(NO_RESULTS_CLASS);
}

export function nextCursor(cursor: PageCursor): PageCursor {
    return {
        pageNumber: cursor.pageNumber + 1,
        offset: cursor.offset + LINKEDIN_PAGE_SIZE,
    };
}

// ─── Default Launcher ─────────────────────────────────────────────────────────

const ENGINES = { chromium, firefox, webkit };

export const launchPlaywright: BrowserLauncher = (settings) =>
    ENGINES[settings.engine].launch({ headless: settings.headless, args: settings.args });

// ─── Adapter ──────────────────────────────────────────────────────────────────

export function createBrowserSession(
    settings: BrowserSessionSettings,
    deps: BrowserSessionDeps = {},
): BrowserSessionAdapter {
    const launch = deps.launch ?? launchPlaywright;
    const sleep = deps.sleep ?? defaultSleep;
    const random = deps.random ?? Math.random;

    let browser: SessionBrowser | null = null;
    let context: SessionContext | null = null;

    async function open(): Promise<void> {
        if (context) return;

        browser = await launch({
            engine: settings.engine,
            headless: settings.headless,
            args: settings.engine === 'chromium' ? [...CHROMIUM_ARGS] : [],
        });

        const ctx = await browser.newContext({
            userAgent: randomUA(random),
            viewport: { width: 1920, height: 1080 },
            locale: 'en-US',
            timezoneId: 'America/New_York',
            extraHTTPHeaders: { ...CONTEXT_HEADERS },
        });
        await ctx.addInitScript(stealthInitScript);
        context = ctx;

        log.info(`[BrowserSession] Started ${settings.engine} (headless=${settings.headless})`);
    }

    async function randomDelay(signal?: AbortSignal): Promise<void> {
        await sleep(randomBetween(settings.minDelayMs, settings.maxDelayMs, random), signal);
    }

    async function fetchPage(url: string): Promise<FetchOutcome> {
        if (!context) {
            return { kind: 'soft_failure', reason: 'browser session is not open' };
        }

        let page: SessionPage | null = null;
        try {
            page = await context.newPage();
            await installRequestInterception(page, {
                blockTrackers: settings.blockTrackers,
                blockHeavyAssets: settings.blockHeavyAssets,
            });
            await page.setExtraHTTPHeaders({ 'User-Agent': randomUA(random) });
            await page.goto(url, { waitUntil: 'domcontentloaded', timeout: settings.navigationTimeoutMs });
            await randomDelay();

            for (const [fraction, pauseMs] of SCROLL_STEPS) {
                await page.evaluate(`window.scrollTo(0, document.body.scrollHeight * ${fraction})`);
                await sleep(pauseMs);
            }

            const outcome = classifyMarkup(await page.content());
            if (outcome.kind === 'captcha') {
                log.warning(`[BrowserSession] CAPTCHA detected at ${url}`);
            } else if (outcome.kind === 'rate_limited') {
                log.warning(`[BrowserSession] Rate limited at ${url}`);
            }
            return outcome;
        } catch (err) {
            const reason = errorMessage(err);
            log.warning(`[BrowserSession] Error fetching ${url}: ${reason}`);
            return { kind: 'soft_failure', reason };
        } finally {
            if (page) {
                await page.close().catch((err: unknown) => {
                    log.debug(`[BrowserSession] page.close failed: ${errorMessage(err)}`);
                });
            }
        }
    }

    async function fetch(query: SearchQuery, cursor: PageCursor): Promise<FetchResult> {
        const url = buildLinkedInSearchUrl(
            query.keywords,
            query.location,
            cursor.offset,
            settings.postingWindowSeconds,
        );
        const outcome = await fetchPage(url);

        const next = outcome.kind === 'success' && !hasNextPage(outcome.payload)
            ? null
            : nextCursor(cursor);

        return { url, outcome, next };
    }

    async function pause(_kind: PauseKind, signal?: AbortSignal): Promise<void> {
        await randomDelay(signal);
    }

    async function close(): Promise<void> {
        const current = browser;
        browser = null;
        context = null;
        if (!current) return;

        try {
            await current.close();
            log.info('[BrowserSession] Browser closed');
        } catch (err) {
            log.warning(`[BrowserSession] Browser close failed: ${errorMessage(err)}`);
        }
    }

    return { kind: 'browser', open, fetch, fetchPage, randomDelay, pause, close };
}
