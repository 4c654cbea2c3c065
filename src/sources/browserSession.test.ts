import { describe, it, expect, vi } from 'vitest';
import type { MinimalRoute } from '../utils/requestInterception.js';
import type { SleepFn } from '../utils/sleep.js';
import {
    USER_AGENTS,
    classifyMarkup,
    createBrowserSession,
    hasNextPage,
    randomUA,
    stealthInitScript,
} from './browserSession.js';
import type {
    BrowserLauncher,
    BrowserSessionSettings,
    SessionBrowser,
    SessionContext,
    SessionPage,
} from './browserSession.js';

const SETTINGS: BrowserSessionSettings = {
    engine: 'chromium',
    headless: true,
    minDelayMs: 0,
    maxDelayMs: 0,
    navigationTimeoutMs: 1_000,
    postingWindowSeconds: 86_400,
    blockTrackers: true,
    blockHeavyAssets: false,
};

const QUERY = { keywords: 'Backend Engineer', location: 'India' };
const FIRST = { pageNumber: 1, offset: 0 };

const RESULTS_HTML = '<ul class="jobs-search__results-list"><li><h3>Backend Engineer</h3></li></ul>';

function createFakes(html: string | Error = RESULTS_HTML) {
    const page = {
        route: vi.fn<SessionPage['route']>(async () => {}),
        setExtraHTTPHeaders: vi.fn<SessionPage['setExtraHTTPHeaders']>(async () => {}),
        goto: vi.fn<SessionPage['goto']>(async () => {
            if (html instanceof Error) throw html;
            return null;
        }),
        evaluate: vi.fn<SessionPage['evaluate']>(async () => undefined),
        content: vi.fn<SessionPage['content']>(async () => (typeof html === 'string' ? html : '')),
        close: vi.fn<SessionPage['close']>(async () => {}),
    };
    const context = {
        addInitScript: vi.fn<SessionContext['addInitScript']>(async () => {}),
        newPage: vi.fn<SessionContext['newPage']>(async () => page),
    };
    const browser = {
        newContext: vi.fn<SessionBrowser['newContext']>(async () => context),
        close: vi.fn<SessionBrowser['close']>(async () => {}),
    };
    const launch = vi.fn<BrowserLauncher>(async () => browser);
    const sleep = vi.fn<SleepFn>(async () => {});

    return { page, context, browser, launch, sleep };
}

function imageRoute() {
    return {
        request: () => ({ url: () => 'https://media.licdn.com/logo.png', resourceType: () => 'image' }),
        abort: vi.fn<MinimalRoute['abort']>(async () => {}),
        continue: vi.fn<MinimalRoute['continue']>(async () => {}),
    };
}

describe('createBrowserSession', () => {
    it('launches a stealth-configured context on open', async () => {
        const fakes = createFakes();
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep, random: () => 0 });

        await session.open();

        const launchSettings = fakes.launch.mock.calls[0]?.[0];
        expect(launchSettings?.engine).toBe('chromium');
        expect(launchSettings?.args).toContain('--disable-blink-features=AutomationControlled');

        const contextOptions = fakes.browser.newContext.mock.calls[0]?.[0];
        expect(contextOptions?.viewport).toEqual({ width: 1920, height: 1080 });
        expect(contextOptions?.locale).toBe('en-US');
        expect(contextOptions?.timezoneId).toBe('America/New_York');
        expect(contextOptions?.userAgent).toBe(USER_AGENTS[0]);

        expect(fakes.context.addInitScript).toHaveBeenCalledWith(stealthInitScript);
    });

    it('passes no launch flags to other engines', async () => {
        const fakes = createFakes();
        const session = createBrowserSession({ ...SETTINGS, engine: 'firefox' }, { launch: fakes.launch, sleep: fakes.sleep });

        await session.open();

        expect(fakes.launch.mock.calls[0]?.[0].args).toEqual([]);
    });

    it('fetches, scrolls and returns the markup with the next cursor', async () => {
        const fakes = createFakes();
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep, random: () => 0 });
        await session.open();

        const result = await session.fetch(QUERY, FIRST);

        expect(result.outcome).toEqual({ kind: 'success', payload: RESULTS_HTML });
        expect(result.next).toEqual({ pageNumber: 2, offset: 25 });
        expect(result.url).toBe(
            'https://www.linkedin.com/jobs/search/?keywords=Backend+Engineer&location=India&f_TPR=r86400&start=0&sortBy=DD',
        );

        expect(fakes.page.route).toHaveBeenCalledTimes(1);
        expect(fakes.page.setExtraHTTPHeaders).toHaveBeenCalledWith({ 'User-Agent': USER_AGENTS[0] });
        expect(fakes.page.goto).toHaveBeenCalledWith(result.url, { waitUntil: 'domcontentloaded', timeout: 1_000 });
        expect(fakes.page.evaluate).toHaveBeenCalledTimes(3);
        expect(fakes.page.evaluate.mock.calls[2]?.[0]).toBe('window.scrollTo(0, document.body.scrollHeight * 1)');
        expect(fakes.sleep.mock.calls.map((call) => call[0])).toEqual([0, 1_000, 1_000, 1_500]);
        expect(fakes.page.close).toHaveBeenCalledTimes(1);
    });

    it('drops heavy assets on session pages when configured', async () => {
        const fakes = createFakes();
        const session = createBrowserSession({ ...SETTINGS, blockHeavyAssets: true }, { launch: fakes.launch, sleep: fakes.sleep });
        await session.open();
        await session.fetch(QUERY, FIRST);

        const handler = fakes.page.route.mock.calls[0]?.[1];
        const image = imageRoute();
        await handler?.(image);

        expect(image.abort).toHaveBeenCalledTimes(1);
        expect(image.continue).not.toHaveBeenCalled();
    });

    it('lets heavy assets load by default', async () => {
        const fakes = createFakes();
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep });
        await session.open();
        await session.fetch(QUERY, FIRST);

        const handler = fakes.page.route.mock.calls[0]?.[1];
        const image = imageRoute();
        await handler?.(image);

        expect(image.continue).toHaveBeenCalledTimes(1);
    });

    it('skips request routing when all blocking is off', async () => {
        const fakes = createFakes();
        const session = createBrowserSession({ ...SETTINGS, blockTrackers: false }, { launch: fakes.launch, sleep: fakes.sleep });
        await session.open();
        await session.fetch(QUERY, FIRST);

        expect(fakes.page.route).not.toHaveBeenCalled();
    });

    it('builds the URL from the cursor offset', async () => {
        const fakes = createFakes();
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep });
        await session.open();

        const result = await session.fetch(QUERY, { pageNumber: 3, offset: 50 });

        expect(result.url).toContain('start=50');
        expect(result.next).toEqual({ pageNumber: 4, offset: 75 });
    });

    it('reports the last page when results run out', async () => {
        const fakes = createFakes('<div class="no-results">No matching jobs found</div>');
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep });
        await session.open();

        const result = await session.fetch(QUERY, FIRST);

        expect(result.outcome.kind).toBe('success');
        expect(result.next).toBeNull();
    });

    it('classifies challenge pages and still closes the page', async () => {
        const fakes = createFakes('<div id="cf-captcha-container"></div>');
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep });
        await session.open();

        const result = await session.fetch(QUERY, FIRST);

        expect(result.outcome).toEqual({ kind: 'captcha' });
        expect(fakes.page.close).toHaveBeenCalledTimes(1);
    });

    it('turns navigation errors into soft failures and closes the page', async () => {
        const fakes = createFakes(new Error('net::ERR_TIMED_OUT'));
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep });
        await session.open();

        const outcome = await session.fetchPage('https://www.linkedin.com/jobs/search/');

        expect(outcome).toEqual({ kind: 'soft_failure', reason: 'net::ERR_TIMED_OUT' });
        expect(fakes.page.close).toHaveBeenCalledTimes(1);
    });

    it('does not fetch before open', async () => {
        const fakes = createFakes();
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep });

        const outcome = await session.fetchPage('https://www.linkedin.com/jobs/search/');

        expect(outcome).toEqual({ kind: 'soft_failure', reason: 'browser session is not open' });
        expect(fakes.context.newPage).not.toHaveBeenCalled();
    });

    it('closes the browser once and tolerates close errors', async () => {
        const fakes = createFakes();
        fakes.browser.close.mockRejectedValueOnce(new Error('already gone'));
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep });
        await session.open();

        await expect(session.close()).resolves.toBeUndefined();
        await expect(session.close()).resolves.toBeUndefined();

        expect(fakes.browser.close).toHaveBeenCalledTimes(1);
    });

    it('closing a session that never opened does nothing', async () => {
        const fakes = createFakes();
        const session = createBrowserSession(SETTINGS, { launch: fakes.launch, sleep: fakes.sleep });

        await session.close();

        expect(fakes.launch).not.toHaveBeenCalled();
    });
});

describe('classifyMarkup', () => {
    it('ranks CAPTCHA above throttling', () => {
        expect(classifyMarkup('<p>Too many requests</p><div class="g-recaptcha"></div>')).toEqual({ kind: 'captcha' });
    });

    it('detects throttling case-insensitively', () => {
        expect(classifyMarkup('<h1>Too Many Requests</h1>')).toEqual({ kind: 'rate_limited' });
    });

    it('does not treat numbers containing 429 as throttling', () => {
        const html = '<li data-job-id="3842912345">Backend Engineer</li>';
        expect(classifyMarkup(html)).toEqual({ kind: 'success', payload: html });
    });
});

describe('hasNextPage', () => {
    it('stops on the no-results markers', () => {
        expect(hasNextPage('<section class="no-results"></section>')).toBe(false);
        expect(hasNextPage(RESULTS_HTML)).toBe(true);
    });
});

describe('randomUA', () => {
    it('always returns a pool entry', () => {
        expect(randomUA(() => 0)).toBe(USER_AGENTS[0]);
        expect(randomUA(() => 0.9999999)).toBe(USER_AGENTS[USER_AGENTS.length - 1]);
        expect(randomUA(() => 1)).toBe(USER_AGENTS[USER_AGENTS.length - 1]);
    });
});
