/**
 * src/utils/requestInterception.ts
 *
 * Request blocking for browser pages: tracker and analytics hosts, and
 * optionally heavy assets (images, fonts, media) that the job cards never
 * need.
 */

export type MinimalRoute = {
    request(): {
        url(): string;
        resourceType(): string;
    };
    abort(): Promise<void>;
    continue(): Promise<void>;
};

export type MinimalRoutablePage = {
    route(
        url: string,
        handler: (route: MinimalRoute) => Promise<void>
    ): Promise<void>;
};

export interface BlockingOptions {
    blockTrackers: boolean;
    blockHeavyAssets: boolean;
}

const TRACKER_PATTERNS = [
    'google-analytics',
    'facebook.net',
    'hotjar',
    'doubleclick',
    'googlesyndication',
    'googletagmanager',
    'linkedin.com/li/track',
    'bat.bing.com',
];

const HEAVY_RESOURCE_TYPES = new Set(['image', 'font', 'media']);

export function isTrackerUrl(requestUrl: string): boolean {
    return TRACKER_PATTERNS.some((pattern) => requestUrl.includes(pattern));
}

export function shouldBlockRequest(
    requestUrl: string,
    resourceType: string,
    options: BlockingOptions
): boolean {
    if (options.blockTrackers && isTrackerUrl(requestUrl)) return true;
    return options.blockHeavyAssets && HEAVY_RESOURCE_TYPES.has(resourceType);
}

/**
 * Routes every request of `page` through the blocklist. Does nothing when
 * both kinds of blocking are off. Resolves to whether a route was installed.
 */
export async function installRequestInterception(
    page: MinimalRoutablePage,
    options: BlockingOptions
): Promise<boolean> {
    if (!options.blockTrackers && !options.blockHeavyAssets) return false;

    await page.route('**/*', (route: MinimalRoute) => {
        const request = route.request();
        if (shouldBlockRequest(request.url(), request.resourceType(), options)) {
            return route.abort();
        }
        return route.continue();
    });
    return true;
}
