/**
 * Page Loaders
 *
 * Everything that touches the network goes through a PageLoader:
 * - PlaywrightPageLoader renders the page in a shared headless Chromium,
 *   one browser context per page
 * - AxiosPageLoader fetches the static HTML (no client-side rendering)
 * - createPageLoader picks one from the configured strategy, falling back to
 *   axios when the browser cannot be launched
 */

import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import axios from 'axios';
import type { LoadedPage } from '../types/index.js';
import type { ScraperConfig } from '../shared/config.js';
import { log, errorMessage } from '../shared/logging.js';
import { BROWSER_ARGS, VIEWPORT } from './scraper-config.js';

export interface LoadOptions {
    // Extra wait after navigation, for content rendered by late scripts
    settleMs?: number;
}

export interface PageLoader {
    readonly kind: 'playwright' | 'axios';
    load(url: string, options?: LoadOptions): Promise<LoadedPage>;
    close(): Promise<void>;
}

const ACCEPT_HEADERS = {
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9'
};

const STEALTH_INIT_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
`;

// ============================================
// PLAYWRIGHT
// ============================================

export async function launchBrowser(): Promise<Browser> {
    return chromium.launch({
        headless: true,
        args: BROWSER_ARGS
    });
}

export async function createStealthContext(browser: Browser, userAgent: string): Promise<BrowserContext> {
    return browser.newContext({
        userAgent,
        viewport: VIEWPORT,
        locale: 'en-US',
        javaScriptEnabled: true,
        extraHTTPHeaders: ACCEPT_HEADERS
    });
}

export async function applyStealthScripts(page: Page): Promise<void> {
    await page.addInitScript(STEALTH_INIT_SCRIPT);
}

export class PlaywrightPageLoader implements PageLoader {
    readonly kind = 'playwright';

    constructor(
        private readonly browser: Browser,
        private readonly config: Pick<ScraperConfig, 'userAgent' | 'navigationTimeoutMs'>
    ) {}

    async load(url: string, options?: LoadOptions): Promise<LoadedPage> {
        const context = await createStealthContext(this.browser, this.config.userAgent);
        try {
            const page = await context.newPage();
            await applyStealthScripts(page);
            await page.goto(url, {
                waitUntil: 'networkidle',
                timeout: this.config.navigationTimeoutMs
            });
            if (options?.settleMs) {
                await page.waitForTimeout(options.settleMs);
            }
            return { url: page.url(), html: await page.content() };
        } finally {
            await context.close();
        }
    }

    async close(): Promise<void> {
        await this.browser.close();
        log('debug', '[PageLoader] Browser closed');
    }
}

// ============================================
// AXIOS
// ============================================

export class AxiosPageLoader implements PageLoader {
    readonly kind = 'axios';

    constructor(private readonly config: Pick<ScraperConfig, 'userAgent' | 'navigationTimeoutMs'>) {}

    async load(url: string): Promise<LoadedPage> {
        const response = await axios.get<string>(url, {
            timeout: this.config.navigationTimeoutMs,
            headers: {
                'User-Agent': this.config.userAgent,
                ...ACCEPT_HEADERS,
                'Cache-Control': 'no-cache'
            },
            maxRedirects: 5,
            validateStatus: (s) => s < 400,
            responseType: 'text'
        });
        // the node adapter follows redirects; the last response knows where they ended
        const finalUrl: unknown = response.request?.res?.responseUrl;
        return { url: typeof finalUrl === 'string' && finalUrl ? finalUrl : url, html: response.data };
    }

    async close(): Promise<void> {
        // no persistent resources
    }
}

// ============================================
// FACTORY
// ============================================

export type PageLoaderFactory = (config: ScraperConfig) => Promise<PageLoader>;

export async function createPageLoader(
    config: ScraperConfig,
    launch: () => Promise<Browser> = launchBrowser
): Promise<PageLoader> {
    if (config.strategy === 'axios') {
        return new AxiosPageLoader(config);
    }

    try {
        const browser = await launch();
        log('info', '[PageLoader] Playwright browser launched');
        return new PlaywrightPageLoader(browser, config);
    } catch (err) {
        if (config.strategy === 'playwright') {
            throw err;
        }
        log('warn', '[PageLoader] Failed to launch Playwright browser, using static HTML fetches', {
            error: errorMessage(err)
        });
        return new AxiosPageLoader(config);
    }
}
