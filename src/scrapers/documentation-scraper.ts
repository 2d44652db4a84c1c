/**
 * Documentation Scraper
 *
 * Discovers article links on the help-center listing page and extracts each
 * article's content. One page loader (and so one browser) is shared by every
 * call until close(); each page gets its own browser context.
 */

import type { ArticleResult, DiscoveredLink, FailedArticle, LoadedPage } from '../types/index.js';
import type { ScraperConfig } from '../shared/config.js';
import { NavigationError } from '../shared/errors.js';
import { log, errorMessage } from '../shared/logging.js';
import { type LoadOptions, type PageLoader, type PageLoaderFactory, createPageLoader } from './page-loader.js';
import { parseDocumentationLinks } from './discovery.js';
import { parseArticle } from './article-parser.js';
import { getCleanText } from './text-analyzer.js';
import { LISTING_PATH, TEXT_SETTLE_MS } from './scraper-config.js';

export const DEFAULT_BATCH_SIZE = 5;

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export class DocumentationScraper {
    private loader: Promise<PageLoader> | null = null;

    constructor(
        readonly config: ScraperConfig,
        private readonly loaderFactory: PageLoaderFactory = createPageLoader
    ) {}

    private getLoader(): Promise<PageLoader> {
        if (!this.loader) {
            this.loader = this.loaderFactory(this.config);
        }
        return this.loader;
    }

    /**
     * Load a page, retrying with a linear backoff (attempt × retryBackoffMs).
     */
    private async loadWithRetry(url: string, options?: LoadOptions): Promise<LoadedPage> {
        const loader = await this.getLoader();
        const attempts = this.config.maxRetries + 1;
        let lastError = '';

        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                return await loader.load(url, options);
            } catch (err) {
                lastError = errorMessage(err);
                if (attempt < attempts) {
                    const backoff = attempt * this.config.retryBackoffMs;
                    log('warn', `[Scraper] Retry ${attempt} for ${url} after ${backoff}ms`, { error: lastError });
                    await sleep(backoff);
                }
            }
        }

        throw new NavigationError(url, attempts, lastError);
    }

    async discoverDocumentationLinks(): Promise<DiscoveredLink[]> {
        try {
            log('info', '[Discovery] Discovering documentation links...');
            const page = await this.loadWithRetry(`${this.config.baseUrl}${LISTING_PATH}`);
            const links = parseDocumentationLinks(page);
            log('info', `[Discovery] Found ${links.length} unique documentation articles`);
            return links;
        } catch (err) {
            log('error', '[Discovery] Error during link discovery', { error: errorMessage(err) });
            return [];
        }
    }

    /**
     * Never throws: failures come back as { success: false } results.
     */
    async extractArticleContent(url: string): Promise<ArticleResult> {
        try {
            const page = await this.loadWithRetry(url);
            return {
                ...parseArticle(page),
                extractedAt: new Date().toISOString(),
                success: true
            };
        } catch (err) {
            const message = errorMessage(err);
            log('error', `[Extractor] Error extracting ${url}`, { error: message });
            return {
                url,
                error: message,
                success: false,
                extractedAt: new Date().toISOString()
            };
        }
    }

    /**
     * Extract articles in consecutive chunks of batchSize, each chunk in parallel,
     * sleeping rateLimitDelay seconds between chunks. Results keep input order.
     */
    async processArticlesBatch(urls: string[], batchSize: number = DEFAULT_BATCH_SIZE): Promise<ArticleResult[]> {
        const size = Math.max(1, Math.floor(batchSize));
        const allResults: ArticleResult[] = [];
        const totalBatches = Math.ceil(urls.length / size);

        log('info', `[Batch] Processing ${urls.length} articles in ${totalBatches} batches of ${size}`);

        for (let i = 0; i < urls.length; i += size) {
            const batch = urls.slice(i, i + size);
            const batchNum = i / size + 1;

            log('info', `[Batch] Batch ${batchNum}/${totalBatches} - processing ${batch.length} articles...`);

            const settled = await Promise.allSettled(batch.map(url => this.extractArticleContent(url)));

            settled.forEach((outcome, j) => {
                if (outcome.status === 'rejected') {
                    const failed: FailedArticle = {
                        url: batch[j],
                        error: errorMessage(outcome.reason),
                        success: false
                    };
                    log('warn', `[Batch] Failed: ${batch[j]} - ${failed.error}`);
                    allResults.push(failed);
                    return;
                }

                const result = outcome.value;
                if (result.success) {
                    const title = (result.title || 'Untitled').slice(0, 50);
                    log('info', `[Batch] Success: ${title}...`);
                } else {
                    log('warn', `[Batch] Partial: ${batch[j]}`);
                }
                allResults.push(result);
            });

            if (i + size < urls.length) {
                await sleep(this.config.rateLimitDelay * 1000);
            }
        }

        const successCount = allResults.filter(r => r.success).length;
        log('info', `[Batch] Completed: ${successCount}/${urls.length} articles successfully extracted`);

        return allResults;
    }

    async extractTextFromUrl(url: string): Promise<string> {
        const page = await this.loadWithRetry(url, { settleMs: TEXT_SETTLE_MS });
        return getCleanText(page.html);
    }

    async close(): Promise<void> {
        if (!this.loader) return;
        const pending = this.loader;
        this.loader = null;

        let loader: PageLoader;
        try {
            loader = await pending;
        } catch (err) {
            // the launch failure was already reported to whoever loaded a page
            log('debug', '[Scraper] No page loader to close', { error: errorMessage(err) });
            return;
        }
        await loader.close();
    }
}
