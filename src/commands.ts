/**
 * Command implementations behind the CLI. Each command builds its own scraper
 * from the global options and always closes it.
 */

import * as fs from 'fs';
import type { ArticleResult, DiscoveredLink, LinkSource } from './types/index.js';
import { type ScraperConfig, loadConfig } from './shared/config.js';
import { ResultsFileError } from './shared/errors.js';
import { DocumentationScraper } from './scrapers/documentation-scraper.js';
import { countLinksBySource, filterLinksBySource } from './scrapers/discovery.js';
import { getExtractionStatistics, successfulArticles } from './build/summary-generators.js';
import {
    type SavedFiles,
    loadDiscoveredLinks,
    loadPreviousResults,
    saveDiscoveredLinks,
    saveExtractionResults
} from './store/storage.js';

export interface GlobalOptions {
    baseUrl?: string;
    delay?: number;
    retries?: number;
}

export interface DiscoverOptions extends GlobalOptions {
    output: string;
}

export interface ExtractOptions extends GlobalOptions {
    linksFile: string;
    limit: number;
    sources?: LinkSource[];
    output: string;
    batchSize: number;
}

export interface RetryOptions extends GlobalOptions {
    previousResults: string;
    output: string;
    batchSize: number;
}

export interface RunOptions extends GlobalOptions {
    output: string;
    batchSize: number;
}

export type ScraperFactory = (config: ScraperConfig) => DocumentationScraper;

const defaultFactory: ScraperFactory = (config) => new DocumentationScraper(config);

function configFrom(options: GlobalOptions, defaults: Partial<ScraperConfig> = {}): ScraperConfig {
    return loadConfig({
        baseUrl: options.baseUrl,
        rateLimitDelay: options.delay,
        maxRetries: options.retries
    }, process.env, defaults);
}

async function withScraper<T>(
    config: ScraperConfig,
    factory: ScraperFactory,
    fn: (scraper: DocumentationScraper) => Promise<T>
): Promise<T> {
    const scraper = factory(config);
    try {
        return await fn(scraper);
    } finally {
        await scraper.close();
    }
}

export function printStatistics(results: ArticleResult[]): void {
    const stats = getExtractionStatistics(results);
    console.log('\nExtraction Statistics:');
    console.log(`  Total articles: ${stats.total_articles}`);
    console.log(`  Successful: ${stats.successful_extractions}`);
    console.log(`  Failed: ${stats.failed_extractions}`);
    console.log(`  Success rate: ${stats.success_rate.toFixed(1)}%`);

    if (stats.successful_extractions > 0) {
        console.log(`  Average word count: ${stats.average_word_count.toFixed(0)}`);
        console.log(`  Average sections per article: ${stats.average_sections.toFixed(1)}`);
        console.log(`  Articles with images: ${stats.articles_with_images}`);
    }
}

// ============================================
// discover
// ============================================

export async function discoverLinksCommand(
    options: DiscoverOptions,
    factory: ScraperFactory = defaultFactory
): Promise<DiscoveredLink[]> {
    return withScraper(configFrom(options), factory, async (scraper) => {
        const links = await scraper.discoverDocumentationLinks();

        if (links.length === 0) {
            console.log('No links discovered.');
            return links;
        }

        saveDiscoveredLinks(links, options.output);
        console.log(`Discovery complete. Found ${links.length} articles.`);
        console.log('Articles by source:');
        for (const [source, count] of countLinksBySource(links)) {
            console.log(`  ${source}: ${count}`);
        }
        return links;
    });
}

// ============================================
// extract
// ============================================

export async function extractArticlesCommand(
    options: ExtractOptions,
    factory: ScraperFactory = defaultFactory
): Promise<SavedFiles | null> {
    return withScraper(configFrom(options), factory, async (scraper) => {
        let links: DiscoveredLink[];
        if (fs.existsSync(options.linksFile)) {
            console.log(`Loading links from ${options.linksFile}`);
            links = loadDiscoveredLinks(options.linksFile);
        } else {
            console.log(`Links file ${options.linksFile} not found. Discovering links first...`);
            links = await scraper.discoverDocumentationLinks();
            saveDiscoveredLinks(links, options.linksFile);
        }

        if (links.length === 0) {
            console.log('No links available for extraction.');
            return null;
        }

        if (options.sources && options.sources.length > 0) {
            links = filterLinksBySource(links, options.sources);
            console.log(`Filtered to ${links.length} articles from sources: ${options.sources.join(', ')}`);
        }

        if (options.limit > 0) {
            links = links.slice(0, options.limit);
            console.log(`Limited to first ${links.length} articles`);
        }

        const urls = links.map(link => link.url);
        console.log(`Starting extraction of ${urls.length} articles...`);
        const results = await scraper.processArticlesBatch(urls, options.batchSize);

        const saved = saveExtractionResults(results, options.output);
        printStatistics(results);
        return saved;
    });
}

// ============================================
// retry
// ============================================

export async function retryFailedCommand(
    options: RetryOptions,
    factory: ScraperFactory = defaultFactory
): Promise<SavedFiles | null> {
    let previous: ArticleResult[];
    try {
        previous = loadPreviousResults(options.previousResults);
    } catch (err) {
        if (err instanceof ResultsFileError && err.reason === 'not_found') {
            console.log(`Previous results file ${options.previousResults} not found.`);
            return null;
        }
        if (err instanceof ResultsFileError) {
            console.log(`Error loading previous results: ${err.message}`);
            return null;
        }
        throw err;
    }

    const failedUrls = previous.filter(r => !r.success).map(r => r.url);
    if (failedUrls.length === 0) {
        console.log('No failed articles found in previous results.');
        return null;
    }

    console.log(`Found ${failedUrls.length} failed articles to retry`);

    return withScraper(configFrom(options), factory, async (scraper) => {
        const retryResults = await scraper.processArticlesBatch(failedUrls, options.batchSize);
        const combined: ArticleResult[] = [...successfulArticles(previous), ...retryResults];
        const saved = saveExtractionResults(combined, options.output);

        const recovered = successfulArticles(retryResults).length;
        console.log(`Retry completed. ${recovered} additional articles extracted successfully.`);
        return saved;
    });
}

// ============================================
// run (discover + extract + save)
// ============================================

export async function runPipelineCommand(
    options: RunOptions,
    factory: ScraperFactory = defaultFactory
): Promise<SavedFiles | null> {
    // the full pipeline waits longer between batches unless told otherwise
    const config = configFrom(options, { rateLimitDelay: 2.0 });

    return withScraper(config, factory, async (scraper) => {
        const links = await scraper.discoverDocumentationLinks();
        if (links.length === 0) {
            console.log('No documentation URLs found, exiting.');
            return null;
        }

        const results = await scraper.processArticlesBatch(links.map(l => l.url), options.batchSize);
        const saved = saveExtractionResults(results, options.output);
        printStatistics(results);
        return saved;
    });
}

// ============================================
// text
// ============================================

export async function cleanTextCommand(
    url: string,
    options: GlobalOptions,
    factory: ScraperFactory = defaultFactory
): Promise<string> {
    return withScraper(configFrom(options), factory, async (scraper) => {
        const text = await scraper.extractTextFromUrl(url);
        console.log(text);
        return text;
    });
}
