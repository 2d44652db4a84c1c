import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    type ScraperFactory,
    discoverLinksCommand,
    extractArticlesCommand,
    retryFailedCommand,
    runPipelineCommand
} from './commands.js';
import { DocumentationScraper } from './scrapers/documentation-scraper.js';
import { saveDiscoveredLinks, saveExtractionResults } from './store/storage.js';
import { FakePageLoader, LISTING_URL, SAMPLE_RESULTS, articleHtml, listingHtml } from './test/fixtures.js';

const HELP_1 = 'https://help.moengage.com/hc/en-us/articles/1-Create-a-campaign';
const DEV_2 = 'https://developers.moengage.com/hc/en-us/articles/2-Web-SDK';
const HELP_3 = 'https://help.moengage.com/hc/en-us/articles/3-Segments';

const FAST = { delay: 0, retries: 0 };

let dir: string;
let output: string[];

function factoryFor(loader: FakePageLoader): ScraperFactory {
    return (config) => new DocumentationScraper(config, async () => loader);
}

function readSummary(file: string): { articles: Array<{ url: string; success: boolean }> } {
    return JSON.parse(fs.readFileSync(file, 'utf8'));
}

beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'help-center-commands-'));
    output = [];
    vi.spyOn(console, 'log').mockImplementation((line?: unknown) => {
        output.push(String(line));
    });
});

afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
});

describe('discoverLinksCommand', () => {
    it('saves the links and prints a per-source breakdown', async () => {
        const loader = new FakePageLoader({ [LISTING_URL]: listingHtml([HELP_1, DEV_2, HELP_3]) });
        const file = path.join(dir, 'links.json');

        const links = await discoverLinksCommand({ ...FAST, output: file }, factoryFor(loader));

        expect(links).toHaveLength(3);
        expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual(links);
        expect(output).toEqual([
            'Discovery complete. Found 3 articles.',
            'Articles by source:',
            '  help: 2',
            '  developers: 1'
        ]);
        expect(loader.closeCount).toBe(1);
    });

    it('writes nothing when no links are found', async () => {
        const file = path.join(dir, 'links.json');

        await discoverLinksCommand({ ...FAST, output: file }, factoryFor(new FakePageLoader()));

        expect(fs.existsSync(file)).toBe(false);
        expect(output).toEqual(['No links discovered.']);
    });
});

describe('extractArticlesCommand', () => {
    it('filters and limits the saved links before extracting', async () => {
        const linksFile = path.join(dir, 'links.json');
        saveDiscoveredLinks([
            { url: DEV_2, title: 'Web SDK', source: 'developers' },
            { url: HELP_1, title: 'Create a campaign', source: 'help' },
            { url: HELP_3, title: 'Segments', source: 'help' }
        ], linksFile);
        const loader = new FakePageLoader({ [HELP_1]: articleHtml('Create a campaign', ['Open it.']) });

        const saved = await extractArticlesCommand({
            ...FAST,
            linksFile,
            limit: 1,
            sources: ['help'],
            output: path.join(dir, 'documentation'),
            batchSize: 5
        }, factoryFor(loader));

        expect(loader.requested).toEqual([HELP_1]);
        expect(saved?.jsonFile).toBe(path.join(dir, 'documentation_complete.json'));
        expect(readSummary(path.join(dir, 'documentation_complete.json')).articles.map(a => a.url)).toEqual([HELP_1]);
        expect(output).toContain('Filtered to 2 articles from sources: help');
        expect(output).toContain('Limited to first 1 articles');
        expect(output).toContain('  Success rate: 100.0%');
    });

    it('discovers links first when the links file is missing', async () => {
        const linksFile = path.join(dir, 'links.json');
        const loader = new FakePageLoader({
            [LISTING_URL]: listingHtml([HELP_1]),
            [HELP_1]: articleHtml('Create a campaign', ['Open it.'])
        });

        await extractArticlesCommand({
            ...FAST,
            linksFile,
            limit: 0,
            output: path.join(dir, 'documentation'),
            batchSize: 5
        }, factoryFor(loader));

        expect(loader.requested).toEqual([LISTING_URL, HELP_1]);
        expect(fs.existsSync(linksFile)).toBe(true);
        expect(fs.existsSync(path.join(dir, 'documentation_summary.csv'))).toBe(true);
    });
});

describe('retryFailedCommand', () => {
    it('re-runs failed URLs and keeps earlier successes first', async () => {
        const previous = saveExtractionResults(SAMPLE_RESULTS, path.join(dir, 'documentation')).jsonFile;
        const failedUrl = SAMPLE_RESULTS[2].url;
        const loader = new FakePageLoader({ [failedUrl]: articleHtml('Recovered', ['Back online.']) });

        const saved = await retryFailedCommand({
            ...FAST,
            previousResults: previous,
            output: path.join(dir, 'documentation_retry'),
            batchSize: 5
        }, factoryFor(loader));

        expect(loader.requested).toEqual([failedUrl]);
        const articles = readSummary(saved?.jsonFile ?? '').articles;
        expect(articles.map(a => [a.url, a.success])).toEqual([
            [SAMPLE_RESULTS[0].url, true],
            [SAMPLE_RESULTS[1].url, true],
            [failedUrl, true]
        ]);
        expect(output).toContain('Found 1 failed articles to retry');
        expect(output).toContain('Retry completed. 1 additional articles extracted successfully.');
    });

    it('stops when the previous results file is missing', async () => {
        const missing = path.join(dir, 'missing.json');
        const factory = vi.fn(factoryFor(new FakePageLoader()));

        const saved = await retryFailedCommand({ ...FAST, previousResults: missing, output: 'x', batchSize: 5 }, factory);

        expect(saved).toBeNull();
        expect(factory).not.toHaveBeenCalled();
        expect(output).toEqual([`Previous results file ${missing} not found.`]);
    });

    it('stops when nothing failed', async () => {
        const previous = saveExtractionResults(SAMPLE_RESULTS.slice(0, 2), path.join(dir, 'clean')).jsonFile;

        const saved = await retryFailedCommand({ ...FAST, previousResults: previous, output: 'x', batchSize: 5 },
            factoryFor(new FakePageLoader()));

        expect(saved).toBeNull();
        expect(output).toEqual(['No failed articles found in previous results.']);
    });
});

describe('runPipelineCommand', () => {
    it('discovers, extracts and saves in one pass', async () => {
        const loader = new FakePageLoader({
            [LISTING_URL]: listingHtml([HELP_1, HELP_3]),
            [HELP_1]: articleHtml('Create a campaign', ['Open it.'])
        });

        const saved = await runPipelineCommand({ ...FAST, output: path.join(dir, 'run'), batchSize: 1 }, factoryFor(loader));

        const articles = readSummary(saved?.jsonFile ?? '').articles;
        expect(articles.map(a => [a.url, a.success])).toEqual([[HELP_1, true], [HELP_3, false]]);
        expect(output).toContain('  Failed: 1');
    });

    it('exits early when discovery finds nothing', async () => {
        const saved = await runPipelineCommand({ ...FAST, output: path.join(dir, 'run'), batchSize: 1 },
            factoryFor(new FakePageLoader()));

        expect(saved).toBeNull();
        expect(output).toEqual(['No documentation URLs found, exiting.']);
    });
});
