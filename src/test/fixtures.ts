/**
 * In-process stand-ins for the network side of the scraper.
 */

import type { ArticleResult, LoadedPage } from '../types/index.js';
import type { LoadOptions, PageLoader } from '../scrapers/page-loader.js';

export const LISTING_URL = 'https://help.moengage.com/hc/en-us';

type Response = string | Error;

/**
 * Serves canned HTML by URL. A list of responses is consumed one per load,
 * the last one repeating; an Error is thrown instead of returned.
 */
export class FakePageLoader implements PageLoader {
    readonly kind = 'axios';
    readonly requested: string[] = [];
    readonly options: Array<LoadOptions | undefined> = [];
    closeCount = 0;

    private readonly responses = new Map<string, Response[]>();

    constructor(pages: Record<string, Response | Response[]> = {}) {
        for (const [url, response] of Object.entries(pages)) {
            this.responses.set(url, Array.isArray(response) ? [...response] : [response]);
        }
    }

    async load(url: string, options?: LoadOptions): Promise<LoadedPage> {
        this.requested.push(url);
        this.options.push(options);

        const queue = this.responses.get(url);
        if (!queue || queue.length === 0) {
            throw new Error(`No page for ${url}`);
        }
        const next = queue.length > 1 ? queue.shift() : queue[0];
        if (next instanceof Error) {
            throw next;
        }
        return { url, html: next ?? '' };
    }

    async close(): Promise<void> {
        this.closeCount++;
    }
}

export function articleHtml(title: string, paragraphs: string[]): string {
    return [
        '<html><body>',
        '<nav class="breadcrumbs"><a href="/hc/en-us">Help Center</a><a href="/hc/en-us/sections/1">Guides</a></nav>',
        `<h1 class="article-title">${title}</h1>`,
        '<time datetime="2024-03-01T10:00:00Z">March 1, 2024</time>',
        `<div class="article-body">${paragraphs.map(p => `<p>${p}</p>`).join('')}</div>`,
        '</body></html>'
    ].join('\n');
}

export function listingHtml(hrefs: string[]): string {
    return `<html><body>${hrefs.map((href, i) => `<a href="${href}">Article ${i + 1}</a>`).join('')}</body></html>`;
}

// Two successes (one with an image) and one failure
export const SAMPLE_RESULTS: ArticleResult[] = [
    {
        success: true,
        url: 'https://help.moengage.com/hc/en-us/articles/1-a',
        title: 'Campaigns, explained',
        sections: [
            {
                heading: 'Introduction',
                content: 'Intro.\n\n',
                images: [{ src: 'https://cdn.example.com/x.png', alt: '', title: '' }]
            },
            { heading: 'Setup', content: 'Steps.\n\n', images: [], level: 2 }
        ],
        fullText: 'Intro. Setup Steps.',
        wordCount: 120,
        lastModified: '2024-01-02',
        breadcrumbs: ['Home', 'Campaigns'],
        extractedAt: '2024-05-01T00:00:00.000Z'
    },
    {
        success: true,
        url: 'https://help.moengage.com/hc/en-us/articles/2-b',
        title: 'The "Quote" guide',
        sections: [],
        wordCount: 80,
        lastModified: '',
        breadcrumbs: [],
        extractedAt: '2024-05-01T00:00:01.000Z'
    },
    {
        success: false,
        url: 'https://help.moengage.com/hc/en-us/articles/3-c',
        error: 'Timeout 30000ms exceeded',
        extractedAt: '2024-05-01T00:00:02.000Z'
    }
];
