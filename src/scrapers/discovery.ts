/**
 * Documentation link discovery: pick article links out of the listing page.
 */

import * as cheerio from 'cheerio';
import type { DiscoveredLink, LinkSource, LoadedPage } from '../types/index.js';
import { absolutize } from '../shared/url-utils.js';
import { DOCUMENTATION_SOURCES, type DocumentationSource, articlePattern } from './scraper-config.js';

interface RawLink {
    href: string;
    text: string;
}

export function collectLinks(page: LoadedPage): RawLink[] {
    const $ = cheerio.load(page.html);
    const links: RawLink[] = [];

    $('a[href]').each((_, el) => {
        const href = absolutize($(el).attr('href') || '', page.url);
        if (!href) return;
        links.push({
            href,
            text: $(el).text().trim()
        });
    });

    return links;
}

export function classifySource(
    url: string,
    sources: DocumentationSource[] = DOCUMENTATION_SOURCES
): LinkSource {
    const match = sources.find(s => url.includes(s.host));
    return (match ?? sources[sources.length - 1]).source;
}

/**
 * Keep links matching an article pattern, deduped by exact URL in first-seen order.
 */
export function parseDocumentationLinks(
    page: LoadedPage,
    sources: DocumentationSource[] = DOCUMENTATION_SOURCES
): DiscoveredLink[] {
    const patterns = sources.map(s => articlePattern(s.host));
    const seen = new Set<string>();
    const results: DiscoveredLink[] = [];

    for (const link of collectLinks(page)) {
        if (!patterns.some(p => p.test(link.href))) continue;
        if (seen.has(link.href)) continue;
        seen.add(link.href);
        results.push({
            url: link.href,
            title: link.text,
            source: classifySource(link.href, sources)
        });
    }

    return results;
}

export function filterLinksBySource(links: DiscoveredLink[], sources: LinkSource[]): DiscoveredLink[] {
    return links.filter(link => sources.includes(link.source));
}

export function countLinksBySource(links: DiscoveredLink[]): Map<LinkSource, number> {
    const counts = new Map<LinkSource, number>();
    for (const link of links) {
        counts.set(link.source, (counts.get(link.source) ?? 0) + 1);
    }
    return counts;
}
