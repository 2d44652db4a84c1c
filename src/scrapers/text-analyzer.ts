/**
 * Plain-text view of a single article: every text node of the article body,
 * one per line, with citation markers like [1] removed.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { CLEAN_TEXT_SELECTOR } from './scraper-config.js';

export const MISSING_CONTENT_MESSAGE = 'Could not find main content area.';

const CITATION_MARKER = /\[\d+\]/g;

function collectStrings($: CheerioAPI, nodes: Cheerio<AnyNode>, out: string[]): void {
    nodes.each((_, node) => {
        if (node.nodeType === 3) {
            out.push($(node).text());
        } else if (node.nodeType === 1 && !$(node).is('script, style')) {
            collectStrings($, $(node).contents(), out);
        }
    });
}

export function getCleanText(html: string): string {
    const $ = cheerio.load(html);
    const article = $(CLEAN_TEXT_SELECTOR).first();
    if (article.length === 0) {
        return MISSING_CONTENT_MESSAGE;
    }

    const strings: string[] = [];
    collectStrings($, article.contents(), strings);

    return strings.join('\n').trim().replace(CITATION_MARKER, '');
}
