/**
 * Article parser
 *
 * Turns a rendered help-center article into structured content. The body is
 * split into sections at each heading among its direct children; everything
 * before the first heading lands in an "Introduction" section.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { ArticleImage, ArticleSection, ExtractedArticle, LoadedPage } from '../types/index.js';
import { absolutize } from '../shared/url-utils.js';
import { BODY_SELECTORS, BREADCRUMB_SELECTOR, TITLE_SELECTORS } from './scraper-config.js';

export type ParsedArticle = Omit<ExtractedArticle, 'success' | 'extractedAt'>;

const HEADING_TAG = /^h([1-6])$/;

function firstMatch($: CheerioAPI, selectors: string[]): Cheerio<Element> | null {
    for (const selector of selectors) {
        const match = $<Element, string>(selector).first();
        if (match.length > 0) return match;
    }
    return null;
}

function collectImages($: CheerioAPI, el: Element, pageUrl: string): ArticleImage[] {
    const images: ArticleImage[] = [];
    const candidates = el.tagName.toLowerCase() === 'img'
        ? [el, ...$(el).find('img').toArray()]
        : $(el).find('img').toArray();

    for (const img of candidates) {
        const raw = $(img).attr('src');
        if (!raw) continue;
        images.push({
            src: absolutize(raw, pageUrl) ?? raw,
            alt: $(img).attr('alt') || '',
            title: $(img).attr('title') || ''
        });
    }
    return images;
}

export function splitSections($: CheerioAPI, body: Cheerio<Element>, pageUrl: string): ArticleSection[] {
    const sections: ArticleSection[] = [];
    let current: ArticleSection = { heading: 'Introduction', content: '', images: [] };

    for (const child of body.children().toArray()) {
        const heading = HEADING_TAG.exec(child.tagName.toLowerCase());

        if (heading) {
            if (current.content.trim()) {
                sections.push(current);
            }
            current = {
                heading: $(child).text().trim(),
                content: '',
                images: [],
                level: parseInt(heading[1], 10)
            };
            continue;
        }

        const text = $(child).text().trim();
        if (text) {
            current.content += text + '\n\n';
        }
        current.images.push(...collectImages($, child, pageUrl));
    }

    if (current.content.trim()) {
        sections.push(current);
    }
    return sections;
}

export function countWords(text: string | undefined): number {
    return text ? text.split(/\s+/).length : 0;
}

export function parseArticle(page: LoadedPage): ParsedArticle {
    const $ = cheerio.load(page.html);
    const article: ParsedArticle = {
        url: page.url,
        wordCount: 0,
        lastModified: '',
        breadcrumbs: []
    };

    const title = firstMatch($, TITLE_SELECTORS);
    if (title) {
        article.title = title.text().trim();
    }

    const body = firstMatch($, BODY_SELECTORS);
    if (body) {
        article.sections = splitSections($, body, page.url);
        article.fullText = body.text().trim();
        article.htmlContent = body.html() ?? '';
    }

    article.wordCount = countWords(article.fullText);
    article.lastModified = $('time').first().attr('datetime') || '';
    article.breadcrumbs = $(BREADCRUMB_SELECTOR)
        .toArray()
        .map(a => $(a).text().trim())
        .filter(Boolean);

    return article;
}
