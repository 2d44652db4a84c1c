/**
 * Help Center Scraper Configuration
 *
 * Defines the documentation sources, the article URL patterns, the DOM selectors
 * used for extraction, and the browser launch settings.
 */

import type { LinkSource } from '../types/index.js';

export interface DocumentationSource {
    source: LinkSource;
    host: string;
}

export const DEFAULT_BASE_URL = 'https://help.moengage.com';

// Article listing page, relative to the base URL
export const LISTING_PATH = '/hc/en-us';

// Order matters: a URL is attributed to the first source whose host it contains
export const DOCUMENTATION_SOURCES: DocumentationSource[] = [
    { source: 'help', host: 'help.moengage.com' },
    { source: 'developers', host: 'developers.moengage.com' },
    { source: 'partners', host: 'partners.moengage.com' }
];

export const LINK_SOURCES: LinkSource[] = DOCUMENTATION_SOURCES.map(s => s.source);

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Article URLs look like https://<host>/hc/en-us/articles/<numeric id>-<slug>
 */
export function articlePattern(host: string): RegExp {
    return new RegExp(`^https://${escapeRegExp(host)}/hc/en-us/articles/\\d+-`);
}

// ============================================
// EXTRACTION SELECTORS
// ============================================

export const TITLE_SELECTORS = [
    'h6.article-title',
    'h1.article-title',
    '.article-title',
    'h1',
    '.page-title'
];

export const BODY_SELECTORS = [
    'div.article__body',
    '.article-body',
    '.content'
];

export const BREADCRUMB_SELECTOR = '.breadcrumbs a, nav a';

// Used by the plain-text analyzer
export const CLEAN_TEXT_SELECTOR = 'div.article-body';

// ============================================
// BROWSER SETTINGS
// ============================================

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const VIEWPORT = { width: 1920, height: 1080 };

export const BROWSER_ARGS = [
    '--disable-blink-features=AutomationControlled',
    '--disable-dev-shm-usage',
    '--no-sandbox'
];

// Time given to client-side scripts before the analyzer reads the page
export const TEXT_SETTLE_MS = 5000;
