import * as fs from 'fs';
import * as path from 'path';
import type { ArticleResult, DiscoveredLink } from '../types/index.js';
import { ResultsFileError } from '../shared/errors.js';
import { log, errorMessage } from '../shared/logging.js';
import { buildExtractionSummary, generateSummaryCSV } from '../build/summary-generators.js';
import { discoveredLinksSchema, extractionSummarySchema } from './schemas.js';

export const DEFAULT_LINKS_FILE = 'discovered_links.json';
export const DEFAULT_OUTPUT_PREFIX = 'documentation';

export interface SavedFiles {
    jsonFile: string;
    csvFile: string;
}

function ensureParentDir(file: string): void {
    const dir = path.dirname(file);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

function writeJSON(file: string, data: unknown): void {
    ensureParentDir(file);
    fs.writeFileSync(file, JSON.stringify(data, null, 2), 'utf8');
}

function readJSON(file: string): unknown {
    if (!fs.existsSync(file)) {
        throw new ResultsFileError(file, 'not_found', `${file} not found`);
    }
    try {
        return JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (err) {
        throw new ResultsFileError(file, 'invalid', `${file} is not valid JSON: ${errorMessage(err)}`);
    }
}

/**
 * Write <prefix>_complete.json (every result plus totals) and
 * <prefix>_summary.csv (one row per successful article).
 */
export function saveExtractionResults(
    results: ArticleResult[],
    outputPrefix: string = DEFAULT_OUTPUT_PREFIX
): SavedFiles {
    const jsonFile = `${outputPrefix}_complete.json`;
    writeJSON(jsonFile, buildExtractionSummary(results));

    const csvFile = `${outputPrefix}_summary.csv`;
    ensureParentDir(csvFile);
    fs.writeFileSync(csvFile, generateSummaryCSV(results), 'utf8');

    log('info', `[Storage] Saved JSON: ${jsonFile}`);
    log('info', `[Storage] Saved CSV: ${csvFile}`);

    return { jsonFile, csvFile };
}

export function saveDiscoveredLinks(links: DiscoveredLink[], file: string = DEFAULT_LINKS_FILE): void {
    writeJSON(file, links);
    log('info', `[Storage] Saved ${links.length} links to ${file}`);
}

export function loadDiscoveredLinks(file: string = DEFAULT_LINKS_FILE): DiscoveredLink[] {
    const parsed = discoveredLinksSchema.safeParse(readJSON(file));
    if (!parsed.success) {
        throw new ResultsFileError(file, 'invalid', `${file} does not contain a list of links: ${parsed.error.issues[0]?.message}`);
    }
    return parsed.data;
}

/**
 * Read the articles array back out of a <prefix>_complete.json file.
 */
export function loadPreviousResults(file: string): ArticleResult[] {
    const parsed = extractionSummarySchema.safeParse(readJSON(file));
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ResultsFileError(file, 'invalid', `${file} is not an extraction summary: ${issue?.path.join('.')} ${issue?.message}`);
    }
    return parsed.data.articles;
}
