/**
 * Summary generation: the JSON summary document, the CSV overview and the
 * statistics printed after a run.
 */

import type { ArticleResult, ExtractedArticle, ExtractionStatistics, ExtractionSummary } from '../types/index.js';

export const CSV_COLUMNS = [
    'URL',
    'Title',
    'Word Count',
    'Last Modified',
    'Extracted At',
    'Breadcrumbs',
    'Section Count'
];

export function successfulArticles(results: ArticleResult[]): ExtractedArticle[] {
    return results.filter((r): r is ExtractedArticle => r.success);
}

function average(values: number[]): number {
    return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

// =====================================================================
// JSON summary
// =====================================================================

export function buildExtractionSummary(results: ArticleResult[], now: Date = new Date()): ExtractionSummary {
    const successful = successfulArticles(results);
    return {
        extraction_summary: {
            total_articles: results.length,
            successful_extractions: successful.length,
            failed_extractions: results.length - successful.length,
            average_word_count: average(successful.map(r => r.wordCount || 0)),
            extraction_timestamp: now.toISOString()
        },
        articles: results
    };
}

// =====================================================================
// CSV
// =====================================================================

/**
 * Quote only fields that contain a delimiter, a quote or a line break.
 */
export function csvField(value: string | number): string {
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function generateSummaryCSV(results: ArticleResult[]): string {
    const rows = successfulArticles(results).map(article => [
        article.url || '',
        article.title || '',
        article.wordCount || 0,
        article.lastModified || '',
        article.extractedAt || '',
        (article.breadcrumbs || []).join(' > '),
        (article.sections || []).length
    ]);

    return [CSV_COLUMNS, ...rows]
        .map(row => row.map(csvField).join(',') + '\n')
        .join('');
}

// =====================================================================
// Statistics
// =====================================================================

export function getExtractionStatistics(results: ArticleResult[]): ExtractionStatistics {
    const successful = successfulArticles(results);
    const total = results.length;

    return {
        total_articles: total,
        successful_extractions: successful.length,
        failed_extractions: total - successful.length,
        success_rate: total > 0 ? (successful.length / total) * 100 : 0,
        average_word_count: average(successful.map(r => r.wordCount || 0)),
        average_sections: average(successful.map(r => (r.sections || []).length)),
        articles_with_images: successful.filter(r =>
            (r.sections || []).some(section => section.images.length > 0)
        ).length
    };
}
