/**
 * Shapes of the JSON files read back from disk (discovered links, previous
 * extraction results). Missing optional fields get the extractor's defaults.
 */

import { z } from 'zod';

export const linkSourceSchema = z.enum(['help', 'developers', 'partners']);

export const discoveredLinkSchema = z.object({
    url: z.string().min(1),
    title: z.string().default(''),
    source: linkSourceSchema
});

export const discoveredLinksSchema = z.array(discoveredLinkSchema);

const articleImageSchema = z.object({
    src: z.string(),
    alt: z.string().default(''),
    title: z.string().default('')
});

const articleSectionSchema = z.object({
    heading: z.string(),
    content: z.string(),
    images: z.array(articleImageSchema).default([]),
    level: z.number().int().optional()
});

const extractedArticleSchema = z.object({
    success: z.literal(true),
    url: z.string(),
    title: z.string().optional(),
    sections: z.array(articleSectionSchema).optional(),
    fullText: z.string().optional(),
    htmlContent: z.string().optional(),
    wordCount: z.number().default(0),
    lastModified: z.string().default(''),
    breadcrumbs: z.array(z.string()).default([]),
    extractedAt: z.string().default('')
}).passthrough();

const failedArticleSchema = z.object({
    success: z.literal(false),
    url: z.string(),
    error: z.string().default(''),
    extractedAt: z.string().optional()
}).passthrough();

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// An entry that never recorded success counts as failed, so retry picks it up.
export const articleResultSchema = z.preprocess(
    value => (isRecord(value) && value.success === undefined ? { ...value, success: false } : value),
    z.discriminatedUnion('success', [extractedArticleSchema, failedArticleSchema])
);

export const extractionSummarySchema = z.object({
    extraction_summary: z.object({
        total_articles: z.number(),
        successful_extractions: z.number(),
        failed_extractions: z.number(),
        average_word_count: z.number(),
        extraction_timestamp: z.string()
    }).partial().optional(),
    articles: z.array(articleResultSchema)
});
