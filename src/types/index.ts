// Help center sources an article URL can belong to
export type LinkSource = 'help' | 'developers' | 'partners';

export type DiscoveredLink = {
    url: string;
    title: string;
    source: LinkSource;
};

export type ArticleImage = {
    src: string;
    alt: string;
    title: string;
};

export type ArticleSection = {
    heading: string;
    content: string;
    images: ArticleImage[];
    level?: number;  // absent on the leading "Introduction" section
};

export type ExtractedArticle = {
    success: true;
    url: string;
    title?: string;
    sections?: ArticleSection[];
    fullText?: string;
    htmlContent?: string;
    wordCount: number;
    lastModified: string;
    breadcrumbs: string[];
    extractedAt: string;
};

export type FailedArticle = {
    success: false;
    url: string;
    error: string;
    extractedAt?: string;
};

export type ArticleResult = ExtractedArticle | FailedArticle;

// Written as-is to <prefix>_complete.json
export type ExtractionSummary = {
    extraction_summary: {
        total_articles: number;
        successful_extractions: number;
        failed_extractions: number;
        average_word_count: number;
        extraction_timestamp: string;
    };
    articles: ArticleResult[];
};

export type ExtractionStatistics = {
    total_articles: number;
    successful_extractions: number;
    failed_extractions: number;
    success_rate: number;
    average_word_count: number;
    average_sections: number;
    articles_with_images: number;
};

export type PageStrategy = 'playwright' | 'axios' | 'pw-axios-fallback';

// A rendered (or fetched) page, as handed to the parsers
export interface LoadedPage {
    url: string;
    html: string;
}
