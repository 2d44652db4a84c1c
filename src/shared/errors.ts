/**
 * Error types raised by the scraper. Per-article failures are not thrown out of
 * the extractor; they come back as FailedArticle values.
 */

export class ScraperError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ConfigError extends ScraperError {}

export class NavigationError extends ScraperError {
    constructor(readonly url: string, readonly attempts: number, cause: string) {
        super(attempts > 1 ? `${cause} (after ${attempts} attempts)` : cause);
    }
}

export class ResultsFileError extends ScraperError {
    constructor(
        readonly filePath: string,
        readonly reason: 'not_found' | 'invalid',
        detail: string
    ) {
        super(detail);
    }
}
