import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
    it('uses the defaults when nothing is set', () => {
        expect(loadConfig({}, {})).toEqual(DEFAULT_CONFIG);
    });

    it('reads SCRAPER_* environment variables', () => {
        const config = loadConfig({}, {
            SCRAPER_BASE_URL: 'https://developers.moengage.com/',
            SCRAPER_DELAY: '2.5',
            SCRAPER_RETRIES: '1',
            SCRAPER_STRATEGY: 'axios'
        });

        expect(config.baseUrl).toBe('https://developers.moengage.com');
        expect(config.rateLimitDelay).toBe(2.5);
        expect(config.maxRetries).toBe(1);
        expect(config.strategy).toBe('axios');
    });

    it('lets explicit options win over the environment', () => {
        const config = loadConfig({ rateLimitDelay: 0, maxRetries: undefined }, {
            SCRAPER_DELAY: '4',
            SCRAPER_RETRIES: '5'
        });

        expect(config.rateLimitDelay).toBe(0);
        expect(config.maxRetries).toBe(5);
    });

    it('places per-command defaults below the environment', () => {
        expect(loadConfig({}, {}, { rateLimitDelay: 2 }).rateLimitDelay).toBe(2);
        expect(loadConfig({}, { SCRAPER_DELAY: '3' }, { rateLimitDelay: 2 }).rateLimitDelay).toBe(3);
    });

    it('rejects invalid values', () => {
        expect(() => loadConfig({}, { SCRAPER_STRATEGY: 'selenium' })).toThrow(ConfigError);
        expect(() => loadConfig({ maxRetries: -1 }, {})).toThrow(/maxRetries/);
        expect(() => loadConfig({ baseUrl: 'not a url' }, {})).toThrow(/baseUrl/);
    });
});
