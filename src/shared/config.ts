/**
 * Runtime configuration.
 *
 * Precedence: built-in defaults < per-command defaults < SCRAPER_* environment
 * variables < CLI options.
 * The merged object is validated with zod before anything is launched.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_BASE_URL, DEFAULT_USER_AGENT } from '../scrapers/scraper-config.js';

export const scraperConfigSchema = z.object({
    baseUrl: z.string().url().transform(url => url.replace(/\/+$/, '')),
    rateLimitDelay: z.coerce.number().nonnegative(),      // seconds between batches
    maxRetries: z.coerce.number().int().nonnegative(),    // extra navigation attempts per page
    retryBackoffMs: z.coerce.number().int().nonnegative(),
    navigationTimeoutMs: z.coerce.number().int().positive(),
    strategy: z.enum(['playwright', 'axios', 'pw-axios-fallback']),
    userAgent: z.string().min(1)
});

export type ScraperConfig = z.infer<typeof scraperConfigSchema>;
type RawConfig = { [K in keyof ScraperConfig]?: unknown };

export const DEFAULT_CONFIG: ScraperConfig = {
    baseUrl: DEFAULT_BASE_URL,
    rateLimitDelay: 1.0,
    maxRetries: 3,
    retryBackoffMs: 1500,
    navigationTimeoutMs: 30000,
    strategy: 'pw-axios-fallback',
    userAgent: DEFAULT_USER_AGENT
};

function mapEnvToConfig(env: NodeJS.ProcessEnv): RawConfig {
    return {
        baseUrl: env.SCRAPER_BASE_URL,
        rateLimitDelay: env.SCRAPER_DELAY,
        maxRetries: env.SCRAPER_RETRIES,
        navigationTimeoutMs: env.SCRAPER_TIMEOUT_MS,
        strategy: env.SCRAPER_STRATEGY,
        userAgent: env.SCRAPER_USER_AGENT
    };
}

function definedOnly(raw: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(
        Object.entries(raw).filter(([, value]) => value !== undefined && value !== '')
    );
}

export function loadConfig(
    overrides: Partial<ScraperConfig> = {},
    env: NodeJS.ProcessEnv = process.env,
    defaults: Partial<ScraperConfig> = {}
): ScraperConfig {
    const merged: Record<string, unknown> = {
        ...DEFAULT_CONFIG,
        ...definedOnly(defaults),
        ...definedOnly(mapEnvToConfig(env)),
        ...definedOnly(overrides)
    };

    const parsed = scraperConfigSchema.safeParse(merged);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
}
