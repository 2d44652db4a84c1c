#!/usr/bin/env node
/**
 * Help center scraper CLI
 *
 * Usage:
 *   help-center-scraper discover                       # Discover all documentation links
 *   help-center-scraper extract --limit 100            # Extract the first 100 articles
 *   help-center-scraper extract --sources help --batch-size 3 --delay 2
 *   help-center-scraper retry --previous-results documentation_complete.json
 *   help-center-scraper run                            # Discover, extract and save in one go
 *   help-center-scraper text <url>                     # Print one article as plain text
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { LinkSource } from './types/index.js';
import { LINK_SOURCES } from './scrapers/scraper-config.js';
import { DEFAULT_BATCH_SIZE } from './scrapers/documentation-scraper.js';
import { DEFAULT_LINKS_FILE, DEFAULT_OUTPUT_PREFIX } from './store/storage.js';
import { errorMessage } from './shared/logging.js';
import {
    type DiscoverOptions,
    type ExtractOptions,
    type GlobalOptions,
    type RetryOptions,
    type RunOptions,
    cleanTextCommand,
    discoverLinksCommand,
    extractArticlesCommand,
    retryFailedCommand,
    runPipelineCommand
} from './commands.js';

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function parsePositiveInteger(value: string): number {
    const parsed = parseInteger(value);
    if (parsed === 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function parseSeconds(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative number of seconds.');
    }
    return parsed;
}

function isLinkSource(value: string): value is LinkSource {
    return LINK_SOURCES.some(source => source === value);
}

function collectSource(value: string, previous: LinkSource[] | undefined): LinkSource[] {
    if (!isLinkSource(value)) {
        throw new InvalidArgumentError(`Allowed choices are ${LINK_SOURCES.join(', ')}.`);
    }
    return [...(previous ?? []), value];
}

function withGlobalOptions(command: Command): Command {
    return command
        .option('--base-url <url>', 'Base URL for documentation (default: https://help.moengage.com)')
        .option('--delay <seconds>', 'Delay between batches in seconds (default: 1.0)', parseSeconds)
        .option('--retries <n>', 'Maximum number of retries for failed requests (default: 3)', parseInteger);
}

function createProgram(): Command {
    const program = new Command();

    program
        .name('help-center-scraper')
        .description('Documentation scraper for the MoEngage help center');

    withGlobalOptions(
        program.command('discover')
            .description('Discover documentation links')
            .option('--output <file>', 'Output file for discovered links', DEFAULT_LINKS_FILE)
    ).action(async (options: DiscoverOptions) => {
        await discoverLinksCommand(options);
    });

    withGlobalOptions(
        program.command('extract')
            .description('Extract article content')
            .option('--links-file <file>', 'JSON file containing discovered links', DEFAULT_LINKS_FILE)
            .option('--limit <n>', 'Limit number of articles to extract (0 = no limit)', parseInteger, 0)
            .addOption(
                new Option('--sources <source...>', `Filter by source types (${LINK_SOURCES.join(', ')})`)
                    .argParser(collectSource)
            )
            .option('--output <prefix>', 'Output filename prefix', DEFAULT_OUTPUT_PREFIX)
            .option('--batch-size <n>', 'Number of articles to process simultaneously', parsePositiveInteger, DEFAULT_BATCH_SIZE)
    ).action(async (options: ExtractOptions) => {
        await extractArticlesCommand(options);
    });

    withGlobalOptions(
        program.command('retry')
            .description('Retry failed extractions')
            .requiredOption('--previous-results <file>', 'JSON file containing previous extraction results')
            .option('--output <prefix>', 'Output filename prefix', 'documentation_retry')
            .option('--batch-size <n>', 'Number of articles to process simultaneously', parsePositiveInteger, DEFAULT_BATCH_SIZE)
    ).action(async (options: RetryOptions) => {
        await retryFailedCommand(options);
    });

    withGlobalOptions(
        program.command('run')
            .description('Discover links, extract every article and save the results')
            .option('--output <prefix>', 'Output filename prefix', DEFAULT_OUTPUT_PREFIX)
            .option('--batch-size <n>', 'Number of articles to process simultaneously', parsePositiveInteger, DEFAULT_BATCH_SIZE)
    ).action(async (options: RunOptions) => {
        await runPipelineCommand(options);
    });

    withGlobalOptions(
        program.command('text')
            .description('Print the plain text of a single article')
            .argument('<url>', 'Article URL')
    ).action(async (url: string, options: GlobalOptions) => {
        await cleanTextCommand(url, options);
    });

    return program;
}

async function main(): Promise<void> {
    process.on('SIGINT', () => {
        console.log('\nOperation cancelled by user.');
        process.exit(1);
    });

    const program = createProgram();
    if (process.argv.length <= 2) {
        program.help({ error: true });
    }
    await program.parseAsync(process.argv);
}

main().catch(err => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
});
