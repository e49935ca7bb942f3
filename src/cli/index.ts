#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { UserConfigStore } from '../utils/user-config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { exitCodeFor } from '../utils/errors.js';
import { buildExport } from '../builder/export-builder.js';
import { OpenAlexClient } from '../sources/openalex.js';
import { TavilySearchBackend } from '../sources/tavily.js';
import { createNameResolver } from '../names/name-resolver.js';
import { readAuthorFile } from '../ingest/author-file.js';
import { loadCompReport } from '../ingest/comp-report.js';
import { toCliFlags, type SearchOptions } from './options.js';
import { CORE_FIELDS, EXTENDED_FIELDS, FIELD_ALIASES } from '../types/fields.js';
import type { AuthorQuery, LogLevel, SortOption } from '../types/index.js';

const VERSION = '1.0.0';

const SORT_OPTIONS: readonly SortOption[] = ['year', 'year-desc', 'year-asc', 'citations', 'citations-desc', 'citations-asc'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function parseSort(value: string): SortOption {
    const option = SORT_OPTIONS.find((sort) => sort === value);
    if (!option) {
        throw new InvalidArgumentError(`Expected one of: ${SORT_OPTIONS.join(', ')}.`);
    }
    return option;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value);
    if (!level) {
        throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
    }
    return level;
}

const program = new Command();

program
    .name('alexport')
    .description('Fetch scholarly works from OpenAlex and export them as normalized JSON for LLM ingestion.')
    .version(VERSION);

// ─── SEARCH command ───────────────────────────────────────

program
    .command('search')
    .description('Search works and write the JSON export')
    .option('-s, --search <query>', 'Text search query')
    .option('-a, --author-id <ids...>', 'OpenAlex author IDs, ORCIDs or author names')
    .option('--author-file <path>', 'File of author names (one per line, or TSV with LastName/FirstInitial columns)')
    .option('--comp-report <csv>', 'Compensation report CSV to take authors from')
    .option('--department <name>', 'Compensation report department filter (substring)')
    .option('--job-title <title>', 'Compensation report job title filter (substring)')
    .option('-i, --institution <name>', 'Institution name or ID')
    .option('--csu-only', 'Restrict to authors whose last known institution is the affiliation institution')
    .option('-f, --fields <list>', 'Comma-separated fields to include (default: core fields)')
    .option('-e, --exclude-fields <list>', 'Comma-separated fields to exclude')
    .option('--sort <order>', `Sort order: ${SORT_OPTIONS.join(' | ')}`, parseSort)
    .option('-m, --max-results <n>', 'Maximum results (0 = all, default 100)', parseInteger)
    .option('--per-page <n>', 'Results per page (max 200, default 25)', parseInteger)
    .option('--year-from <year>', 'Only works published from this year', parseInteger)
    .option('--year-to <year>', 'Only works published up to this year', parseInteger)
    .option('-o, --out <path>', 'Output file path')
    .option('--email <email>', 'Contact email for the polite pool (overrides saved config)')
    .option('--search-api-key <key>', 'Search API key for name resolution (overrides saved config)')
    .option('--no-name-resolution', 'Disable search-based resolution of abbreviated author names')
    .option('--strict-names', 'Fail when name resolution is needed but no search API key is configured')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: SearchOptions) => {
        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort());

        try {
            const store = new UserConfigStore();
            const cliConfig = toCliFlags(opts);

            const config = await resolveConfig(cliConfig, { userConfig: await store.load() });
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
            const logger = getLogger();

            const authorQueries: AuthorQuery[] = [];
            if (config.authorFile) {
                authorQueries.push(...readAuthorFile(config.authorFile));
            }
            if (config.compReport) {
                authorQueries.push(...loadCompReport(config.compReport, {
                    department: config.department,
                    jobTitle: config.jobTitle,
                }));
            }
            if (authorQueries.length > 0) {
                logger.info({ authors: authorQueries.length }, 'Looking up authors');
            }
            if (!config.email) {
                logger.warn('No contact email configured; requests use the common pool. Set one with `alexport config set-email`.');
            }

            const httpClient = createHttpClient({ timeout: 30000, version: VERSION, email: config.email });
            const client = new OpenAlexClient({
                email: config.email,
                apiKey: config.apiKey,
                httpClient,
                signal: controller.signal,
            });
            const backend = config.searchApiKey
                ? new TavilySearchBackend({ apiKey: config.searchApiKey, httpClient, signal: controller.signal })
                : null;
            const nameResolver = createNameResolver(config.nameResolution, backend);

            const document = await buildExport(config, authorQueries, { client, nameResolver });
            if (document.metadata.total === 0) {
                logger.info('No works found matching your criteria.');
            } else {
                logger.info({ out: config.out, works: document.metadata.total }, 'Export complete!');
            }
        } catch (error) {
            getLogger().error({ error }, error instanceof Error ? error.message : 'Export failed');
            process.exitCode = exitCodeFor(error);
        }
    });

// ─── FIELDS command ───────────────────────────────────────

program
    .command('fields')
    .description('List available fields and aliases')
    .action(() => {
        console.log('Available fields:');
        console.log('\nCore fields (included by default):');
        for (const field of CORE_FIELDS) console.log(`  - ${field}`);

        console.log('\nExtended fields:');
        for (const field of EXTENDED_FIELDS) console.log(`  - ${field}`);

        console.log('\nField aliases:');
        for (const [alias, field] of [...FIELD_ALIASES.entries()].sort(([a], [b]) => a.localeCompare(b))) {
            console.log(`  - ${alias} → ${field}`);
        }
    });

// ─── CONFIG command ───────────────────────────────────────

const configCommand = program
    .command('config')
    .description('Show or change saved settings');

configCommand
    .command('show')
    .description('Show the saved configuration')
    .action(async () => {
        const store = new UserConfigStore();
        const config = await store.load();
        console.log(`Configuration file: ${store.path}`);
        console.log(`Email: ${config.email ?? 'not set'}`);
        console.log(`Search API key: ${config.searchApiKey ? 'configured' : 'not set'}`);
    });

configCommand
    .command('set-email')
    .description('Save the contact email for the polite pool')
    .argument('<email>', 'Email address')
    .action(async (email: string) => {
        await saveSetting({ email }, `Email configured: ${email}`);
    });

configCommand
    .command('set-search-key')
    .description('Save the search API key used for name resolution')
    .argument('<key>', 'API key')
    .action(async (key: string) => {
        await saveSetting({ searchApiKey: key }, 'Search API key configured');
    });

async function saveSetting(patch: { email?: string; searchApiKey?: string }, message: string): Promise<void> {
    try {
        await new UserConfigStore().set(patch);
        console.log(`✓ ${message}`);
    } catch (error) {
        console.error('Saving configuration failed:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
    }
}

await program.parseAsync();
