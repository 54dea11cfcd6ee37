#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { entityToJSON, formatEntity } from '../mapping/entity-json.js';
import { createIngestContext, type IngestContext } from '../pipeline/context.js';
import { getResource, listResources } from '../resources/registry.js';
import type { LogLevel } from '../types/index.js';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger, initLogger } from '../utils/logger.js';

const VERSION = '0.1.0';

interface GlobalOptions {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    cacheDir?: string;
}

interface RunOptions {
    limit?: number;
    forceRefresh?: boolean;
    strict?: boolean;
    pretty?: boolean;
}

const program = new Command();

program
    .name('biostrata')
    .description('Map biological data resources to typed entities, with a change-aware local cache.')
    .version(VERSION)
    .addOption(new Option('--log-level <level>', 'Log level').choices(['error', 'warn', 'info', 'debug', 'trace', 'silent']))
    .option('--json-logs', 'Output JSON logs')
    .option('--cache-dir <path>', 'Cache directory');

/**
 * Resolve configuration (flags > env > file > defaults), start logging
 * and open the cache.
 */
async function openContext(extra: ConfigOverrides = {}): Promise<IngestContext> {
    const globals = program.opts<GlobalOptions>();
    const overrides: ConfigOverrides = { ...extra };
    if (globals.logLevel) overrides.logLevel = globals.logLevel;
    if (globals.jsonLogs) overrides.jsonLogs = true;
    if (globals.cacheDir) overrides.cacheDir = globals.cacheDir;

    const config = await resolveConfig(overrides);
    const logger = initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return createIngestContext(config, { logger });
}

/**
 * Run a command body against a context, closing it afterwards and
 * turning failures into a non-zero exit code.
 */
async function withContext(action: string, extra: ConfigOverrides, body: (ctx: IngestContext) => Promise<void>): Promise<void> {
    let ctx: IngestContext | null = null;
    try {
        ctx = await openContext(extra);
        await body(ctx);
    } catch (error) {
        getLogger().error({ err: error }, `${action} failed: ${errorMessage(error)}`);
        process.exitCode = 1;
    } finally {
        ctx?.close();
    }
}

function positiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

// ─── LIST command ─────────────────────────────────────────

program
    .command('list')
    .description('List resources and their datasets')
    .action(() => {
        for (const resource of listResources()) {
            console.log(`${resource.name}${resource.info.displayName ? `  (${resource.info.displayName})` : ''}`);
            for (const name of resource.datasetNames()) {
                const { description } = resource.dataset(name).declaration;
                console.log(`  ${name}${description ? `  ${description}` : ''}`);
            }
        }
    });

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Download, cache and map one dataset; entities are written to stdout as NDJSON')
    .argument('<resource>', 'Resource name')
    .argument('<dataset>', 'Dataset name')
    .option('-l, --limit <n>', 'Stop after n entities', positiveInt)
    .option('--force-refresh', 'Download even if the cached file is current')
    .option('--strict', 'Fail on the first mapping error instead of dropping the value')
    .option('--pretty', 'Human-readable output instead of NDJSON')
    .action(async (resourceName: string, datasetName: string, opts: RunOptions) => {
        const extra: ConfigOverrides = {};
        if (opts.forceRefresh) extra.forceRefresh = true;
        if (opts.strict) extra.strict = true;

        await withContext('Run', extra, async (ctx) => {
            const dataset = getResource(resourceName).dataset(datasetName);
            for await (const entity of dataset.entities(ctx, { limit: opts.limit })) {
                console.log(opts.pretty ? formatEntity(entity) : JSON.stringify(entityToJSON(entity)));
            }
        });
    });

// ─── METADATA command ─────────────────────────────────────

program
    .command('metadata')
    .description('Print the metadata entity of a resource')
    .argument('<resource>', 'Resource name')
    .option('--pretty', 'Human-readable output instead of JSON')
    .action((resourceName: string, opts: { pretty?: boolean }) => {
        try {
            const entity = getResource(resourceName).metadata();
            console.log(opts.pretty ? formatEntity(entity) : JSON.stringify(entityToJSON(entity), null, 2));
        } catch (error) {
            console.error(`Metadata failed: ${errorMessage(error)}`);
            process.exitCode = 1;
        }
    });

// ─── CACHE command ────────────────────────────────────────

const cache = program.command('cache').description('Inspect and manage the local cache');

cache
    .command('stats')
    .description('Show cache statistics')
    .action(async () => {
        await withContext('Cache stats', {}, async (ctx) => {
            const stats = ctx.inventory.getStats();
            console.log(`\nCache: ${ctx.config.cacheDir}\n`);
            console.log(`  Downloads:      ${stats.downloads} (${(stats.downloadBytes / 1024 / 1024).toFixed(1)} MB)`);
            console.log(`  Bronze entries: ${stats.bronzeEntries}`);
            console.log(`  Bronze rows:    ${stats.bronzeRows}`);
            console.log('');
        });
    });

cache
    .command('list')
    .description('List cached downloads and bronze entries')
    .argument('[resource]', 'Only entries of this resource')
    .action(async (resource: string | undefined) => {
        await withContext('Cache list', {}, async (ctx) => {
            for (const record of ctx.downloads.list(resource)) {
                const checked = new Date(record.checked_at).toISOString();
                console.log(`download  ${record.resource}  ${record.key}  ${record.size} B  checked ${checked}  ${record.url}`);
            }
            for (const record of ctx.bronze.list(resource)) {
                const saved = new Date(record.saved_at).toISOString();
                console.log(`bronze    ${record.resource}  ${record.key}  ${record.num_rows} rows  saved ${saved}  ${record.path}`);
            }
        });
    });

cache
    .command('clear')
    .description('Remove every cached download and bronze entry')
    .action(async () => {
        await withContext('Cache clear', {}, async (ctx) => {
            await rm(join(ctx.config.cacheDir, 'downloads'), { recursive: true, force: true });
            await rm(join(ctx.config.cacheDir, 'bronze'), { recursive: true, force: true });
            ctx.inventory.clear();
            console.log('Cache cleared.');
        });
    });

cache
    .command('clean')
    .description('Remove entries older than a number of days')
    .requiredOption('-d, --days <n>', 'Age threshold in days', positiveInt)
    .action(async (opts: { days: number }) => {
        await withContext('Cache clean', {}, async (ctx) => {
            const downloads = await ctx.downloads.cleanOlderThan(opts.days);
            const bronze = await ctx.bronze.cleanOlderThan(opts.days);
            console.log(`Removed ${downloads} downloads and ${bronze} bronze entries.`);
        });
    });

program.parseAsync().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
});
