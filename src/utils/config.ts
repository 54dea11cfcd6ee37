import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type BiostrataConfig, type LogLevel } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LogLevel[];

const RateLimitSchema = z.object({
    tokensPerSecond: z.number().positive(),
    maxBurst: z.number().int().positive(),
});

const FileConfigSchema = z
    .object({
        cacheDir: z.string().min(1),
        forceRefresh: z.boolean(),
        revalidateAfterHours: z.number().nonnegative(),
        useBronze: z.boolean(),
        strict: z.boolean(),
        http: z
            .object({
                timeoutMs: z.number().int().positive(),
                maxRetries: z.number().int().nonnegative(),
                initialBackoffMs: z.number().int().nonnegative(),
                maxBackoffMs: z.number().int().nonnegative(),
                userAgent: z.string(),
            })
            .partial(),
        rateLimits: z.record(z.string(), RateLimitSchema),
        logLevel: z.enum(LOG_LEVELS),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Overrides accepted from the command line. Nested objects may be partial.
 */
export type ConfigOverrides = Partial<Omit<BiostrataConfig, 'http'>> & {
    http?: Partial<BiostrataConfig['http']>;
};

/**
 * Load configuration from biostrata.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('biostrata', {
        searchPlaces: ['biostrata.config.json', '.biostratarc.json', 'package.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${result.filepath}`, { issues: parsed.error.issues });
    }
    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const out: ConfigOverrides = {};

    const cacheDir = env['BIOSTRATA_CACHE_DIR'];
    if (cacheDir) out.cacheDir = cacheDir;

    const level = env['BIOSTRATA_LOG_LEVEL'];
    if (level) {
        const parsed = z.enum(LOG_LEVELS).safeParse(level);
        if (!parsed.success) {
            throw new ConfigError(`BIOSTRATA_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, { value: level });
        }
        out.logLevel = parsed.data;
    }

    const revalidate = env['BIOSTRATA_REVALIDATE_HOURS'];
    if (revalidate) {
        const hours = Number(revalidate);
        if (!Number.isFinite(hours) || hours < 0) {
            throw new ConfigError('BIOSTRATA_REVALIDATE_HOURS must be a non-negative number', { value: revalidate });
        }
        out.revalidateAfterHours = hours;
    }

    return out;
}

/**
 * Merge configuration layers over the defaults.
 * Later layers win; nested objects are merged key by key.
 */
export function mergeConfig(...layers: Array<ConfigOverrides | null | undefined>): BiostrataConfig {
    let merged: BiostrataConfig = { ...DEFAULT_CONFIG };
    for (const layer of layers) {
        if (!layer) continue;
        merged = {
            ...merged,
            ...layer,
            http: { ...merged.http, ...layer.http },
            rateLimits: { ...merged.rateLimits, ...layer.rateLimits },
        };
    }
    return merged;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(cliFlags: ConfigOverrides, options: { searchFrom?: string } = {}): Promise<BiostrataConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();
    return mergeConfig(fileConfig, envConfig, cliFlags);
}
