import { fileNameFor, type DownloadResult } from '../cache/download-manager.js';
import { detectFormat, type SourceFormat } from '../loaders/registry.js';
import type { EntityBuilder } from '../mapping/entity-builder.js';
import type { IngestContext } from '../pipeline/context.js';
import { processRows, type RowTransform } from '../pipeline/processing.js';
import type { Entity, RawRow } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import {
    toBronzeSpec,
    toDownloadRequest,
    toLoaderOptions,
    toProcessingSpec,
    type DatasetDeclaration,
} from './declaration.js';

/**
 * Format-specific reader that replaces the loader and bronze stage.
 * `path` is null for datasets without a download.
 */
export type RawParser = (input: {
    path: string | null;
    declaration: DatasetDeclaration;
    logger: Logger;
}) => AsyncIterable<RawRow>;

export interface DatasetInit {
    declaration: DatasetDeclaration;
    schema: EntityBuilder;
    parser?: RawParser;
    transforms?: Record<string, RowTransform>;
    /** Cache loader output as Parquet. Defaults to true; the config can still turn it off. */
    useBronze?: boolean;
}

export interface RawOptions {
    forceRefresh?: boolean;
}

export interface EntityOptions extends RawOptions {
    strict?: boolean;
    /** Stop after this many entities. */
    limit?: number;
}

/**
 * One downloadable table of a resource together with the schema that
 * maps its rows to entities.
 */
export class Dataset {
    readonly declaration: DatasetDeclaration;
    readonly schema: EntityBuilder;
    private readonly parser: RawParser | undefined;
    private readonly transforms: ReadonlyMap<string, RowTransform>;
    private readonly useBronze: boolean;

    constructor(
        readonly resource: string,
        readonly name: string,
        init: DatasetInit
    ) {
        this.declaration = init.declaration;
        this.schema = init.schema;
        this.parser = init.parser;
        this.transforms = new Map(Object.entries(init.transforms ?? {}));
        this.useBronze = init.useBronze ?? true;
    }

    /**
     * Raw rows after download, loading and row processing.
     */
    async *raw(ctx: IngestContext, options: RawOptions = {}): AsyncGenerator<RawRow> {
        const request = toDownloadRequest(this.resource, this.declaration);
        if (!request && !this.parser) {
            throw new ConfigError(`Dataset ${this.resource}.${this.name} has neither a url nor a parser`);
        }

        const format = this.parser ? null : this.resolveFormat(ctx, request?.url);

        const download = request
            ? await ctx.downloads.fetch(request, { forceRefresh: options.forceRefresh ?? ctx.config.forceRefresh })
            : null;

        const rows = await this.open(ctx, download, format);
        yield* processRows(rows, toProcessingSpec(this.declaration), {
            transforms: this.transforms,
            logger: ctx.logger,
        });
    }

    /**
     * Entities built from the raw rows. A run summary is logged however
     * iteration ends.
     */
    async *entities(ctx: IngestContext, options: EntityOptions = {}): AsyncGenerator<Entity> {
        const strict = options.strict ?? ctx.config.strict;
        const { limit } = options;
        const stats = { rows: 0, entities: 0, dropped: 0 };
        const startedAt = Date.now();

        try {
            if (limit !== undefined && limit <= 0) return;

            for await (const row of this.raw(ctx, options)) {
                stats.rows++;
                const entity = this.schema.build(row, { strict, logger: ctx.logger });
                if (!entity) {
                    stats.dropped++;
                    continue;
                }
                stats.entities++;
                yield entity;
                if (limit !== undefined && stats.entities >= limit) return;
            }
        } finally {
            ctx.logger.info(
                { resource: this.resource, dataset: this.name, ...stats, durationMs: Date.now() - startedAt },
                'Dataset finished'
            );
        }
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Declared format, else guessed from the URL. The loader is checked
     * before anything is downloaded.
     */
    private resolveFormat(ctx: IngestContext, url: string | undefined): SourceFormat {
        const format = this.declaration.format ?? (url ? detectFormat(fileNameFor(url)) : null);
        if (!format) {
            throw new ConfigError(`Cannot determine the format of ${this.resource}.${this.name}; declare 'format'`, { url });
        }
        ctx.loaders.get(format);
        return format;
    }

    private async open(ctx: IngestContext, download: DownloadResult | null, format: SourceFormat | null): Promise<AsyncIterable<RawRow>> {
        if (this.parser) {
            return this.parser({ path: download?.path ?? null, declaration: this.declaration, logger: ctx.logger });
        }
        if (!download || !format) {
            throw new ConfigError(`Dataset ${this.resource}.${this.name} has nothing to load`);
        }

        const { path, contentHash } = download;
        const loaderOptions = toLoaderOptions(this.declaration);
        const load = () => ctx.loaders.load(path, format, loaderOptions);

        if (!this.useBronze || !ctx.config.useBronze) return load();

        const spec = toBronzeSpec(this.resource, this.name, this.declaration, format);
        const record = await ctx.bronze.materialize(spec, contentHash, load);
        return ctx.bronze.rows(record);
    }
}
