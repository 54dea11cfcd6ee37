import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { createHash, randomUUID } from 'node:crypto';
import { existsSync, mkdirSync } from 'node:fs';
import { readdir, rename, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { isPlainObject } from '../loaders/flatten.js';
import type { BronzeRecord, CacheInventory } from '../storage/cache-inventory.js';
import type { RawRow } from '../types/index.js';
import { FormatDriftError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Identity of a bronze entry. Everything in `identity` that changes how
 * raw rows are produced must be listed, so a changed declaration gets a
 * new key. The partition layout is part of the key as well.
 */
export interface BronzeSpec {
    resource: string;
    dataset: string;
    identity: Record<string, unknown>;
    /** Explicit location, overriding the key-derived path. */
    bronzePath?: string;
    partitionBy?: readonly string[];
}

export interface BronzeStorageOptions {
    cacheDir: string;
    inventory: CacheInventory;
    logger: Logger;
}

/**
 * Columnar cache of raw rows, one Parquet file (or partition directory)
 * per dataset and declaration hash.
 *
 * Every column is stored as optional UTF8 under a positional name; the
 * original column names live in the inventory so any header survives.
 */
export class BronzeStorage {
    private readonly root: string;

    constructor(private readonly options: BronzeStorageOptions) {
        this.root = join(options.cacheDir, 'bronze');
    }

    /**
     * `<resource>_<dataset>_<first 8 hex chars of the identity hash>`.
     */
    keyFor(spec: BronzeSpec): string {
        const partitionBy = spec.partitionBy ?? [];
        const identity = partitionBy.length > 0 ? { ...spec.identity, partitionBy } : spec.identity;
        const digest = createHash('sha256').update(stableStringify(identity)).digest('hex');
        return `${spec.resource}_${spec.dataset}_${digest.slice(0, 8)}`;
    }

    /**
     * Entry location. Partitioned entries are written to a fresh
     * subdirectory of this path on every save.
     */
    pathFor(spec: BronzeSpec): string {
        if (spec.bronzePath) return spec.bronzePath;
        const key = this.keyFor(spec);
        const name = spec.partitionBy?.length ? `${key}_partitioned` : `${key}.parquet`;
        return join(this.root, spec.resource, name);
    }

    /**
     * The stored entry, if it was built from this exact source content.
     */
    lookup(spec: BronzeSpec, sourceHash: string): BronzeRecord | null {
        const record = this.options.inventory.getBronze(this.keyFor(spec));
        if (!record || record.source_hash !== sourceHash || !existsSync(record.path)) return null;
        return record;
    }

    /**
     * Reuse the entry for `sourceHash` or rebuild it from `source`.
     * `source` is called twice: once to discover columns, once to write.
     */
    async materialize(spec: BronzeSpec, sourceHash: string, source: () => AsyncIterable<RawRow>): Promise<BronzeRecord> {
        const existing = this.lookup(spec, sourceHash);
        if (existing) {
            this.options.logger.debug({ key: existing.key, path: existing.path }, 'Bronze entry up to date');
            return existing;
        }
        return this.save(spec, sourceHash, source);
    }

    /**
     * Write a new entry and point the inventory at it. A single file
     * replaces its predecessor with one rename; a partitioned entry goes to
     * a new directory and the previous one is removed after the switch, so
     * readers never see a missing entry.
     */
    async save(spec: BronzeSpec, sourceHash: string, source: () => AsyncIterable<RawRow>): Promise<BronzeRecord> {
        const { inventory, logger } = this.options;
        const key = this.keyFor(spec);
        const partitionBy = spec.partitionBy ?? [];
        const finalPath = partitionBy.length > 0 ? join(this.pathFor(spec), randomUUID()) : this.pathFor(spec);
        const previous = inventory.getBronze(key);

        const columns: string[] = [];
        const index = new Map<string, number>();
        for await (const row of source()) {
            for (const name of Object.keys(row)) {
                if (!index.has(name)) {
                    index.set(name, columns.length);
                    columns.push(name);
                }
            }
        }

        const missing = partitionBy.filter((field) => !index.has(field));
        if (missing.length > 0) {
            throw new FormatDriftError(`Partition fields not found: ${missing.join(', ')}`, { key, columns });
        }

        // A schema needs at least one field, even for an empty source.
        const width = Math.max(columns.length, 1);
        const schema = new ParquetSchema(
            Object.fromEntries(Array.from({ length: width }, (_, i) => [columnName(i), { type: 'UTF8' as const, optional: true }]))
        );

        mkdirSync(dirname(finalPath), { recursive: true });
        const tmpPath = `${finalPath}.${randomUUID()}.tmp`;
        const writers = new Map<string, ParquetWriter>();
        let numRows = 0;

        try {
            if (partitionBy.length === 0) {
                writers.set('', await ParquetWriter.openFile(schema, tmpPath));
            }
            for await (const row of source()) {
                const dir = partitionBy.length === 0 ? '' : partitionDir(row, partitionBy);
                let writer = writers.get(dir);
                if (!writer) {
                    const partPath = join(tmpPath, dir, 'part-0.parquet');
                    mkdirSync(dirname(partPath), { recursive: true });
                    writer = await ParquetWriter.openFile(schema, partPath);
                    writers.set(dir, writer);
                }
                await writer.appendRow(encodeRow(row, index));
                numRows++;
            }
            for (const writer of writers.values()) await writer.close();
            writers.clear();

            await rename(tmpPath, finalPath);
        } catch (error) {
            for (const writer of writers.values()) await writer.close();
            await rm(tmpPath, { recursive: true, force: true });
            throw error;
        }

        const record: BronzeRecord = {
            key,
            resource: spec.resource,
            dataset: spec.dataset,
            path: finalPath,
            partitioned: partitionBy.length > 0 ? 1 : 0,
            source_hash: sourceHash,
            columns_json: JSON.stringify(columns),
            num_rows: numRows,
            config_json: stableStringify({ ...spec.identity, partitionBy }),
            saved_at: Date.now(),
        };
        inventory.upsertBronze(record);
        if (previous && previous.path !== finalPath) {
            await rm(previous.path, { recursive: true, force: true });
        }
        logger.info({ key, path: finalPath, rows: numRows, columns: columns.length }, 'Bronze entry saved');
        return record;
    }

    /**
     * Stream rows back with their original column names. Readers are
     * closed however iteration ends.
     */
    async *rows(record: BronzeRecord): AsyncGenerator<RawRow> {
        const columns = parseColumns(record.columns_json);
        const files = record.partitioned ? await listParquetFiles(record.path) : [record.path];

        for (const file of files) {
            const reader = await ParquetReader.openFile(file);
            try {
                const cursor = reader.getCursor();
                for (;;) {
                    const stored: unknown = await cursor.next();
                    if (!isPlainObject(stored)) break;
                    yield decodeRow(stored, columns);
                }
            } finally {
                await reader.close();
            }
        }
    }

    list(resource?: string): BronzeRecord[] {
        return this.options.inventory.listBronze(resource);
    }

    exists(spec: BronzeSpec): boolean {
        const record = this.options.inventory.getBronze(this.keyFor(spec));
        return record !== undefined && existsSync(record.path);
    }

    async delete(key: string): Promise<void> {
        const record = this.options.inventory.getBronze(key);
        if (!record) return;
        await rm(record.partitioned ? dirname(record.path) : record.path, { recursive: true, force: true });
        this.options.inventory.deleteBronze(key);
    }

    /**
     * Remove entries saved more than `days` days ago. Returns how many were removed.
     */
    async cleanOlderThan(days: number): Promise<number> {
        const { bronze } = this.options.inventory.olderThan(Date.now() - days * 86_400_000);
        for (const record of bronze) await this.delete(record.key);
        return bronze.length;
    }
}

// ─── Private helpers ──────────────────────────────────────

function columnName(i: number): string {
    return `c${i}`;
}

function encodeRow(row: RawRow, index: ReadonlyMap<string, number>): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [name, value] of Object.entries(row)) {
        const i = index.get(name);
        if (i === undefined || value === null || value === undefined) continue;
        out[columnName(i)] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return out;
}

function decodeRow(stored: Record<string, unknown>, columns: readonly string[]): RawRow {
    const row: RawRow = {};
    columns.forEach((name, i) => {
        const value = stored[columnName(i)];
        row[name] = value === undefined || value === null ? null : String(value);
    });
    return row;
}

function parseColumns(json: string): string[] {
    const parsed: unknown = JSON.parse(json);
    if (!Array.isArray(parsed)) throw new FormatDriftError('Corrupt bronze column list', { json });
    return parsed.map((name) => String(name));
}

function partitionDir(row: RawRow, fields: readonly string[]): string {
    return join(
        ...fields.map((field) => {
            const value = row[field];
            const text = value === null || value === undefined || value === '' ? '__null__' : String(value);
            return `${field}=${encodeURIComponent(text)}`;
        })
    );
}

async function listParquetFiles(dir: string): Promise<string[]> {
    const files: string[] = [];
    for (const entry of await readdir(dir, { withFileTypes: true })) {
        const path = join(dir, entry.name);
        if (entry.isDirectory()) files.push(...(await listParquetFiles(path)));
        else if (entry.isFile() && entry.name.endsWith('.parquet')) files.push(path);
    }
    return files.sort();
}

/**
 * JSON with object keys sorted, for hashing.
 */
export function stableStringify(value: unknown): string {
    if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
    if (isPlainObject(value)) {
        const keys = Object.keys(value).filter((key) => value[key] !== undefined).sort();
        return `{${keys.map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`).join(',')}}`;
    }
    return JSON.stringify(value) ?? 'null';
}
