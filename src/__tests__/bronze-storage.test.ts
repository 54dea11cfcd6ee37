import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BronzeStorage, stableStringify, type BronzeSpec } from '../cache/bronze-storage.js';
import { CacheInventory } from '../storage/cache-inventory.js';
import type { RawRow } from '../types/index.js';
import { FormatDriftError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';

const logger = silentLogger();

const ROWS: RawRow[] = [
    { Entry: 'P04637', 'Organism (ID)': '9606', 'Gene Names': 'TP53 P53' },
    { Entry: 'P02340', 'Organism (ID)': '10090', 'Gene Names': null },
    { Entry: 'Q00987', 'Organism (ID)': '9606' },
];

const spec: BronzeSpec = {
    resource: 'uniprot',
    dataset: 'proteins',
    identity: { url: 'https://example.org/proteins.tsv', format: 'tsv' },
};

async function* fromRows(rows: readonly RawRow[]): AsyncGenerator<RawRow> {
    for (const row of rows) yield row;
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const out: T[] = [];
    for await (const item of iterable) out.push(item);
    return out;
}

describe('BronzeStorage', () => {
    let cacheDir: string;
    let inventory: CacheInventory;
    let bronze: BronzeStorage;

    beforeEach(() => {
        cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'biostrata-'));
        inventory = new CacheInventory(':memory:', logger);
        bronze = new BronzeStorage({ cacheDir, inventory, logger });
    });

    afterEach(() => {
        inventory.close();
        fs.rmSync(cacheDir, { recursive: true, force: true });
    });

    describe('keys', () => {
        it('should combine resource, dataset and an identity digest', () => {
            expect(bronze.keyFor(spec)).toMatch(/^uniprot_proteins_[0-9a-f]{8}$/);
        });

        it('should ignore identity key order', () => {
            const reordered: BronzeSpec = { ...spec, identity: { format: 'tsv', url: 'https://example.org/proteins.tsv' } };
            expect(bronze.keyFor(reordered)).toBe(bronze.keyFor(spec));
        });

        it('should change with the declaration', () => {
            const changed: BronzeSpec = { ...spec, identity: { ...spec.identity, format: 'csv' } };
            expect(bronze.keyFor(changed)).not.toBe(bronze.keyFor(spec));
        });

        it('should change with the partition layout', () => {
            const byOrganism: BronzeSpec = { ...spec, partitionBy: ['Organism (ID)'] };
            const byEntry: BronzeSpec = { ...spec, partitionBy: ['Entry'] };

            expect(bronze.keyFor(byOrganism)).not.toBe(bronze.keyFor(spec));
            expect(bronze.keyFor(byOrganism)).not.toBe(bronze.keyFor(byEntry));
            expect(bronze.keyFor({ ...spec, partitionBy: [] })).toBe(bronze.keyFor(spec));
        });

        it('should place files under the resource directory', () => {
            const key = bronze.keyFor(spec);
            expect(bronze.pathFor(spec)).toBe(path.join(cacheDir, 'bronze', 'uniprot', `${key}.parquet`));
            const partitioned: BronzeSpec = { ...spec, partitionBy: ['Organism (ID)'] };
            expect(bronze.pathFor(partitioned)).toBe(
                path.join(cacheDir, 'bronze', 'uniprot', `${bronze.keyFor(partitioned)}_partitioned`)
            );
            expect(bronze.pathFor({ ...spec, bronzePath: '/data/proteins.parquet' })).toBe('/data/proteins.parquet');
        });
    });

    describe('round trip', () => {
        it('should return rows with their original column names', async () => {
            const record = await bronze.save(spec, 'hash-1', () => fromRows(ROWS));

            expect(record).toMatchObject({ num_rows: 3, partitioned: 0, source_hash: 'hash-1' });
            expect(JSON.parse(record.columns_json)).toEqual(['Entry', 'Organism (ID)', 'Gene Names']);
            expect(await collect(bronze.rows(record))).toEqual([
                { Entry: 'P04637', 'Organism (ID)': '9606', 'Gene Names': 'TP53 P53' },
                { Entry: 'P02340', 'Organism (ID)': '10090', 'Gene Names': null },
                { Entry: 'Q00987', 'Organism (ID)': '9606', 'Gene Names': null },
            ]);
        });

        it('should store non-string values as text', async () => {
            const record = await bronze.save(spec, 'hash-1', () => fromRows([{ Entry: 'P1', Length: 393 }]));

            expect(await collect(bronze.rows(record))).toEqual([{ Entry: 'P1', Length: '393' }]);
        });

        it('should write one directory per partition value', async () => {
            const partitioned: BronzeSpec = { ...spec, partitionBy: ['Organism (ID)'] };
            const record = await bronze.save(partitioned, 'hash-1', () => fromRows(ROWS));

            expect(record.partitioned).toBe(1);
            expect(fs.existsSync(path.join(record.path, 'Organism (ID)=9606', 'part-0.parquet'))).toBe(true);
            expect(fs.existsSync(path.join(record.path, 'Organism (ID)=10090', 'part-0.parquet'))).toBe(true);

            const entries = (await collect(bronze.rows(record))).map((row) => row['Entry']);
            expect(entries).toEqual(['P02340', 'P04637', 'Q00987']);
        });

        it('should reject partition fields the rows do not have', async () => {
            const partitioned: BronzeSpec = { ...spec, partitionBy: ['Taxon'] };

            await expect(bronze.save(partitioned, 'hash-1', () => fromRows(ROWS))).rejects.toBeInstanceOf(FormatDriftError);
            expect(bronze.exists(partitioned)).toBe(false);
        });
    });

    describe('replacing an entry', () => {
        it('should let a reader that already opened the file finish the old rows', async () => {
            const first = await bronze.save(spec, 'hash-1', () => fromRows(ROWS));
            const reading = bronze.rows(first);
            const head = await reading.next();
            expect(head.value).toMatchObject({ Entry: 'P04637' });

            const second = await bronze.save(spec, 'hash-2', () => fromRows([{ Entry: 'A0A000' }]));
            const rest = (await collect(reading)).map((row) => row['Entry']);

            expect(second.path).toBe(first.path);
            expect(rest).toEqual(['P02340', 'Q00987']);
            expect(await collect(bronze.rows(second))).toEqual([{ Entry: 'A0A000' }]);
        });

        it('should switch a partitioned entry to a new directory and drop the old one', async () => {
            const partitioned: BronzeSpec = { ...spec, partitionBy: ['Organism (ID)'] };
            const first = await bronze.save(partitioned, 'hash-1', () => fromRows(ROWS));
            const second = await bronze.save(partitioned, 'hash-2', () => fromRows(ROWS.slice(0, 1)));

            expect(second.path).not.toBe(first.path);
            expect(path.dirname(second.path)).toBe(bronze.pathFor(partitioned));
            expect(fs.existsSync(first.path)).toBe(false);
            expect(fs.readdirSync(bronze.pathFor(partitioned))).toEqual([path.basename(second.path)]);
            expect((await collect(bronze.rows(second))).map((row) => row['Entry'])).toEqual(['P04637']);
        });

        it('should remove every version when a partitioned entry is deleted', async () => {
            const partitioned: BronzeSpec = { ...spec, partitionBy: ['Organism (ID)'] };
            const record = await bronze.save(partitioned, 'hash-1', () => fromRows(ROWS));

            await bronze.delete(record.key);

            expect(fs.existsSync(bronze.pathFor(partitioned))).toBe(false);
        });
    });

    describe('materialize', () => {
        it('should reuse an entry built from the same source', async () => {
            let reads = 0;
            const source = () => {
                reads++;
                return fromRows(ROWS);
            };

            const first = await bronze.materialize(spec, 'hash-1', source);
            expect(reads).toBe(2);

            const second = await bronze.materialize(spec, 'hash-1', source);
            expect(reads).toBe(2);
            expect(second).toEqual(first);
        });

        it('should not reuse an entry written with another partition layout', async () => {
            await bronze.materialize(spec, 'hash-1', () => fromRows(ROWS));
            const partitioned: BronzeSpec = { ...spec, partitionBy: ['Organism (ID)'] };

            expect(bronze.lookup(partitioned, 'hash-1')).toBeNull();
            const record = await bronze.materialize(partitioned, 'hash-1', () => fromRows(ROWS));
            expect(record.partitioned).toBe(1);
        });

        it('should rebuild when the source changed', async () => {
            await bronze.materialize(spec, 'hash-1', () => fromRows(ROWS));
            const rebuilt = await bronze.materialize(spec, 'hash-2', () => fromRows(ROWS.slice(0, 1)));

            expect(rebuilt).toMatchObject({ source_hash: 'hash-2', num_rows: 1 });
            expect(bronze.lookup(spec, 'hash-1')).toBeNull();
        });
    });

    describe('maintenance', () => {
        it('should delete an entry and its file', async () => {
            const record = await bronze.save(spec, 'hash-1', () => fromRows(ROWS));
            expect(bronze.exists(spec)).toBe(true);

            await bronze.delete(record.key);

            expect(bronze.exists(spec)).toBe(false);
            expect(fs.existsSync(record.path)).toBe(false);
            expect(bronze.list()).toEqual([]);
        });

        it('should clean entries older than the threshold', async () => {
            const record = await bronze.save(spec, 'hash-1', () => fromRows(ROWS));
            expect(await bronze.cleanOlderThan(1)).toBe(0);

            inventory.upsertBronze({ ...record, saved_at: Date.now() - 2 * 86_400_000 });

            expect(await bronze.cleanOlderThan(1)).toBe(1);
            expect(bronze.list('uniprot')).toEqual([]);
        });
    });
});

describe('stableStringify', () => {
    it('should sort keys and drop undefined values', () => {
        expect(stableStringify({ b: 1, a: [{ d: null, c: 'x' }], e: undefined })).toBe('{"a":[{"c":"x","d":null}],"b":1}');
    });
});
