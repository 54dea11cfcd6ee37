import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import AdmZip from 'adm-zip';
import ExcelJS from 'exceljs';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { gzipSync } from 'node:zlib';
import { defaultLoaders, detectFormat, LoaderRegistry, type LoaderOptions } from '../loaders/registry.js';
import { flattenRecord, followPath } from '../loaders/flatten.js';
import type { RawRow } from '../types/index.js';
import { ConfigError, FormatDriftError } from '../utils/errors.js';

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const out: T[] = [];
    for await (const item of iterable) out.push(item);
    return out;
}

describe('loaders', () => {
    let dir: string;
    const loaders = defaultLoaders();

    function write(name: string, content: string | Buffer): string {
        const file = path.join(dir, name);
        fs.writeFileSync(file, content);
        return file;
    }

    function load(file: string, format: string, options: LoaderOptions = {}): Promise<RawRow[]> {
        return collect(loaders.load(file, format, options));
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'biostrata-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('delimited text', () => {
        it('should read TSV with a header row', async () => {
            const file = write('proteins.tsv', 'Entry\tLength\nP04637\t393\nP02340\t390\n');

            expect(await load(file, 'tsv')).toEqual([
                { Entry: 'P04637', Length: '393' },
                { Entry: 'P02340', Length: '390' },
            ]);
        });

        it('should keep quotes literal in TSV', async () => {
            const file = write('q.tsv', 'a\tb\n"quoted"\tz\n');

            expect(await load(file, 'tsv')).toEqual([{ a: '"quoted"', b: 'z' }]);
        });

        it('should honour quoting in CSV', async () => {
            const file = write('c.csv', 'name,description\nTP53,"tumour suppressor, p53"\n');

            expect(await load(file, 'csv')).toEqual([{ name: 'TP53', description: 'tumour suppressor, p53' }]);
        });

        it('should use a custom separator', async () => {
            const file = write('s.csv', 'SIGNOR ID;COMPLEX NAME\nSIGNOR-C1;NFKB\n');

            expect(await load(file, 'csv', { separator: ';' })).toEqual([{ 'SIGNOR ID': 'SIGNOR-C1', 'COMPLEX NAME': 'NFKB' }]);
        });

        it('should name columns by position without a header', async () => {
            const file = write('n.tsv', '1\t2\n3\t4\n');

            expect(await load(file, 'tsv', { header: false })).toEqual([
                { '0': '1', '1': '2' },
                { '0': '3', '1': '4' },
            ]);
        });

        it('should skip rows before the header', async () => {
            const file = write('k.tsv', '# generated\n# release 1\nx\ty\n1\t2\n');

            expect(await load(file, 'tsv', { skipHeader: 2 })).toEqual([{ x: '1', y: '2' }]);
        });

        it('should disambiguate blank and repeated header names', async () => {
            const file = write('d.tsv', 'id\tid\t\n1\t2\t3\n');

            expect(await load(file, 'tsv')).toEqual([{ id: '1', id_1: '2', '2': '3' }]);
        });

        it('should leave trailing columns of short rows absent', async () => {
            const file = write('r.tsv', 'a\tb\n1\n');

            expect(await load(file, 'tsv')).toEqual([{ a: '1' }]);
        });
    });

    describe('compression', () => {
        it('should read gzip input', async () => {
            const file = write('p.tsv.gz', gzipSync(Buffer.from('Entry\nP04637\n')));

            expect(await load(file, 'tsv', { compression: 'gzip' })).toEqual([{ Entry: 'P04637' }]);
        });

        it('should report input that is not gzip', async () => {
            const file = write('plain.tsv.gz', 'Entry\nP04637\n');

            await expect(load(file, 'tsv', { compression: 'gzip' })).rejects.toBeInstanceOf(FormatDriftError);
        });

        it('should report a truncated gzip file', async () => {
            const full = gzipSync(Buffer.from('Entry\tLength\nP04637\t393\n'));
            const file = write('cut.tsv.gz', full.subarray(0, full.length - 10));

            const error = await load(file, 'tsv', { compression: 'gzip' }).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(FormatDriftError);
            expect(error).toMatchObject({ code: 'FORMAT_DRIFT', details: { path: file } });
        });

        it('should report corrupt gzip under a whole-document loader', async () => {
            const file = write('records.json.gz', '[{"id": 1}]');

            await expect(load(file, 'json', { compression: 'gzip' })).rejects.toBeInstanceOf(FormatDriftError);
        });

        it('should read the named zip member', async () => {
            const zip = new AdmZip();
            zip.addFile('README', Buffer.from('not data'));
            zip.addFile('human.txt', Buffer.from('id\nEBI-1\n'));
            const file = path.join(dir, 'intact.zip');
            zip.writeZip(file);

            expect(await load(file, 'tsv', { compression: 'zip', archiveMember: 'human.txt' })).toEqual([{ id: 'EBI-1' }]);
        });

        it('should reject a missing zip member', async () => {
            const zip = new AdmZip();
            zip.addFile('human.txt', Buffer.from('id\n'));
            const file = path.join(dir, 'intact.zip');
            zip.writeZip(file);

            await expect(load(file, 'tsv', { compression: 'zip', archiveMember: 'mouse.txt' })).rejects.toBeInstanceOf(FormatDriftError);
        });

        it('should require a custom loader for bz2', async () => {
            const file = write('p.tsv.bz2', 'x');

            await expect(load(file, 'tsv', { compression: 'bz2' })).rejects.toBeInstanceOf(ConfigError);
        });
    });

    describe('json', () => {
        it('should flatten records found at the record path', async () => {
            const file = write(
                'r.json',
                JSON.stringify({
                    results: [{ id: 'A', gene: { symbol: 'TP53' }, tags: ['x', 'y'], score: 1.5, note: null }],
                })
            );

            expect(await load(file, 'json', { recordPath: 'results' })).toEqual([
                { id: 'A', 'gene.symbol': 'TP53', tags: '["x","y"]', score: '1.5', note: null },
            ]);
        });

        it('should read JSON Lines, skipping blank lines', async () => {
            const file = write('r.jsonl', '{"id":1}\n\n{"id":2}\n');

            expect(await load(file, 'json', { jsonLines: true })).toEqual([{ id: '1' }, { id: '2' }]);
        });

        it('should report a missing record path', async () => {
            const file = write('r.json', '{"results":[]}');

            await expect(load(file, 'json', { recordPath: 'entries' })).rejects.toBeInstanceOf(FormatDriftError);
        });

        it('should report invalid JSON', async () => {
            const file = write('r.json', '{"results":');

            await expect(load(file, 'json')).rejects.toBeInstanceOf(FormatDriftError);
        });
    });

    describe('xml', () => {
        it('should expose attributes and element text', async () => {
            const file = write(
                'e.xml',
                '<?xml version="1.0"?><entrySet><entry id="1"><name>TP53</name></entry><entry id="2"><name lang="en">MDM2</name></entry></entrySet>'
            );

            expect(await load(file, 'xml', { recordPath: 'entrySet.entry' })).toEqual([
                { '@_id': '1', name: 'TP53' },
                { '@_id': '2', 'name.#text': 'MDM2', 'name.@_lang': 'en' },
            ]);
        });

        it('should treat a single element as one record', async () => {
            const file = write('e.xml', '<entrySet><entry id="7"><name>BRCA1</name></entry></entrySet>');

            expect(await load(file, 'xml', { recordPath: 'entrySet.entry' })).toEqual([{ '@_id': '7', name: 'BRCA1' }]);
        });
    });

    describe('excel', () => {
        it('should read the first worksheet with empty cells as null', async () => {
            const workbook = new ExcelJS.Workbook();
            const sheet = workbook.addWorksheet('Proteins');
            sheet.addRow(['Entry', 'Length']);
            sheet.addRow(['P04637', 393]);
            sheet.addRow(['P02340']);
            const file = path.join(dir, 'p.xlsx');
            await workbook.xlsx.writeFile(file);

            expect(await load(file, 'excel')).toEqual([
                { Entry: 'P04637', Length: '393' },
                { Entry: 'P02340', Length: null },
            ]);
        });

        it('should report a missing worksheet', async () => {
            const workbook = new ExcelJS.Workbook();
            workbook.addWorksheet('Proteins').addRow(['Entry']);
            const file = path.join(dir, 'p.xlsx');
            await workbook.xlsx.writeFile(file);

            await expect(load(file, 'excel', { sheet: 'Genes' })).rejects.toBeInstanceOf(FormatDriftError);
        });
    });

    describe('parquet', () => {
        it('should read rows as text', async () => {
            const schema = new ParquetSchema({
                id: { type: 'UTF8' },
                length: { type: 'INT32' },
            });
            const file = path.join(dir, 'p.parquet');
            const writer = await ParquetWriter.openFile(schema, file);
            await writer.appendRow({ id: 'P04637', length: 393 });
            await writer.close();

            expect(await load(file, 'parquet')).toEqual([{ id: 'P04637', length: '393' }]);
        });
    });
});

describe('LoaderRegistry', () => {
    it('should reject formats without a loader', () => {
        expect(() => new LoaderRegistry().get('rda')).toThrow(ConfigError);
        expect(defaultLoaders().has('rda')).toBe(false);
    });

    it('should use a registered loader', async () => {
        async function* fake(): AsyncGenerator<RawRow> {
            yield { gene: 'TP53' };
        }
        const registry = defaultLoaders().register('rda', fake);

        expect(await collect(registry.load('/unused.rda', 'rda'))).toEqual([{ gene: 'TP53' }]);
    });
});

describe('detectFormat', () => {
    it('should map extensions to formats', () => {
        expect(detectFormat('proteins.tsv.gz')).toBe('tsv');
        expect(detectFormat('human.txt')).toBe('tsv');
        expect(detectFormat('complexes.CSV')).toBe('csv');
        expect(detectFormat('drugs.xlsx')).toBe('excel');
        expect(detectFormat('dump.rdata')).toBe('rda');
        expect(detectFormat('stream')).toBeNull();
    });
});

describe('flatten helpers', () => {
    it('should name scalar records "value"', () => {
        expect(flattenRecord('TP53')).toEqual({ value: 'TP53' });
    });

    it('should follow dotted paths', () => {
        expect(followPath({ a: { b: [1] } }, 'a.b')).toEqual([1]);
        expect(followPath({ a: 1 }, 'a.b')).toBeUndefined();
        expect(followPath({ a: 1 }, undefined)).toEqual({ a: 1 });
    });
});
