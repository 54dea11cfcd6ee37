import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, type ReadStream } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { gzipSync } from 'node:zlib';
import { openInput } from '../loaders/input.js';
import { loadDelimited } from '../loaders/tabular.js';

const { opened } = vi.hoisted(() => {
    const opened: ReadStream[] = [];
    return { opened };
});

vi.mock('node:fs', async (importOriginal) => {
    const actual = await importOriginal<typeof import('node:fs')>();
    const createReadStream: typeof actual.createReadStream = (...args) => {
        const stream = actual.createReadStream(...args);
        opened.push(stream);
        return stream;
    };
    return { ...actual, default: { ...actual, createReadStream }, createReadStream };
});

function whenClosed(stream: ReadStream): Promise<void> {
    return new Promise((resolve) => {
        if (stream.closed) resolve();
        else stream.once('close', () => resolve());
    });
}

describe('openInput', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(os.tmpdir(), 'biostrata-input-'));
        opened.length = 0;
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function bigGzipTsv(): string {
        const lines = ['Entry\tLength', ...Array.from({ length: 50_000 }, (_, i) => `P${i}\t${i}`)];
        const file = path.join(dir, 'big.tsv.gz');
        writeFileSync(file, gzipSync(Buffer.from(lines.join('\n'))));
        return file;
    }

    it('should close the file when the decompressed stream is destroyed', async () => {
        const stream = openInput(bigGzipTsv(), { compression: 'gzip' });
        stream.destroy();

        expect(opened).toHaveLength(1);
        const [file] = opened;
        if (!file) throw new Error('no file stream opened');
        await whenClosed(file);
        expect(file.destroyed).toBe(true);
    });

    it('should close the file when a gzip TSV is abandoned after one row', async () => {
        const rows: unknown[] = [];
        for await (const row of loadDelimited(bigGzipTsv(), { compression: 'gzip' }, '\t')) {
            rows.push(row);
            break;
        }

        expect(rows).toEqual([{ Entry: 'P0', Length: '0' }]);
        const [file] = opened;
        if (!file) throw new Error('no file stream opened');
        await whenClosed(file);
        expect(file.destroyed).toBe(true);
    });
});
