import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CacheInventory, type BronzeRecord, type DownloadRecord } from '../storage/cache-inventory.js';
import { silentLogger } from '../utils/logger.js';

function download(overrides: Partial<DownloadRecord> = {}): DownloadRecord {
    return {
        key: 'k1',
        resource: 'uniprot',
        url: 'https://example.org/proteins.tsv',
        path: '/tmp/k1-proteins.tsv',
        etag: '"v1"',
        last_modified: null,
        checksum: null,
        checksum_type: null,
        content_hash: 'abc',
        size: 100,
        downloaded_at: 1_000,
        checked_at: 1_000,
        ...overrides,
    };
}

function bronze(overrides: Partial<BronzeRecord> = {}): BronzeRecord {
    return {
        key: 'uniprot_proteins_00000000',
        resource: 'uniprot',
        dataset: 'proteins',
        path: '/tmp/b.parquet',
        partitioned: 0,
        source_hash: 'abc',
        columns_json: '["Entry"]',
        num_rows: 3,
        config_json: '{}',
        saved_at: 1_000,
        ...overrides,
    };
}

describe('CacheInventory', () => {
    let inventory: CacheInventory;
    let dbPath: string;

    beforeEach(() => {
        const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'biostrata-'));
        dbPath = path.join(tmpDir, 'inventory.db');
        inventory = new CacheInventory(dbPath, silentLogger());
    });

    afterEach(() => {
        inventory.close();
        fs.rmSync(path.dirname(dbPath), { recursive: true, force: true });
    });

    describe('downloads', () => {
        it('should insert and read back a record', () => {
            inventory.upsertDownload(download());
            expect(inventory.getDownload('k1')).toEqual(download());
        });

        it('should replace a record with the same key', () => {
            inventory.upsertDownload(download());
            inventory.upsertDownload(download({ etag: '"v2"', size: 200 }));

            expect(inventory.getDownload('k1')?.etag).toBe('"v2"');
            expect(inventory.listDownloads()).toHaveLength(1);
        });

        it('should update only the check time', () => {
            inventory.upsertDownload(download());
            inventory.markChecked('k1', 5_000);

            expect(inventory.getDownload('k1')).toEqual(download({ checked_at: 5_000 }));
        });

        it('should list by resource', () => {
            inventory.upsertDownload(download());
            inventory.upsertDownload(download({ key: 'k2', resource: 'signor' }));

            expect(inventory.listDownloads('signor').map((record) => record.key)).toEqual(['k2']);
            expect(inventory.listDownloads().map((record) => record.resource)).toEqual(['signor', 'uniprot']);
        });

        it('should delete a record', () => {
            inventory.upsertDownload(download());
            inventory.deleteDownload('k1');
            expect(inventory.getDownload('k1')).toBeUndefined();
        });
    });

    describe('bronze entries', () => {
        it('should insert and read back a record', () => {
            inventory.upsertBronze(bronze());
            expect(inventory.getBronze('uniprot_proteins_00000000')).toEqual(bronze());
            expect(inventory.listBronze('uniprot')).toHaveLength(1);
        });

        it('should delete a record', () => {
            inventory.upsertBronze(bronze());
            inventory.deleteBronze('uniprot_proteins_00000000');
            expect(inventory.listBronze()).toEqual([]);
        });
    });

    describe('maintenance', () => {
        it('should find entries older than a cutoff', () => {
            inventory.upsertDownload(download({ key: 'old', downloaded_at: 1_000 }));
            inventory.upsertDownload(download({ key: 'new', downloaded_at: 9_000 }));
            inventory.upsertBronze(bronze({ saved_at: 2_000 }));

            const stale = inventory.olderThan(5_000);
            expect(stale.downloads.map((record) => record.key)).toEqual(['old']);
            expect(stale.bronze).toHaveLength(1);
        });

        it('should report totals', () => {
            expect(inventory.getStats()).toEqual({ downloads: 0, downloadBytes: 0, bronzeEntries: 0, bronzeRows: 0 });

            inventory.upsertDownload(download({ key: 'a', size: 100 }));
            inventory.upsertDownload(download({ key: 'b', size: 50 }));
            inventory.upsertBronze(bronze({ num_rows: 7 }));

            expect(inventory.getStats()).toEqual({ downloads: 2, downloadBytes: 150, bronzeEntries: 1, bronzeRows: 7 });
        });

        it('should clear everything', () => {
            inventory.upsertDownload(download());
            inventory.upsertBronze(bronze());
            inventory.clear();

            expect(inventory.getStats().downloads).toBe(0);
            expect(inventory.getStats().bronzeEntries).toBe(0);
        });

        it('should keep records across reopen', () => {
            inventory.upsertDownload(download());
            inventory.close();

            inventory = new CacheInventory(dbPath, silentLogger());
            expect(inventory.getDownload('k1')?.url).toBe('https://example.org/proteins.tsv');
        });
    });
});
