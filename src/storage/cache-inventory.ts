import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * A cached download, keyed by request hash.
 */
export interface DownloadRecord {
    key: string;
    resource: string;
    url: string;
    path: string;
    etag: string | null;
    last_modified: string | null;
    checksum: string | null;
    checksum_type: string | null;
    content_hash: string;
    size: number;
    downloaded_at: number;
    checked_at: number;
}

/**
 * A materialized bronze entry. `columns_json` keeps the original column
 * names in file order; the Parquet file stores positional names.
 */
export interface BronzeRecord {
    key: string;
    resource: string;
    dataset: string;
    path: string;
    partitioned: number;
    source_hash: string;
    columns_json: string;
    num_rows: number;
    config_json: string;
    saved_at: number;
}

export interface InventoryStats {
    downloads: number;
    downloadBytes: number;
    bronzeEntries: number;
    bronzeRows: number;
}

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Raw downloads and the validators seen when they were fetched
CREATE TABLE IF NOT EXISTS downloads (
  key TEXT PRIMARY KEY,
  resource TEXT NOT NULL,
  url TEXT NOT NULL,
  path TEXT NOT NULL,
  etag TEXT,
  last_modified TEXT,
  checksum TEXT,
  checksum_type TEXT,
  content_hash TEXT NOT NULL,
  size INTEGER NOT NULL,
  downloaded_at INTEGER NOT NULL,
  checked_at INTEGER NOT NULL
);

-- Columnar caches derived from downloads
CREATE TABLE IF NOT EXISTS bronze_entries (
  key TEXT PRIMARY KEY,
  resource TEXT NOT NULL,
  dataset TEXT NOT NULL,
  path TEXT NOT NULL,
  partitioned INTEGER NOT NULL DEFAULT 0,
  source_hash TEXT NOT NULL,
  columns_json TEXT NOT NULL,
  num_rows INTEGER NOT NULL,
  config_json TEXT NOT NULL DEFAULT '{}',
  saved_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_downloads_resource ON downloads(resource);
CREATE INDEX IF NOT EXISTS idx_bronze_resource ON bronze_entries(resource, dataset);
`;

/**
 * Inventory of everything in the cache directory. Shared by concurrent
 * pipelines: WAL mode plus a busy timeout serializes writers.
 */
export class CacheInventory {
    private db: Database.Database;
    private readonly logger: Logger;

    constructor(dbPath: string, logger: Logger = getLogger()) {
        this.logger = logger;
        if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('busy_timeout = 5000');

        this.migrate();

        this.logger.debug({ dbPath }, 'Cache inventory opened');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            this.logger.debug('Cache inventory migrated to v1');
        }
    }

    // ─── Downloads ────────────────────────────────────────────

    getDownload(key: string): DownloadRecord | undefined {
        return this.db.prepare<[string], DownloadRecord>('SELECT * FROM downloads WHERE key = ?').get(key);
    }

    /**
     * Insert or replace a download record.
     */
    upsertDownload(record: DownloadRecord): void {
        this.db
            .prepare<DownloadRecord>(`
      INSERT INTO downloads (key, resource, url, path, etag, last_modified, checksum, checksum_type, content_hash, size, downloaded_at, checked_at)
      VALUES (@key, @resource, @url, @path, @etag, @last_modified, @checksum, @checksum_type, @content_hash, @size, @downloaded_at, @checked_at)
      ON CONFLICT(key) DO UPDATE SET
        resource = excluded.resource,
        url = excluded.url,
        path = excluded.path,
        etag = excluded.etag,
        last_modified = excluded.last_modified,
        checksum = excluded.checksum,
        checksum_type = excluded.checksum_type,
        content_hash = excluded.content_hash,
        size = excluded.size,
        downloaded_at = excluded.downloaded_at,
        checked_at = excluded.checked_at
    `)
            .run(record);
    }

    /**
     * Record that a cached download was revalidated without refetching.
     */
    markChecked(key: string, checkedAt: number = Date.now()): void {
        this.db.prepare<[number, string]>('UPDATE downloads SET checked_at = ? WHERE key = ?').run(checkedAt, key);
    }

    deleteDownload(key: string): void {
        this.db.prepare<[string]>('DELETE FROM downloads WHERE key = ?').run(key);
    }

    listDownloads(resource?: string): DownloadRecord[] {
        if (resource) {
            return this.db
                .prepare<[string], DownloadRecord>('SELECT * FROM downloads WHERE resource = ? ORDER BY url')
                .all(resource);
        }
        return this.db.prepare<[], DownloadRecord>('SELECT * FROM downloads ORDER BY resource, url').all();
    }

    // ─── Bronze entries ───────────────────────────────────────

    getBronze(key: string): BronzeRecord | undefined {
        return this.db.prepare<[string], BronzeRecord>('SELECT * FROM bronze_entries WHERE key = ?').get(key);
    }

    upsertBronze(record: BronzeRecord): void {
        this.db
            .prepare<BronzeRecord>(`
      INSERT INTO bronze_entries (key, resource, dataset, path, partitioned, source_hash, columns_json, num_rows, config_json, saved_at)
      VALUES (@key, @resource, @dataset, @path, @partitioned, @source_hash, @columns_json, @num_rows, @config_json, @saved_at)
      ON CONFLICT(key) DO UPDATE SET
        resource = excluded.resource,
        dataset = excluded.dataset,
        path = excluded.path,
        partitioned = excluded.partitioned,
        source_hash = excluded.source_hash,
        columns_json = excluded.columns_json,
        num_rows = excluded.num_rows,
        config_json = excluded.config_json,
        saved_at = excluded.saved_at
    `)
            .run(record);
    }

    deleteBronze(key: string): void {
        this.db.prepare<[string]>('DELETE FROM bronze_entries WHERE key = ?').run(key);
    }

    listBronze(resource?: string): BronzeRecord[] {
        if (resource) {
            return this.db
                .prepare<[string], BronzeRecord>('SELECT * FROM bronze_entries WHERE resource = ? ORDER BY dataset')
                .all(resource);
        }
        return this.db.prepare<[], BronzeRecord>('SELECT * FROM bronze_entries ORDER BY resource, dataset').all();
    }

    // ─── Maintenance ──────────────────────────────────────────

    /**
     * Entries last written before `cutoff` (epoch milliseconds).
     */
    olderThan(cutoff: number): { downloads: DownloadRecord[]; bronze: BronzeRecord[] } {
        return {
            downloads: this.db.prepare<[number], DownloadRecord>('SELECT * FROM downloads WHERE downloaded_at < ?').all(cutoff),
            bronze: this.db.prepare<[number], BronzeRecord>('SELECT * FROM bronze_entries WHERE saved_at < ?').all(cutoff),
        };
    }

    getStats(): InventoryStats {
        const downloads = this.db
            .prepare<[], { count: number; bytes: number | null }>('SELECT COUNT(*) AS count, SUM(size) AS bytes FROM downloads')
            .get();
        const bronze = this.db
            .prepare<[], { count: number; rows: number | null }>('SELECT COUNT(*) AS count, SUM(num_rows) AS rows FROM bronze_entries')
            .get();
        return {
            downloads: downloads?.count ?? 0,
            downloadBytes: downloads?.bytes ?? 0,
            bronzeEntries: bronze?.count ?? 0,
            bronzeRows: bronze?.rows ?? 0,
        };
    }

    /**
     * Remove every record.
     */
    clear(): void {
        this.db.exec('DELETE FROM downloads; DELETE FROM bronze_entries;');
    }

    close(): void {
        this.db.close();
    }
}
