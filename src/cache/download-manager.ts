import { createHash, randomUUID } from 'node:crypto';
import { existsSync, mkdirSync } from 'node:fs';
import { open, rename, rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { CacheInventory, DownloadRecord } from '../storage/cache-inventory.js';
import { ChecksumMismatchError, DownloadError, errorMessage } from '../utils/errors.js';
import { HttpError, isRetryableError, type HttpClient, type HttpRequestOptions, type HttpStreamResponse } from '../utils/http-client.js';
import type { Logger } from '../utils/logger.js';

export type ChecksumType = 'md5' | 'sha1' | 'sha256';

/**
 * What to fetch and how to tell whether it changed.
 */
export interface DownloadRequest {
    /** Cache namespace and rate-limit group. */
    resource: string;
    url: string;
    method?: 'GET' | 'POST';
    params?: Record<string, string | number | boolean>;
    headers?: Record<string, string>;
    body?: string | Record<string, unknown>;
    form?: Record<string, string>;
    checkEtag?: boolean;
    checkLastModified?: boolean;
    checksumUrl?: string;
    checksumType?: ChecksumType;
}

export interface DownloadResult {
    key: string;
    path: string;
    /** sha256 of the file content. */
    contentHash: string;
    /** True when no body was downloaded in this call. */
    fromCache: boolean;
}

export interface DownloadManagerOptions {
    cacheDir: string;
    inventory: CacheInventory;
    http: HttpClient;
    logger: Logger;
    /** Within this window a cached file is used without contacting the remote. */
    revalidateAfterHours: number;
}

/**
 * Fetch-and-cache for remote files with change detection.
 *
 * A cached file checked within the revalidation window is reused with no
 * network traffic. After that a single HEAD compares ETag, then
 * Last-Modified; a declared checksum file is the last validator. The body
 * streams to a temporary file and is renamed into place only after the
 * checksum (if any) matches.
 */
export class DownloadManager {
    private readonly downloadDir: string;

    constructor(private readonly options: DownloadManagerOptions) {
        this.downloadDir = join(options.cacheDir, 'downloads');
    }

    async fetch(request: DownloadRequest, fetchOptions: { forceRefresh?: boolean } = {}): Promise<DownloadResult> {
        const { inventory, logger } = this.options;
        const url = buildUrl(request.url, request.params);
        const key = downloadKey(request, url);
        const cached = inventory.getDownload(key);
        const usable = cached && existsSync(cached.path) ? cached : undefined;

        if (usable && !fetchOptions.forceRefresh) {
            const ageMs = Date.now() - usable.checked_at;
            if (ageMs < this.options.revalidateAfterHours * 3_600_000) {
                logger.debug({ url, path: usable.path }, 'Using cached download');
                return { key, path: usable.path, contentHash: usable.content_hash, fromCache: true };
            }

            if (!(await this.hasChanged(request, url, usable))) {
                inventory.markChecked(key);
                logger.info({ url }, 'Remote unchanged, using cached download');
                return { key, path: usable.path, contentHash: usable.content_hash, fromCache: true };
            }
        }

        return this.download(request, url, key);
    }

    /**
     * Cached downloads, optionally for one resource.
     */
    list(resource?: string): DownloadRecord[] {
        return this.options.inventory.listDownloads(resource);
    }

    async delete(key: string): Promise<void> {
        const record = this.options.inventory.getDownload(key);
        if (!record) return;
        await rm(record.path, { force: true });
        this.options.inventory.deleteDownload(key);
    }

    /**
     * Remove downloads fetched more than `days` days ago. Returns how many were removed.
     */
    async cleanOlderThan(days: number): Promise<number> {
        const cutoff = Date.now() - days * 86_400_000;
        const { downloads } = this.options.inventory.olderThan(cutoff);
        for (const record of downloads) {
            await this.delete(record.key);
        }
        return downloads.length;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async hasChanged(request: DownloadRequest, url: string, cached: DownloadRecord): Promise<boolean> {
        const { logger } = this.options;
        const checkEtag = request.checkEtag ?? true;
        const checkLastModified = request.checkLastModified ?? true;

        if ((checkEtag || checkLastModified) && (request.method ?? 'GET') === 'GET') {
            const headers = await this.headHeaders(request, url);
            const etag = headers['etag'];
            if (checkEtag && cached.etag && etag) {
                logger.debug({ url, cached: cached.etag, remote: etag }, 'Compared ETag');
                return etag !== cached.etag;
            }
            const lastModified = headers['last-modified'];
            if (checkLastModified && cached.last_modified && lastModified) {
                logger.debug({ url, cached: cached.last_modified, remote: lastModified }, 'Compared Last-Modified');
                return lastModified !== cached.last_modified;
            }
        }

        if (request.checksumUrl && cached.checksum) {
            const remote = await this.fetchChecksum(request, url);
            return remote !== cached.checksum;
        }

        logger.debug({ url }, 'No validator available, refetching');
        return true;
    }

    /**
     * HEAD headers, or none when the server does not support HEAD.
     */
    private async headHeaders(request: DownloadRequest, url: string): Promise<Record<string, string>> {
        try {
            const response = await this.options.http.head(url, { headers: request.headers, source: request.resource });
            return response.headers;
        } catch (error) {
            if (error instanceof HttpError && !error.retryable && error.status >= 400 && error.status < 500) {
                this.options.logger.debug({ url, status: error.status }, 'HEAD not supported, skipping header validators');
                return {};
            }
            throw toDownloadError(error, url);
        }
    }

    private async fetchChecksum(request: DownloadRequest, url: string): Promise<string> {
        const checksumUrl = request.checksumUrl ?? '';
        let text: string;
        try {
            text = await this.options.http.getText(checksumUrl, { source: request.resource });
        } catch (error) {
            throw toDownloadError(error, checksumUrl);
        }
        const digest = parseChecksumFile(text, fileNameFor(url));
        if (!digest) {
            throw new DownloadError(`No digest found in checksum file ${checksumUrl}`, checksumUrl);
        }
        return digest;
    }

    private async download(request: DownloadRequest, url: string, key: string): Promise<DownloadResult> {
        const { http, inventory, logger } = this.options;
        const dir = join(this.downloadDir, request.resource);
        mkdirSync(dir, { recursive: true });
        const finalPath = join(dir, `${key}-${fileNameFor(url)}`);
        const tmpPath = `${finalPath}.${randomUUID()}.part`;
        const checksumType = request.checksumType ?? 'md5';

        const requestOptions: HttpRequestOptions = {
            method: request.method ?? 'GET',
            headers: request.headers,
            body: request.body,
            form: request.form,
            source: request.resource,
        };

        logger.info({ url, resource: request.resource }, 'Downloading');

        const { headers: responseHeaders, written } = await this.transfer(url, requestOptions, tmpPath, checksumType);

        let checksum: string | null = null;
        if (request.checksumUrl) {
            let expected: string;
            try {
                expected = await this.fetchChecksum(request, url);
            } catch (error) {
                await rm(tmpPath, { force: true });
                throw error;
            }
            if (expected !== written.checksum) {
                await rm(tmpPath, { force: true });
                throw new ChecksumMismatchError(url, expected, written.checksum, checksumType);
            }
            checksum = expected;
        }

        await rename(tmpPath, finalPath);

        const now = Date.now();
        inventory.upsertDownload({
            key,
            resource: request.resource,
            url,
            path: finalPath,
            etag: responseHeaders['etag'] ?? null,
            last_modified: responseHeaders['last-modified'] ?? null,
            checksum,
            checksum_type: checksum ? checksumType : null,
            content_hash: written.contentHash,
            size: written.size,
            downloaded_at: now,
            checked_at: now,
        });

        logger.info({ url, path: finalPath, bytes: written.size }, 'Download complete');
        return { key, path: finalPath, contentHash: written.contentHash, fromCache: false };
    }

    /**
     * Request and stream the body to `tmpPath`. The request itself is
     * retried by the HTTP client; a body interrupted by a retryable
     * failure restarts the whole transfer, up to the client's retry budget.
     */
    private async transfer(
        url: string,
        requestOptions: HttpRequestOptions,
        tmpPath: string,
        checksumType: ChecksumType
    ): Promise<{ headers: Record<string, string>; written: WrittenBody }> {
        const { http, logger } = this.options;
        for (let attempt = 0; ; attempt++) {
            let response: HttpStreamResponse;
            try {
                response = await http.stream(url, requestOptions);
            } catch (error) {
                throw toDownloadError(error, url);
            }

            try {
                const written = await writeBody(response.body, tmpPath, checksumType);
                return { headers: response.headers, written };
            } catch (error) {
                await rm(tmpPath, { force: true });
                if (attempt < http.maxRetries && isRetryableError(error)) {
                    const backoffMs = await http.backoff(attempt);
                    logger.warn({ url, attempt: attempt + 1, backoffMs, err: errorMessage(error) }, 'Transfer interrupted, retrying');
                    continue;
                }
                throw toDownloadError(error, url);
            }
        }
    }
}

interface WrittenBody {
    size: number;
    contentHash: string;
    checksum: string;
}

/**
 * Stream a body to disk, hashing as it goes. The reader is cancelled if
 * writing fails, so the connection is released.
 */
async function writeBody(
    body: ReadableStream<Uint8Array> | null,
    path: string,
    checksumType: ChecksumType
): Promise<WrittenBody> {
    const content = createHash('sha256');
    const declared = createHash(checksumType);
    let size = 0;

    const handle = await open(path, 'w');
    try {
        if (body) {
            const reader = body.getReader();
            try {
                for (;;) {
                    const { done, value } = await reader.read();
                    if (done) break;
                    content.update(value);
                    declared.update(value);
                    await handle.write(value);
                    size += value.byteLength;
                }
            } catch (error) {
                await reader.cancel(errorMessage(error));
                throw error;
            } finally {
                reader.releaseLock();
            }
        }
    } finally {
        await handle.close();
    }

    return { size, contentHash: content.digest('hex'), checksum: declared.digest('hex') };
}

function toDownloadError(error: unknown, url: string): Error {
    if (error instanceof DownloadError || error instanceof ChecksumMismatchError) return error;
    const status = error instanceof HttpError ? error.status : undefined;
    return new DownloadError(`Download failed for ${url}: ${errorMessage(error)}`, url, status, { cause: error });
}

/**
 * Append query parameters in a stable order.
 */
export function buildUrl(url: string, params?: Record<string, string | number | boolean>): string {
    if (!params || Object.keys(params).length === 0) return url;
    const parsed = new URL(url);
    for (const name of Object.keys(params).sort()) {
        parsed.searchParams.set(name, String(params[name]));
    }
    return parsed.toString();
}

/**
 * Cache key for a request: hash of method, full URL and body.
 */
export function downloadKey(request: DownloadRequest, url: string): string {
    const identity = JSON.stringify({
        method: request.method ?? 'GET',
        url,
        body: request.body ?? null,
        form: request.form ?? null,
    });
    return createHash('sha256').update(identity).digest('hex').slice(0, 16);
}

/**
 * Last path segment of the URL, safe as a file name.
 */
export function fileNameFor(url: string): string {
    const name = basename(new URL(url).pathname);
    const safe = name.replace(/[^A-Za-z0-9._-]/g, '_');
    return safe || 'download';
}

/**
 * Extract a hex digest from a checksum file. `sha256sum` style files list
 * several files; the line naming `fileName` wins, otherwise the first digest.
 */
export function parseChecksumFile(text: string, fileName: string): string | null {
    const digest = /\b([a-fA-F0-9]{32,128})\b/;
    let first: string | null = null;
    for (const line of text.split(/\r?\n/)) {
        const match = digest.exec(line);
        if (!match?.[1]) continue;
        const value = match[1].toLowerCase();
        if (line.includes(fileName)) return value;
        first ??= value;
    }
    return first;
}
