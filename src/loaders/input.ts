import AdmZip from 'adm-zip';
import { createReadStream } from 'node:fs';
import { pipeline, Readable, type Duplex } from 'node:stream';
import { createGunzip } from 'node:zlib';
import { ConfigError, errorMessage, FormatDriftError } from '../utils/errors.js';

export type Compression = 'gzip' | 'zip' | 'bz2' | 'xz' | 'tar';

export interface InputOptions {
    compression?: Compression;
    /** File to read from a zip archive; defaults to the first file entry. */
    archiveMember?: string;
}

/**
 * Open a cached file as a byte stream, decompressing on the fly.
 * Destroying the returned stream closes the file underneath it; a
 * decompression failure errors the returned stream.
 */
export function openInput(path: string, options: InputOptions = {}): Readable {
    switch (options.compression) {
        case undefined:
            return createReadStream(path);
        case 'gzip':
            return chain(createReadStream(path), createGunzip());
        case 'zip':
            return Readable.from([readZipMember(path, options.archiveMember)]);
        default:
            throw new ConfigError(`Compression '${options.compression}' needs a custom loader`, { path });
    }
}

/**
 * Read the whole input as text.
 */
export async function readInputText(path: string, options: InputOptions & { encoding?: BufferEncoding } = {}): Promise<string> {
    const stream = openInput(path, options);
    const chunks: Buffer[] = [];
    try {
        for await (const chunk of stream) {
            chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
        }
    } catch (error) {
        throw inputError(error, path);
    } finally {
        stream.destroy();
    }
    return Buffer.concat(chunks).toString(options.encoding ?? 'utf-8');
}

/**
 * Pipe `source` into `target` so that an error or early destroy on
 * either side tears down both. Returns `target`.
 */
export function chain<T extends Duplex>(source: Readable, target: T): T {
    const destination: Duplex = target;
    pipeline(source, destination, (error) => {
        if (error) target.destroy(error);
    });
    return target;
}

/**
 * Decompression and parse failures as FormatDriftError. Other errors
 * are returned unchanged.
 */
export function inputError(error: unknown, path: string): unknown {
    if (error instanceof FormatDriftError) return error;
    const code = errorCode(error);
    if (code !== undefined && (code.startsWith('Z_') || code.startsWith('CSV_'))) {
        return new FormatDriftError(`Unreadable input ${path}: ${errorMessage(error)}`, { path, code });
    }
    return error;
}

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function readZipMember(path: string, member?: string): Buffer {
    const zip = new AdmZip(path);
    const entry = member ? zip.getEntry(member) : zip.getEntries().find((candidate) => !candidate.isDirectory);
    if (!entry) {
        throw new FormatDriftError(`Archive member ${member ?? '<first file>'} not found`, {
            path,
            members: zip.getEntries().map((candidate) => candidate.entryName),
        });
    }
    return entry.getData();
}
