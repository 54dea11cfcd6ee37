import { extname } from 'node:path';
import type { RawRow } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { loadExcel } from './excel.js';
import type { InputOptions } from './input.js';
import { loadJson } from './json.js';
import { loadParquet } from './parquet.js';
import { loadDelimited } from './tabular.js';
import { loadXml } from './xml.js';

export type SourceFormat = 'tsv' | 'csv' | 'excel' | 'json' | 'xml' | 'rda' | 'parquet';

/**
 * Options understood by the built-in loaders. Each loader reads the
 * subset relevant to its format.
 */
export interface LoaderOptions extends InputOptions {
    separator?: string;
    /** Whether the first (non-skipped) row names the columns. Defaults to true. */
    header?: boolean;
    /** Rows to skip before the header. */
    skipHeader?: number;
    sheet?: string | number;
    encoding?: BufferEncoding;
    /** Dotted path to the record list in JSON or XML documents. */
    recordPath?: string;
    jsonLines?: boolean;
}

export type Loader = (path: string, options: LoaderOptions) => AsyncIterable<RawRow>;

const EXTENSIONS: Record<string, SourceFormat> = {
    '.tsv': 'tsv',
    '.tab': 'tsv',
    '.txt': 'tsv',
    '.mitab': 'tsv',
    '.csv': 'csv',
    '.xlsx': 'excel',
    '.xls': 'excel',
    '.json': 'json',
    '.jsonl': 'json',
    '.ndjson': 'json',
    '.xml': 'xml',
    '.rda': 'rda',
    '.rdata': 'rda',
    '.parquet': 'parquet',
};

/**
 * Guess a format from a file name, ignoring a compression suffix.
 */
export function detectFormat(fileName: string): SourceFormat | null {
    const stripped = fileName.replace(/\.(gz|gzip|zip|bz2|xz)$/i, '');
    return EXTENSIONS[extname(stripped).toLowerCase()] ?? null;
}

/**
 * Format name to loader. Formats without a built-in reader (rda) are
 * available once a loader is registered for them.
 */
export class LoaderRegistry {
    private readonly loaders = new Map<string, Loader>();

    register(format: string, loader: Loader): this {
        this.loaders.set(format, loader);
        return this;
    }

    has(format: string): boolean {
        return this.loaders.has(format);
    }

    get(format: string): Loader {
        const loader = this.loaders.get(format);
        if (!loader) {
            throw new ConfigError(`No loader registered for format '${format}'`, {
                format,
                available: [...this.loaders.keys()],
            });
        }
        return loader;
    }

    load(path: string, format: string, options: LoaderOptions = {}): AsyncIterable<RawRow> {
        return this.get(format)(path, options);
    }
}

/**
 * Registry with the built-in readers.
 */
export function defaultLoaders(): LoaderRegistry {
    return new LoaderRegistry()
        .register('tsv', (path, options) => loadDelimited(path, options, '\t'))
        .register('csv', (path, options) => loadDelimited(path, options, ','))
        .register('excel', loadExcel)
        .register('json', loadJson)
        .register('xml', loadXml)
        .register('parquet', loadParquet);
}
