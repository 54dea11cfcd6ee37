import { ParquetReader } from '@dsnp/parquetjs';
import type { RawRow } from '../types/index.js';
import { flattenRecord, isPlainObject } from './flatten.js';
import type { LoaderOptions } from './registry.js';

/**
 * Rows of a Parquet file published by the source itself.
 */
export async function* loadParquet(path: string, _options: LoaderOptions): AsyncGenerator<RawRow> {
    const reader = await ParquetReader.openFile(path);
    try {
        const cursor = reader.getCursor();
        for (;;) {
            const record: unknown = await cursor.next();
            if (!isPlainObject(record)) break;
            yield flattenRecord(record);
        }
    } finally {
        await reader.close();
    }
}
