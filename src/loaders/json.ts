import { createInterface } from 'node:readline';
import type { RawRow } from '../types/index.js';
import { FormatDriftError } from '../utils/errors.js';
import { flattenRecord, followPath } from './flatten.js';
import { inputError, openInput, readInputText } from './input.js';
import type { LoaderOptions } from './registry.js';

/**
 * Records from a JSON document (an array, or the array found at
 * `recordPath`) or from JSON Lines.
 */
export async function* loadJson(path: string, options: LoaderOptions): AsyncGenerator<RawRow> {
    if (options.jsonLines) {
        yield* loadJsonLines(path, options);
        return;
    }

    const text = await readInputText(path, options);
    let document: unknown;
    try {
        document = JSON.parse(text);
    } catch (error) {
        throw new FormatDriftError(`Invalid JSON in ${path}`, { cause: String(error) });
    }

    const records = followPath(document, options.recordPath);
    if (records === undefined) {
        throw new FormatDriftError(`Record path '${options.recordPath ?? ''}' not found`, { path });
    }

    if (Array.isArray(records)) {
        for (const record of records) yield flattenRecord(record);
    } else {
        yield flattenRecord(records);
    }
}

async function* loadJsonLines(path: string, options: LoaderOptions): AsyncGenerator<RawRow> {
    const input = openInput(path, options);
    const lines = createInterface({ input, crlfDelay: Infinity });
    let lineNumber = 0;
    try {
        for await (const line of lines) {
            lineNumber++;
            if (line.trim() === '') continue;
            let record: unknown;
            try {
                record = JSON.parse(line);
            } catch (error) {
                throw new FormatDriftError(`Invalid JSON on line ${lineNumber} of ${path}`, { cause: String(error) });
            }
            yield flattenRecord(followPath(record, options.recordPath));
        }
    } catch (error) {
        throw inputError(error, path);
    } finally {
        lines.close();
        input.destroy();
    }
}
