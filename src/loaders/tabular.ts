import { parse } from 'csv-parse';
import type { RawRow } from '../types/index.js';
import { chain, inputError, openInput } from './input.js';
import type { LoaderOptions } from './registry.js';

/**
 * Stream rows from a delimited text file. Without a header row, columns
 * are named by position ('0', '1', ...). Short rows leave trailing
 * columns absent; extra cells are named by position.
 */
export async function* loadDelimited(path: string, options: LoaderOptions, defaultSeparator: string): AsyncGenerator<RawRow> {
    const separator = options.separator ?? defaultSeparator;
    const input = openInput(path, options);
    const parser = chain(
        input,
        parse({
            delimiter: separator,
            // Quotes are literal in TSV.
            quote: separator === '\t' ? false : '"',
            relax_quotes: true,
            relax_column_count: true,
            skip_empty_lines: true,
            bom: true,
            from_line: (options.skipHeader ?? 0) + 1,
            encoding: options.encoding ?? 'utf-8',
        })
    );
    const records: AsyncIterable<unknown> = parser;

    let header: string[] | null = options.header === false ? [] : null;
    try {
        for await (const record of records) {
            if (!Array.isArray(record)) continue;
            const cells = record.map((cell) => (typeof cell === 'string' ? cell : String(cell)));

            if (header === null) {
                header = uniqueNames(cells);
                continue;
            }

            const row: RawRow = {};
            cells.forEach((cell, index) => {
                row[header?.[index] ?? String(index)] = cell;
            });
            yield row;
        }
    } catch (error) {
        throw inputError(error, path);
    } finally {
        parser.destroy();
        input.destroy();
    }
}

/**
 * Header names with blanks replaced by position and repeats suffixed.
 */
function uniqueNames(cells: readonly string[]): string[] {
    const seen = new Map<string, number>();
    return cells.map((cell, index) => {
        const base = cell.trim() || String(index);
        const count = seen.get(base) ?? 0;
        seen.set(base, count + 1);
        return count === 0 ? base : `${base}_${count}`;
    });
}
