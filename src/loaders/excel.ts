import ExcelJS from 'exceljs';
import type { RawRow } from '../types/index.js';
import { FormatDriftError } from '../utils/errors.js';
import { inputError, openInput } from './input.js';
import type { LoaderOptions } from './registry.js';

/**
 * Rows of one worksheet, using the first non-skipped row as header.
 * Cells are read as their displayed text.
 */
export async function* loadExcel(path: string, options: LoaderOptions): AsyncGenerator<RawRow> {
    const workbook = new ExcelJS.Workbook();
    const input = openInput(path, options);
    try {
        await workbook.xlsx.read(input);
    } catch (error) {
        throw inputError(error, path);
    } finally {
        input.destroy();
    }

    const wanted = options.sheet ?? 0;
    const sheet = typeof wanted === 'number' ? workbook.worksheets[wanted] : workbook.getWorksheet(wanted);
    if (!sheet) {
        throw new FormatDriftError(`Worksheet ${String(wanted)} not found`, {
            path,
            sheets: workbook.worksheets.map((candidate) => candidate.name),
        });
    }

    const width = sheet.columnCount;
    let header: string[] | null = options.header === false ? [] : null;

    for (let r = (options.skipHeader ?? 0) + 1; r <= sheet.rowCount; r++) {
        const row = sheet.getRow(r);
        const cells: string[] = [];
        for (let c = 1; c <= width; c++) {
            cells.push(row.getCell(c).text);
        }
        if (cells.every((cell) => cell.trim() === '')) continue;

        if (header === null) {
            header = cells.map((cell, index) => cell.trim() || String(index));
            continue;
        }

        const record: RawRow = {};
        cells.forEach((cell, index) => {
            record[header?.[index] ?? String(index)] = cell === '' ? null : cell;
        });
        yield record;
    }
}
