import { XMLParser } from 'fast-xml-parser';
import type { RawRow } from '../types/index.js';
import { FormatDriftError } from '../utils/errors.js';
import { flattenRecord, followPath } from './flatten.js';
import { readInputText } from './input.js';
import type { LoaderOptions } from './registry.js';

/**
 * Records from an XML document. `recordPath` is a dotted element path
 * (e.g. `entrySet.entry`); attributes appear as `@_name`, element text
 * next to attributes as `#text`.
 */
export async function* loadXml(path: string, options: LoaderOptions): AsyncGenerator<RawRow> {
    const parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: '@_',
        parseTagValue: false,
        parseAttributeValue: false,
        trimValues: true,
        ignoreDeclaration: true,
    });

    const text = await readInputText(path, options);
    let document: unknown;
    try {
        document = parser.parse(text, true);
    } catch (error) {
        throw new FormatDriftError(`Invalid XML in ${path}`, { cause: String(error) });
    }

    const records = followPath(document, options.recordPath);
    if (records === undefined) {
        throw new FormatDriftError(`Record path '${options.recordPath ?? ''}' not found`, { path });
    }

    for (const record of Array.isArray(records) ? records : [records]) {
        yield flattenRecord(record);
    }
}
