import type { RawRow } from '../types/index.js';

/**
 * Flatten a parsed record to one level. Nested objects become dotted
 * keys; arrays are kept as JSON text so every value is a string or null.
 */
export function flattenRecord(value: unknown, prefix = '', out: RawRow = {}): RawRow {
    if (!isPlainObject(value)) {
        out[prefix || 'value'] = scalarText(value);
        return out;
    }

    for (const [key, child] of Object.entries(value)) {
        const name = prefix ? `${prefix}.${key}` : key;
        if (isPlainObject(child)) {
            flattenRecord(child, name, out);
        } else {
            out[name] = scalarText(child);
        }
    }
    return out;
}

/**
 * Follow a dotted path into a parsed document.
 */
export function followPath(document: unknown, path: string | undefined): unknown {
    if (!path) return document;
    let current = document;
    for (const segment of path.split('.')) {
        if (!isPlainObject(current)) return undefined;
        current = current[segment];
    }
    return current;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalarText(value: unknown): string | null {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
    return JSON.stringify(value);
}
