import type { RawRow } from '../types/index.js';
import { ConfigError, FormatDriftError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export type FilterOperator = 'eq' | 'ne' | 'gt' | 'lt' | 'gte' | 'lte' | 'in' | 'not_in' | 'regex';

export interface FilterSpec {
    field: string;
    operator: FilterOperator;
    value?: unknown;
}

/**
 * Column reference: position, name, or an element path (with optional
 * attribute) in a flattened XML/JSON record.
 */
export type FieldRef = number | string | { path: string; attribute?: string };

/**
 * Streaming row transform. Receives the rows after filtering, mapping and
 * subfield splitting, plus the declaration's `transform_args`.
 */
export type RowTransform = (rows: AsyncIterable<RawRow>, args: Readonly<Record<string, unknown>>) => AsyncIterable<RawRow>;

export interface ProcessingSpec {
    filters?: readonly FilterSpec[];
    fieldMapping?: Readonly<Record<string, FieldRef>>;
    subfieldSeparator?: Readonly<Record<string, string>>;
    transform?: string;
    transformArgs?: Readonly<Record<string, unknown>>;
}

/**
 * Apply filters, field mapping, subfield splitting and the named
 * transform, in that order.
 */
export function processRows(
    rows: AsyncIterable<RawRow>,
    spec: ProcessingSpec,
    options: { transforms: ReadonlyMap<string, RowTransform>; logger: Logger }
): AsyncIterable<RawRow> {
    let out = rows;
    if (spec.filters?.length) out = filterRows(out, spec.filters, options.logger);
    if (spec.fieldMapping && Object.keys(spec.fieldMapping).length > 0) out = mapFields(out, spec.fieldMapping);
    if (spec.subfieldSeparator) out = splitSubfields(out, spec.subfieldSeparator);
    if (spec.transform) {
        const transform = options.transforms.get(spec.transform);
        if (!transform) {
            throw new ConfigError(`Unknown transform '${spec.transform}'`, { available: [...options.transforms.keys()] });
        }
        out = transform(out, spec.transformArgs ?? {});
    }
    return out;
}

// ─── Filters ──────────────────────────────────────────────

export async function* filterRows(rows: AsyncIterable<RawRow>, filters: readonly FilterSpec[], logger: Logger): AsyncGenerator<RawRow> {
    const predicates = filters.map(compileFilter);
    let active: Array<(row: RawRow) => boolean> | null = null;

    for await (const row of rows) {
        if (active === null) {
            active = [];
            filters.forEach((filter, i) => {
                if (filter.field in row) {
                    const predicate = predicates[i];
                    if (predicate) active?.push(predicate);
                } else {
                    logger.warn({ field: filter.field, operator: filter.operator }, 'Filter field not in data, filter skipped');
                }
            });
        }
        if (active.every((predicate) => predicate(row))) yield row;
    }
}

function compileFilter(filter: FilterSpec): (row: RawRow) => boolean {
    const { field, operator, value } = filter;
    const ordered = (test: (order: number) => boolean) => (row: RawRow): boolean => {
        const order = compare(row[field], value);
        return order !== null && test(order);
    };

    switch (operator) {
        case 'eq':
            return ordered((order) => order === 0);
        case 'ne':
            return (row) => compare(row[field], value) !== 0;
        case 'gt':
            return ordered((order) => order > 0);
        case 'lt':
            return ordered((order) => order < 0);
        case 'gte':
            return ordered((order) => order >= 0);
        case 'lte':
            return ordered((order) => order <= 0);
        case 'in':
        case 'not_in': {
            if (!Array.isArray(value)) {
                throw new ConfigError(`Filter '${operator}' on '${field}' needs a list value`);
            }
            const members = new Set(value.map((item) => String(item)));
            const wanted = operator === 'in';
            return (row) => {
                const text = cellText(row[field]);
                return (text !== null && members.has(text)) === wanted;
            };
        }
        case 'regex': {
            let pattern: RegExp;
            try {
                pattern = new RegExp(`^(?:${String(value)})`);
            } catch (error) {
                throw new ConfigError(`Invalid regex filter on '${field}'`, { cause: String(error) });
            }
            return (row) => {
                const text = cellText(row[field]);
                return text !== null && pattern.test(text);
            };
        }
    }
}

/**
 * Numeric comparison when both sides are numbers, text comparison
 * otherwise. Null when the cell is empty.
 */
function compare(cell: unknown, value: unknown): number | null {
    const text = cellText(cell);
    if (text === null) return null;
    const expected = String(value);
    const a = Number(text);
    const b = Number(expected);
    if (text.trim() !== '' && expected.trim() !== '' && Number.isFinite(a) && Number.isFinite(b)) {
        return a === b ? 0 : a < b ? -1 : 1;
    }
    return text === expected ? 0 : text < expected ? -1 : 1;
}

function cellText(cell: unknown): string | null {
    if (cell === null || cell === undefined || cell === '') return null;
    return typeof cell === 'string' ? cell : String(cell);
}

// ─── Field mapping ────────────────────────────────────────

/**
 * Select and rename columns. References are checked against the first
 * row; a missing column means the source format drifted.
 */
export async function* mapFields(rows: AsyncIterable<RawRow>, mapping: Readonly<Record<string, FieldRef>>): AsyncGenerator<RawRow> {
    let resolved: Array<[string, string]> | null = null;

    for await (const row of rows) {
        if (resolved === null) {
            const columns = Object.keys(row);
            resolved = Object.entries(mapping).map(([output, ref]) => {
                const column = resolveRef(ref, columns);
                if (column === null) {
                    throw new FormatDriftError(`Column ${describeRef(ref)} for '${output}' not found`, { output, columns });
                }
                return [output, column];
            });
        }

        const out: RawRow = {};
        for (const [output, column] of resolved) {
            out[output] = row[column] ?? null;
        }
        yield out;
    }
}

function resolveRef(ref: FieldRef, columns: readonly string[]): string | null {
    if (typeof ref === 'number') return columns[ref] ?? null;
    const name = typeof ref === 'string' ? ref : ref.attribute ? `${ref.path}.@_${ref.attribute}` : ref.path;
    return columns.includes(name) ? name : null;
}

function describeRef(ref: FieldRef): string {
    if (typeof ref === 'number') return `#${ref}`;
    if (typeof ref === 'string') return `'${ref}'`;
    return `'${ref.path}${ref.attribute ? `@${ref.attribute}` : ''}'`;
}

// ─── Subfields ────────────────────────────────────────────

/**
 * Split the named fields into arrays. Empty cells stay null.
 */
export async function* splitSubfields(rows: AsyncIterable<RawRow>, separators: Readonly<Record<string, string>>): AsyncGenerator<RawRow> {
    const entries = Object.entries(separators);
    for await (const row of rows) {
        const out: RawRow = { ...row };
        for (const [field, separator] of entries) {
            const text = cellText(row[field]);
            if (text !== null) out[field] = text.split(separator);
        }
        yield out;
    }
}
