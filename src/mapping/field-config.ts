import { CvTerm } from '../cv/registry.js';
import type { RawRow } from '../types/index.js';
import { ConfigError, CVResolutionError } from '../utils/errors.js';

/**
 * A value produced by a column pipeline: raw text, or a term once a map
 * has resolved it.
 */
export type Token = string | CvTerm;

/**
 * One position of an evaluated column. `null` keeps the position of a
 * token that was empty or dropped, so parallel columns stay aligned.
 */
export type Slot = Token | null;

export type ExtractFn = (value: string) => string | null | undefined;
export type ExtractStep = RegExp | string | ExtractFn;
export type MapFn = (value: string) => Token | null | undefined;
export type TransformFn = (value: string) => string | null | undefined;
export type FieldSelector = string | ((row: RawRow) => unknown);

/**
 * Evaluation switches threaded from the entity builder.
 */
export interface EvalOptions {
    strict?: boolean;
}

/**
 * Explicit lookup table with a required fallback branch. A `null`
 * fallback drops unmatched values on purpose, so strict mode does not
 * report them.
 */
export class PrefixTable {
    private readonly entries: ReadonlyMap<string, Token>;

    constructor(
        entries: Readonly<Record<string, Token>>,
        public readonly fallback: Token | null
    ) {
        this.entries = new Map(Object.entries(entries));
    }

    lookup(value: string): Token | null {
        return this.entries.get(value) ?? this.entries.get(value.toLowerCase()) ?? this.fallback;
    }
}

/**
 * Build a prefix (or any key) to term table. The fallback is mandatory:
 * pass `null` to drop unknown keys.
 */
export function prefixTable(entries: Readonly<Record<string, Token>>, fallback: Token | null): PrefixTable {
    return new PrefixTable(entries, fallback);
}

export type MapSpec = string | Readonly<Record<string, Token>> | PrefixTable | MapFn;
export type TransformSpec = string | TransformFn;

export interface ColumnOptions {
    extract?: ExtractStep | readonly ExtractStep[];
    map?: MapSpec;
    transform?: TransformSpec;
    /** Overrides the FieldConfig delimiter; `null` disables splitting. */
    delimiter?: string | RegExp | null;
    /** Emitted when the field is missing or empty. */
    default?: Token;
}

export interface FieldConfigOptions {
    extract?: Readonly<Record<string, ExtractStep | readonly ExtractStep[]>>;
    map?: Readonly<Record<string, Exclude<MapSpec, string>>>;
    transform?: Readonly<Record<string, TransformFn>>;
    delimiter?: string | RegExp;
}

/** Outcome of a map step: a token, an intentional drop, or no match. */
type Mapper = (value: string) => Token | null | undefined;

// ─── Row sources ──────────────────────────────────────────

/**
 * Anything that yields positional slots for a row.
 * `broadcast` sources apply the same value to every position.
 */
export abstract class RowSource {
    abstract readonly label: string;
    abstract readonly broadcast: boolean;
    abstract evaluate(row: RawRow, options?: EvalOptions): Slot[];
}

/**
 * A compiled column binding. Evaluation is pure: the same row always
 * yields the same slots.
 */
export class ColumnSource extends RowSource {
    readonly broadcast = false;
    readonly label: string;

    constructor(
        private readonly selector: FieldSelector,
        private readonly delimiter: string | RegExp | null,
        private readonly steps: readonly ExtractFn[],
        private readonly mapper: Mapper | null,
        private readonly transform: TransformFn | null,
        private readonly fallback: Token | null
    ) {
        super();
        this.label = typeof selector === 'string' ? selector : selector.name || '<computed>';
        Object.freeze(this);
    }

    evaluate(row: RawRow, options: EvalOptions = {}): Slot[] {
        const raw = typeof this.selector === 'string' ? row[this.selector] : this.selector(row);
        const tokens = splitValue(raw, this.delimiter);

        if (tokens.every((token) => normalizeToken(token) === null)) {
            return this.fallback === null ? [] : [this.fallback];
        }

        return tokens.map((token) => this.evaluateToken(token, options));
    }

    private evaluateToken(token: string, options: EvalOptions): Slot {
        let value = normalizeToken(token);
        if (value === null) return null;

        for (const step of this.steps) {
            value = step(value) ?? null;
            if (value === null) return null;
        }

        let result: Token = value;
        if (this.mapper) {
            const mapped = this.mapper(value);
            if (mapped === undefined) {
                if (options.strict) throw new CVResolutionError(value, this.label);
                return null;
            }
            if (mapped === null) return null;
            result = mapped;
        }

        if (this.transform && typeof result === 'string') {
            return this.transform(result) ?? null;
        }
        return result;
    }
}

/**
 * A fixed value, applied to every row and every position.
 */
export class ConstantSource extends RowSource {
    readonly broadcast = true;
    readonly label: string;

    constructor(private readonly value: Token) {
        super();
        this.label = `constant(${String(value)})`;
    }

    evaluate(): Slot[] {
        return [this.value];
    }
}

export function constant(value: Token): ConstantSource {
    return new ConstantSource(value);
}

// ─── FieldConfig ──────────────────────────────────────────

/**
 * Registry of named extract, map and transform pipelines shared by every
 * binding of one schema. Immutable once constructed.
 *
 * @example
 * const { f } = new FieldConfig({
 *     extract: { prefix: [/^([^:]+):/, (v) => v.toLowerCase()], value: /^[^:]+:(.+)$/ },
 *     delimiter: '|',
 * });
 * const ns = f('ID', { extract: 'prefix', map: prefixTable({ chebi: IdentifierNamespace.term('CHEBI') }, null) });
 */
export class FieldConfig {
    private readonly extracts: ReadonlyMap<string, readonly ExtractFn[]>;
    private readonly maps: ReadonlyMap<string, Mapper>;
    private readonly transforms: ReadonlyMap<string, TransformFn>;
    readonly delimiter: string | RegExp | null;

    constructor(options: FieldConfigOptions = {}) {
        const extracts = new Map<string, readonly ExtractFn[]>();
        for (const [name, steps] of Object.entries(options.extract ?? {})) {
            extracts.set(name, toArray(steps).map((step) => compileStep(step, extracts)));
        }
        this.extracts = extracts;

        this.maps = new Map(Object.entries(options.map ?? {}).map(([name, spec]) => [name, compileMap(spec)]));
        this.transforms = new Map(Object.entries(options.transform ?? {}));
        this.delimiter = options.delimiter ?? null;
        Object.freeze(this);
    }

    /**
     * Bind a field to a pipeline. Named steps are resolved here, so an
     * unknown name fails when the schema is built.
     */
    readonly f = (field: FieldSelector, options: ColumnOptions = {}): ColumnSource => {
        const steps = toArray(options.extract ?? []).flatMap((step) => {
            if (typeof step === 'string') {
                const named = this.extracts.get(step);
                if (named) return named;
            }
            return [compileStep(step, this.extracts)];
        });

        let mapper: Mapper | null = null;
        if (typeof options.map === 'string') {
            const named = this.maps.get(options.map);
            if (!named) throw new ConfigError(`Unknown map '${options.map}'`, { field: String(field) });
            mapper = named;
        } else if (options.map !== undefined) {
            mapper = compileMap(options.map);
        }

        let transform: TransformFn | null = null;
        if (typeof options.transform === 'string') {
            const named = this.transforms.get(options.transform);
            if (!named) throw new ConfigError(`Unknown transform '${options.transform}'`, { field: String(field) });
            transform = named;
        } else if (options.transform) {
            transform = options.transform;
        }

        const delimiter = options.delimiter === undefined ? this.delimiter : options.delimiter;
        return new ColumnSource(field, delimiter, steps, mapper, transform, options.default ?? null);
    };
}

// ─── Private helpers ──────────────────────────────────────

function isList<T>(value: T | readonly T[]): value is readonly T[] {
    return Array.isArray(value);
}

function toArray<T>(value: T | readonly T[]): readonly T[] {
    return isList(value) ? value : [value];
}

function compileStep(step: ExtractStep, named: ReadonlyMap<string, readonly ExtractFn[]>): ExtractFn {
    if (typeof step === 'function') return step;
    if (typeof step === 'string') {
        const existing = named.get(step);
        if (existing) return (value) => runSteps(existing, value);
    }

    let pattern: RegExp;
    try {
        pattern = typeof step === 'string' ? new RegExp(step) : step;
    } catch (error) {
        throw new ConfigError(`Invalid extract pattern '${String(step)}'`, { cause: String(error) });
    }
    const nonGlobal = pattern.global || pattern.sticky
        ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
        : pattern;

    return (value) => {
        const match = nonGlobal.exec(value);
        if (!match) return null;
        return match[1] ?? match[0];
    };
}

function runSteps(steps: readonly ExtractFn[], value: string): string | null {
    let current: string | null = value;
    for (const step of steps) {
        current = step(current) ?? null;
        if (current === null) return null;
    }
    return current;
}

function compileMap(spec: Exclude<MapSpec, string>): Mapper {
    if (spec instanceof PrefixTable) return (value) => spec.lookup(value);
    if (typeof spec === 'function') return (value) => spec(value) ?? undefined;

    const table = new Map(Object.entries(spec));
    return (value) => table.get(value) ?? table.get(value.toLowerCase()) ?? table.get('default');
}

/**
 * Turn a raw cell into tokens. Arrays are already split.
 */
function splitValue(raw: unknown, delimiter: string | RegExp | null): string[] {
    if (raw === null || raw === undefined) return [];
    if (Array.isArray(raw)) {
        return raw.filter((item) => item !== null && item !== undefined).map((item) => stringify(item));
    }
    const text = stringify(raw);
    return delimiter === null ? [text] : text.split(delimiter);
}

function stringify(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value instanceof CvTerm) return value.accession;
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}

/**
 * Trim, strip surrounding quotes, and treat '' and '-' as empty.
 */
export function normalizeToken(token: string): string | null {
    let value = token.trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
        value = value.slice(1, -1).trim();
    }
    if (value === '' || value === '-') return null;
    return value;
}
