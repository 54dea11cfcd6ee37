import { CvTerm, lookupAccession } from '../cv/registry.js';
import type { RawRow } from '../types/index.js';
import { ConfigError, CVResolutionError } from '../utils/errors.js';
import { RowSource, type EvalOptions, type Slot } from './field-config.js';

/** Boolean-flag table: emits the term when the value equals the key. */
export type FlagTable = Readonly<Record<string, CvTerm>>;
export type TermFn = (row: RawRow) => CvTerm | readonly CvTerm[] | null | undefined;
export type TermSpec = CvTerm | RowSource | FlagTable | TermFn;

export interface CvSpecInit {
    term: TermSpec;
    value?: RowSource;
    unit?: CvTerm | RowSource;
}

/**
 * Evaluated positions of one part of a spec (term, value or unit).
 */
export interface Lane<T> {
    slots: ReadonlyArray<T | null>;
    broadcast: boolean;
}

/**
 * A spec evaluated against one row, before it is expanded into records.
 */
export interface ResolvedSpec {
    spec: CvSpec;
    terms: Lane<CvTerm>;
    values: Lane<string> | null;
    units: Lane<CvTerm> | null;
}

export interface ResolvedEntry {
    term: CvTerm;
    value?: string;
    unit?: CvTerm;
}

type TermResolver =
    | { kind: 'static'; term: CvTerm }
    | { kind: 'dynamic'; source: RowSource }
    | { kind: 'callable'; fn: TermFn }
    | { kind: 'flag'; table: ReadonlyMap<string, CvTerm> };

/**
 * Binds a term (static, row-derived, or flag) to value and unit sources.
 */
export class CvSpec {
    private readonly resolver: TermResolver;
    readonly label: string;

    constructor(private readonly init: CvSpecInit) {
        this.resolver = compileTerm(init.term);
        if (this.resolver.kind === 'flag' && !init.value) {
            throw new ConfigError('A flag spec needs a value source');
        }
        this.label = init.value?.label ?? describeTerm(this.resolver);
        Object.freeze(this);
    }

    get kind(): TermResolver['kind'] {
        return this.resolver.kind;
    }

    /**
     * Evaluate every source of the spec against the row.
     */
    resolve(row: RawRow, options: EvalOptions = {}): ResolvedSpec {
        const values = this.init.value ? valueLane(this.init.value, row, options) : null;
        const units = this.init.unit ? termLane(this.init.unit, row, options) : null;
        const resolver = this.resolver;

        switch (resolver.kind) {
            case 'static':
                return { spec: this, terms: { slots: [resolver.term], broadcast: true }, values, units };
            case 'dynamic':
                return { spec: this, terms: termLane(resolver.source, row, options), values, units };
            case 'callable': {
                const result = resolver.fn(row);
                const slots = result === null || result === undefined ? [] : result instanceof CvTerm ? [result] : [...result];
                return { spec: this, terms: { slots, broadcast: false }, values, units };
            }
            case 'flag': {
                const matched: CvTerm[] = [];
                for (const [key, term] of resolver.table) {
                    if (values?.slots.includes(key) && !matched.includes(term)) matched.push(term);
                }
                return { spec: this, terms: { slots: matched, broadcast: false }, values: null, units: null };
            }
        }
    }
}

/**
 * Declare a term binding.
 *
 * @example
 * cv({ term: IdentifierNamespace.term('UNIPROT'), value: f('Entry') })
 * cv({ term: { yes: MoleculeAnnotation.term('REVIEWED') }, value: f('Reviewed') })
 */
export function cv(init: CvSpecInit): CvSpec {
    return new CvSpec(init);
}

/**
 * Flat expansion used by the identifier and annotation builders.
 * Lanes zip by position; a lane with a single slot applies to every position.
 */
export function expandResolved(resolved: ResolvedSpec): ResolvedEntry[] {
    const { spec, terms, values, units } = resolved;
    if (spec.kind === 'flag') {
        return terms.slots.flatMap((term) => (term ? [{ term }] : []));
    }

    const n = Math.max(terms.slots.length, values?.slots.length ?? 0, units?.slots.length ?? 0);
    const entries: ResolvedEntry[] = [];
    for (let i = 0; i < n; i++) {
        const entry = entryAt(resolved, (lane) => pickIndex(lane.slots, i));
        if (entry) entries.push(entry);
    }
    return entries;
}

/**
 * Whether every row-derived lane has either `n` slots or none.
 */
export function isAligned(resolved: ResolvedSpec, n: number): boolean {
    const lanes: Array<Lane<unknown> | null> = [resolved.terms, resolved.values, resolved.units];
    return lanes.every((lane) => !lane || lane.broadcast || lane.slots.length === 0 || lane.slots.length === n);
}

/**
 * Entry for member `i` of `n`. Call only on aligned specs.
 */
export function entryForMember(resolved: ResolvedSpec, i: number): ResolvedEntry[] {
    if (resolved.spec.kind === 'flag') {
        return expandResolved(resolved);
    }
    const entry = entryAt(resolved, (lane) => (lane.broadcast ? pickIndex(lane.slots, 0) : lane.slots[i] ?? null));
    return entry ? [entry] : [];
}

/**
 * Length of the row-derived lane that drives a list expansion, if any.
 */
export function drivingLength(resolved: ResolvedSpec): number {
    const lane = resolved.values ?? resolved.terms;
    return lane.broadcast ? 0 : lane.slots.length;
}

// ─── Private helpers ──────────────────────────────────────

function entryAt(resolved: ResolvedSpec, pick: <T>(lane: Lane<T>) => T | null): ResolvedEntry | null {
    const term = pick(resolved.terms);
    if (!term) return null;

    const entry: ResolvedEntry = { term };
    if (resolved.values) {
        const value = pick(resolved.values);
        if (value === null) return null;
        entry.value = value;
    }
    if (resolved.units) {
        const unit = pick(resolved.units);
        if (unit) entry.unit = unit;
    }
    return entry;
}

function pickIndex<T>(slots: ReadonlyArray<T | null>, i: number): T | null {
    if (slots.length === 1) return slots[0] ?? null;
    return slots[i] ?? null;
}

function compileTerm(term: TermSpec): TermResolver {
    if (term instanceof CvTerm) return { kind: 'static', term };
    if (term instanceof RowSource) return { kind: 'dynamic', source: term };
    if (typeof term === 'function') return { kind: 'callable', fn: term };

    const table = new Map<string, CvTerm>();
    for (const [key, value] of Object.entries(term)) {
        if (!(value instanceof CvTerm)) {
            throw new ConfigError(`Flag table entry '${key}' is not a CV term`);
        }
        table.set(key, value);
    }
    if (table.size === 0) throw new ConfigError('Flag table is empty');
    return { kind: 'flag', table };
}

function describeTerm(resolver: TermResolver): string {
    switch (resolver.kind) {
        case 'static':
            return resolver.term.qualifiedName;
        case 'dynamic':
            return resolver.source.label;
        case 'callable':
            return resolver.fn.name || '<term function>';
        case 'flag':
            return [...resolver.table.values()].map((term) => term.qualifiedName).join('|');
    }
}

function valueLane(source: RowSource, row: RawRow, options: EvalOptions): Lane<string> {
    return {
        slots: source.evaluate(row, options).map((slot) => (slot instanceof CvTerm ? slot.accession : slot)),
        broadcast: source.broadcast,
    };
}

/**
 * Term slots from a source: terms pass through, strings resolve as accessions.
 */
function termLane(source: CvTerm | RowSource, row: RawRow, options: EvalOptions): Lane<CvTerm> {
    if (source instanceof CvTerm) return { slots: [source], broadcast: true };
    return {
        slots: source.evaluate(row, options).map((slot) => resolveTermSlot(slot, source.label, options)),
        broadcast: source.broadcast,
    };
}

function resolveTermSlot(slot: Slot, field: string, options: EvalOptions): CvTerm | null {
    if (slot === null || slot instanceof CvTerm) return slot;
    const term = lookupAccession(slot);
    if (!term && options.strict) throw new CVResolutionError(slot, field);
    return term ?? null;
}
