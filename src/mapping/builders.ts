import type { Annotation, Identifier, RawRow } from '../types/index.js';
import { BiostrataError, MappingError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { expandResolved, type CvSpec, type ResolvedEntry, type ResolvedSpec } from './cv.js';

/**
 * Per-row evaluation state shared by every builder of one entity.
 */
export interface BuildContext {
    strict: boolean;
    logger: Logger;
}

/**
 * Evaluate specs one by one. In tolerant mode a failing spec is logged
 * and contributes nothing; in strict mode the failure is raised.
 */
export function resolveSpecs(specs: readonly CvSpec[], row: RawRow, ctx: BuildContext): ResolvedSpec[] {
    const resolved: ResolvedSpec[] = [];
    for (const spec of specs) {
        try {
            resolved.push(spec.resolve(row, { strict: ctx.strict }));
        } catch (error) {
            handleSpecFailure(error, spec.label, row, ctx);
        }
    }
    return resolved;
}

export function handleSpecFailure(error: unknown, field: string, row: RawRow, ctx: BuildContext): void {
    if (ctx.strict) {
        if (error instanceof BiostrataError) throw error;
        throw new MappingError(`Failed to evaluate '${field}'`, { field, row: rowContext(row) }, { cause: error });
    }
    ctx.logger.debug({ err: error, field, row: rowContext(row) }, 'Spec failed, treated as absent');
}

/**
 * Compact row description for log lines.
 */
export function rowContext(row: RawRow, maxLength = 300): string {
    const text = JSON.stringify(row) ?? '';
    return text.length > maxLength ? `${text.slice(0, maxLength)}…` : text;
}

// ─── Builders ─────────────────────────────────────────────

abstract class SpecListBuilder<T> {
    readonly specs: readonly CvSpec[];

    constructor(...specs: CvSpec[]) {
        this.specs = Object.freeze(specs);
    }

    /**
     * Records for one row, in declaration order and split order.
     */
    build(row: RawRow, ctx: BuildContext): T[] {
        return this.fromEntries(resolveSpecs(this.specs, row, ctx).flatMap(expandResolved));
    }

    /** @internal Convert resolved entries into records, dropping incomplete ones. */
    abstract fromEntries(entries: readonly ResolvedEntry[]): T[];
}

/**
 * Produces the identifiers of an entity. Entries without a value are dropped.
 */
export class IdentifiersBuilder extends SpecListBuilder<Identifier> {
    fromEntries(entries: readonly ResolvedEntry[]): Identifier[] {
        const out: Identifier[] = [];
        for (const { term, value } of entries) {
            if (value !== undefined && value !== '') out.push({ namespace: term, value });
        }
        return out;
    }
}

export class AnnotationsBuilder extends SpecListBuilder<Annotation> {
    fromEntries(entries: readonly ResolvedEntry[]): Annotation[] {
        return entries.map(({ term, value, unit }) => {
            const annotation: Annotation = { term };
            if (value !== undefined) annotation.value = value;
            if (unit) annotation.unit = unit;
            return annotation;
        });
    }
}
