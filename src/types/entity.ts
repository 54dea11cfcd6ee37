import type { CvTerm } from '../cv/registry.js';

/**
 * A typed identifier, e.g. UniProt `P12345`. Several identifiers on one
 * entity may share a namespace.
 */
export interface Identifier {
    namespace: CvTerm;
    value: string;
}

/**
 * An annotation. `value` is absent only for term-only annotations,
 * where the presence of the term is the whole statement.
 */
export interface Annotation {
    term: CvTerm;
    value?: string;
    unit?: CvTerm;
}

/**
 * A child entity owned by its parent, with annotations describing the
 * membership itself (roles, stoichiometry) rather than the child.
 */
export interface Membership {
    entity: Entity;
    annotations: Annotation[];
}

/**
 * Normalized record produced by the mapping engine.
 */
export interface Entity {
    type: CvTerm;
    identifiers: Identifier[];
    annotations: Annotation[];
    membership: Membership[];
}

/**
 * A raw record as handed to a schema: column name to value. Values are
 * strings from tabular sources, arrays after subfield splitting, and may
 * carry other JSON values from structured sources.
 */
export type RawRow = Record<string, unknown>;
