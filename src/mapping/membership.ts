import type { CvTerm } from '../cv/registry.js';
import type { Entity, Membership, RawRow } from '../types/index.js';
import { AnnotationsBuilder, IdentifiersBuilder, resolveSpecs, rowContext, type BuildContext } from './builders.js';
import { cv, drivingLength, entryForMember, isAligned, type CvSpec, type ResolvedEntry, type ResolvedSpec } from './cv.js';
import type { EntityBuilder } from './entity-builder.js';
import { RowSource } from './field-config.js';

/**
 * Anything that contributes membership entries for a row.
 */
export interface MemberSource {
    build(row: RawRow, ctx: BuildContext): Membership[];
}

export interface MemberInit {
    entity: EntityBuilder;
    annotations?: AnnotationsBuilder | readonly CvSpec[];
}

/**
 * Exactly one nested entity from the same row, plus annotations on the
 * membership (e.g. the role of interactor A).
 */
export class Member implements MemberSource {
    private readonly entity: EntityBuilder;
    private readonly annotations: AnnotationsBuilder;

    constructor(init: MemberInit) {
        this.entity = init.entity;
        this.annotations = asAnnotations(init.annotations);
    }

    build(row: RawRow, ctx: BuildContext): Membership[] {
        const entity = this.entity.buildWithin(row, ctx);
        if (!entity) return [];
        return [{ entity, annotations: this.annotations.build(row, ctx) }];
    }
}

export interface MembersFromListInit {
    type: CvTerm | RowSource;
    identifiers: IdentifiersBuilder | readonly CvSpec[];
    /** Annotations of the membership itself, e.g. stoichiometry. */
    annotations?: AnnotationsBuilder | readonly CvSpec[];
    /** Annotations of each child entity. */
    entityAnnotations?: AnnotationsBuilder | readonly CvSpec[];
}

/**
 * Expands delimited columns into N child entities. N is the slot count
 * of the first row-derived identifier column with values. Parallel
 * columns contribute position `i` to member `i`; a column of any other
 * length is left out for the whole row.
 */
export class MembersFromList implements MemberSource {
    private readonly type: CvTerm | RowSource;
    private readonly identifiers: IdentifiersBuilder;
    private readonly annotations: AnnotationsBuilder;
    private readonly entityAnnotations: AnnotationsBuilder;
    private readonly typeSpec: CvSpec | null;

    constructor(init: MembersFromListInit) {
        this.type = init.type;
        this.typeSpec = init.type instanceof RowSource ? cv({ term: init.type }) : null;
        this.identifiers = init.identifiers instanceof IdentifiersBuilder
            ? init.identifiers
            : new IdentifiersBuilder(...init.identifiers);
        this.annotations = asAnnotations(init.annotations);
        this.entityAnnotations = asAnnotations(init.entityAnnotations);
    }

    build(row: RawRow, ctx: BuildContext): Membership[] {
        const identifiers = resolveSpecs(this.identifiers.specs, row, ctx);
        const n = identifiers.map(drivingLength).find((length) => length > 0) ?? 0;
        if (n === 0) return [];

        const aligned = (specs: ResolvedSpec[]): ResolvedSpec[] =>
            specs.filter((resolved) => {
                if (isAligned(resolved, n)) return true;
                ctx.logger.debug(
                    { field: resolved.spec.label, expected: n, row: rowContext(row) },
                    'Column length does not match member list, omitted'
                );
                return false;
            });

        const idSpecs = aligned(identifiers);
        const memberSpecs = aligned(resolveSpecs(this.annotations.specs, row, ctx));
        const entitySpecs = aligned(resolveSpecs(this.entityAnnotations.specs, row, ctx));
        const types = this.resolveTypes(row, n, ctx);

        const members: Membership[] = [];
        for (let i = 0; i < n; i++) {
            const ids = this.identifiers.fromEntries(entriesAt(idSpecs, i));
            if (ids.length === 0) continue;

            const type = types[i];
            if (!type) continue;

            const entity: Entity = {
                type,
                identifiers: ids,
                annotations: this.entityAnnotations.fromEntries(entriesAt(entitySpecs, i)),
                membership: [],
            };
            members.push({ entity, annotations: this.annotations.fromEntries(entriesAt(memberSpecs, i)) });
        }
        return members;
    }

    private resolveTypes(row: RawRow, n: number, ctx: BuildContext): Array<CvTerm | null> {
        const single = this.type;
        if (!(single instanceof RowSource)) return Array.from({ length: n }, () => single);
        if (!this.typeSpec) return [];

        const [resolved] = resolveSpecs([this.typeSpec], row, ctx);
        if (!resolved) return [];
        const slots = resolved.terms.slots;
        if (resolved.terms.broadcast || slots.length === 1) return Array.from({ length: n }, () => slots[0] ?? null);
        if (slots.length === n) return [...slots];

        ctx.logger.debug({ field: single.label, expected: n, row: rowContext(row) }, 'Member type column misaligned');
        return [];
    }
}

/**
 * Concatenates the memberships of its members, in order.
 */
export class MembershipBuilder {
    readonly members: readonly MemberSource[];

    constructor(...members: MemberSource[]) {
        this.members = Object.freeze(members);
    }

    build(row: RawRow, ctx: BuildContext): Membership[] {
        return this.members.flatMap((member) => member.build(row, ctx));
    }
}

// ─── Private helpers ──────────────────────────────────────

function asAnnotations(spec: AnnotationsBuilder | readonly CvSpec[] | undefined): AnnotationsBuilder {
    if (spec instanceof AnnotationsBuilder) return spec;
    return new AnnotationsBuilder(...(spec ?? []));
}

function entriesAt(specs: readonly ResolvedSpec[], i: number): ResolvedEntry[] {
    return specs.flatMap((resolved) => entryForMember(resolved, i));
}
