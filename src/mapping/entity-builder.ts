import type { CvTerm } from '../cv/registry.js';
import type { Entity, RawRow } from '../types/index.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { AnnotationsBuilder, IdentifiersBuilder, resolveSpecs, rowContext, type BuildContext } from './builders.js';
import { cv, type CvSpec } from './cv.js';
import { RowSource } from './field-config.js';
import { MembershipBuilder, type MemberSource } from './membership.js';

export interface EntityBuilderInit {
    type: CvTerm | RowSource;
    identifiers: IdentifiersBuilder | readonly CvSpec[];
    annotations?: AnnotationsBuilder | readonly CvSpec[];
    membership?: MembershipBuilder | readonly MemberSource[];
    /** Emit entities even when no identifier resolves (pure annotation carriers). */
    allowEmptyIdentifiers?: boolean;
}

export interface BuildOptions {
    /** Raise on the first failing spec instead of dropping it. */
    strict?: boolean;
    logger?: Logger;
}

/**
 * Compiled schema for one entity type. Built once, applied to every row.
 *
 * Resolution order is identifiers, type, annotations, membership. A row
 * whose identifiers all resolve empty produces no entity.
 */
export class EntityBuilder {
    private readonly type: CvTerm | RowSource;
    private readonly typeSpec: CvSpec | null;
    private readonly identifiers: IdentifiersBuilder;
    private readonly annotations: AnnotationsBuilder;
    private readonly membership: MembershipBuilder;
    private readonly allowEmptyIdentifiers: boolean;

    constructor(init: EntityBuilderInit) {
        this.type = init.type;
        this.typeSpec = init.type instanceof RowSource ? cv({ term: init.type }) : null;
        this.identifiers = init.identifiers instanceof IdentifiersBuilder
            ? init.identifiers
            : new IdentifiersBuilder(...init.identifiers);
        this.annotations = init.annotations instanceof AnnotationsBuilder
            ? init.annotations
            : new AnnotationsBuilder(...(init.annotations ?? []));
        this.membership = init.membership instanceof MembershipBuilder
            ? init.membership
            : new MembershipBuilder(...(init.membership ?? []));
        this.allowEmptyIdentifiers = init.allowEmptyIdentifiers ?? false;
        Object.freeze(this);
    }

    /**
     * Apply the schema to one raw row.
     */
    build(row: RawRow, options: BuildOptions = {}): Entity | null {
        return this.buildWithin(row, {
            strict: options.strict ?? false,
            logger: options.logger ?? getLogger(),
        });
    }

    /** @internal Used by nested members to share the parent's context. */
    buildWithin(row: RawRow, ctx: BuildContext): Entity | null {
        const identifiers = this.identifiers.build(row, ctx);
        if (identifiers.length === 0 && !this.allowEmptyIdentifiers) {
            ctx.logger.debug({ row: rowContext(row) }, 'No identifiers resolved, row dropped');
            return null;
        }

        const type = this.resolveType(row, ctx);
        if (!type) {
            ctx.logger.debug({ field: this.typeSpec?.label, row: rowContext(row) }, 'Entity type unresolved, row dropped');
            return null;
        }

        return {
            type,
            identifiers,
            annotations: this.annotations.build(row, ctx),
            membership: this.membership.build(row, ctx),
        };
    }

    private resolveType(row: RawRow, ctx: BuildContext): CvTerm | null {
        if (!(this.type instanceof RowSource)) return this.type;
        if (!this.typeSpec) return null;

        const [resolved] = resolveSpecs([this.typeSpec], row, ctx);
        return resolved?.terms.slots.find((term) => term !== null) ?? null;
    }
}
