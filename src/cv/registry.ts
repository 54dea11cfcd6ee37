import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

/**
 * Location of the bundled term definitions, resolved relative to this
 * module so it works from both `src/` and `dist/`.
 */
export const DEFAULT_TERMS_FILE = new URL('../../data/cv-terms.json', import.meta.url);

const TermEntrySchema = z.object({
    name: z.string().regex(/^[A-Z][A-Z0-9_]*$/),
    accession: z.string().regex(/^[A-Z]+:\d{4}$/),
    description: z.string().optional(),
    url: z.string().url().optional(),
});

const TermFileSchema = z.record(z.string(), z.array(TermEntrySchema));

export type TermEntry = z.infer<typeof TermEntrySchema>;

/**
 * A controlled-vocabulary term. Instances only come from a registry;
 * two terms are equal when they are the same object.
 */
export class CvTerm {
    constructor(
        public readonly registry: string,
        public readonly name: string,
        public readonly accession: string,
        public readonly description?: string,
        public readonly url?: string
    ) {
        Object.freeze(this);
    }

    get qualifiedName(): string {
        return `${this.registry}.${this.name}`;
    }

    toString(): string {
        return `${this.qualifiedName} (${this.accession})`;
    }

    /** Terms serialize as their accession. */
    toJSON(): string {
        return this.accession;
    }
}

/**
 * A named set of terms, addressable by name or accession.
 */
export class CvRegistry implements Iterable<CvTerm> {
    private readonly byName = new Map<string, CvTerm>();
    private readonly byAcc = new Map<string, CvTerm>();

    constructor(
        public readonly name: string,
        entries: readonly TermEntry[]
    ) {
        for (const entry of entries) {
            if (this.byName.has(entry.name)) {
                throw new ConfigError(`Duplicate term name ${name}.${entry.name}`);
            }
            if (this.byAcc.has(entry.accession)) {
                throw new ConfigError(`Duplicate accession ${entry.accession} in registry ${name}`);
            }
            const term = new CvTerm(name, entry.name, entry.accession, entry.description, entry.url);
            this.byName.set(entry.name, term);
            this.byAcc.set(entry.accession, term);
        }
    }

    /**
     * Look up a term by name. Throws on unknown names so that typos in a
     * schema fail when the schema is built, not while rows stream through.
     */
    readonly term = (termName: string): CvTerm => {
        const found = this.byName.get(termName);
        if (!found) {
            throw new ConfigError(`Unknown term ${this.name}.${termName}`, { registry: this.name, term: termName });
        }
        return found;
    };

    get(termName: string): CvTerm | undefined {
        return this.byName.get(termName);
    }

    byAccession(accession: string): CvTerm | undefined {
        return this.byAcc.get(accession);
    }

    has(term: CvTerm): boolean {
        return this.byName.get(term.name) === term;
    }

    get size(): number {
        return this.byName.size;
    }

    [Symbol.iterator](): Iterator<CvTerm> {
        return this.byName.values();
    }
}

/**
 * The full set of registries loaded from one term file.
 */
export class CvCatalog {
    private readonly registries = new Map<string, CvRegistry>();

    constructor(data: Record<string, readonly TermEntry[]>) {
        for (const [name, entries] of Object.entries(data)) {
            this.registries.set(name, new CvRegistry(name, entries));
        }
    }

    static fromFile(file: URL | string = DEFAULT_TERMS_FILE): CvCatalog {
        const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
        const parsed = TermFileSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ConfigError(`Invalid term file ${String(file)}`, { issues: parsed.error.issues });
        }
        return new CvCatalog(parsed.data);
    }

    registry(name: string): CvRegistry {
        const found = this.registries.get(name);
        if (!found) throw new ConfigError(`Unknown CV registry ${name}`);
        return found;
    }

    /**
     * Resolve an accession across all registries. When several registries
     * share an accession, the one listed first in the term file wins.
     */
    lookupAccession(accession: string): CvTerm | undefined {
        for (const registry of this.registries.values()) {
            const term = registry.byAccession(accession);
            if (term) return term;
        }
        return undefined;
    }

    all(): CvRegistry[] {
        return [...this.registries.values()];
    }
}

// ─── Bundled registries ───────────────────────────────────

export const CV_CATALOG = CvCatalog.fromFile();

export const EntityType = CV_CATALOG.registry('EntityType');
export const IdentifierNamespace = CV_CATALOG.registry('IdentifierNamespace');
export const MembershipRole = CV_CATALOG.registry('MembershipRole');
export const BiologicalRole = CV_CATALOG.registry('BiologicalRole');
export const ExperimentalRole = CV_CATALOG.registry('ExperimentalRole');
export const IdentificationMethod = CV_CATALOG.registry('IdentificationMethod');
export const InteractionType = CV_CATALOG.registry('InteractionType');
export const DetectionMethod = CV_CATALOG.registry('DetectionMethod');
export const CausalStatement = CV_CATALOG.registry('CausalStatement');
export const CausalMechanism = CV_CATALOG.registry('CausalMechanism');
export const ComplexExpansion = CV_CATALOG.registry('ComplexExpansion');
export const Curation = CV_CATALOG.registry('Curation');
export const MoleculeAnnotation = CV_CATALOG.registry('MoleculeAnnotation');
export const InteractionParameter = CV_CATALOG.registry('InteractionParameter');
export const ParticipantMetadata = CV_CATALOG.registry('ParticipantMetadata');
export const InteractionMetadata = CV_CATALOG.registry('InteractionMetadata');
export const ResourceAnnotation = CV_CATALOG.registry('ResourceAnnotation');
export const License = CV_CATALOG.registry('License');
export const UpdateCategory = CV_CATALOG.registry('UpdateCategory');
export const Unit = CV_CATALOG.registry('Unit');

export function lookupAccession(accession: string): CvTerm | undefined {
    return CV_CATALOG.lookupAccession(accession);
}
