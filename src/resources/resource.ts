import { EntityType, IdentifierNamespace, ResourceAnnotation, type CvTerm } from '../cv/registry.js';
import type { Annotation, Entity } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import type { Dataset } from './dataset.js';

export interface ResourceInfo {
    /** Registry key, also used as the cache namespace. */
    name: string;
    /** Human-readable name; defaults to `name`. */
    displayName?: string;
    /** Accession of the resource itself, when it has one. */
    id?: string;
    description?: string;
    url?: string;
    license?: CvTerm;
    updateCategory?: CvTerm;
    pubmed?: string;
}

/**
 * A data provider and its datasets, keyed by dataset name.
 */
export class Resource<K extends string = string> {
    constructor(
        readonly info: ResourceInfo,
        readonly datasets: Readonly<Record<K, Dataset>>
    ) {}

    get name(): string {
        return this.info.name;
    }

    datasetNames(): string[] {
        return Object.keys(this.datasets);
    }

    /**
     * Dataset by name, for callers that only have a string (the CLI).
     */
    dataset(name: string): Dataset {
        const datasets: Readonly<Record<string, Dataset>> = this.datasets;
        const found = Object.entries(datasets).find(([key]) => key === name);
        if (!found) {
            throw new ConfigError(`Resource '${this.name}' has no dataset '${name}'`, { available: this.datasetNames() });
        }
        return found[1];
    }

    /**
     * The resource described as a CV_TERM entity.
     */
    metadata(): Entity {
        const { info } = this;
        const annotations: Annotation[] = [];
        if (info.license) annotations.push({ term: ResourceAnnotation.term('LICENSE'), value: info.license.accession });
        if (info.updateCategory) {
            annotations.push({ term: ResourceAnnotation.term('UPDATE_CATEGORY'), value: info.updateCategory.accession });
        }
        if (info.pubmed) annotations.push({ term: IdentifierNamespace.term('PUBMED'), value: info.pubmed });
        if (info.url) annotations.push({ term: ResourceAnnotation.term('URL'), value: info.url });
        if (info.description) annotations.push({ term: ResourceAnnotation.term('DESCRIPTION'), value: info.description });

        return {
            type: EntityType.term('CV_TERM'),
            identifiers: [
                { namespace: IdentifierNamespace.term('CV_TERM_ACCESSION'), value: info.id ?? info.name },
                { namespace: IdentifierNamespace.term('NAME'), value: info.displayName ?? info.name },
            ],
            annotations,
            membership: [],
        };
    }
}
