import { CV_CATALOG, EntityType, IdentifierNamespace, ResourceAnnotation, UpdateCategory } from '../../cv/registry.js';
import { cv } from '../../mapping/cv.js';
import { EntityBuilder } from '../../mapping/entity-builder.js';
import { FieldConfig } from '../../mapping/field-config.js';
import type { RawRow } from '../../types/index.js';
import { Dataset, type RawParser } from '../dataset.js';
import { declarationFile, declarationFor, loadDeclarationFile } from '../declaration.js';
import { Resource } from '../resource.js';

const { f } = new FieldConfig();

/**
 * One row per term of every bundled registry.
 */
export const termRows: RawParser = async function* (): AsyncGenerator<RawRow> {
    for (const registry of CV_CATALOG.all()) {
        for (const term of registry) {
            yield {
                registry: registry.name,
                name: term.name,
                accession: term.accession,
                description: term.description ?? null,
                url: term.url ?? null,
            };
        }
    }
};

export const termsSchema = new EntityBuilder({
    type: EntityType.term('CV_TERM'),
    identifiers: [
        cv({ term: IdentifierNamespace.term('CV_TERM_ACCESSION'), value: f('accession') }),
        cv({ term: IdentifierNamespace.term('NAME'), value: f('name') }),
    ],
    annotations: [
        cv({ term: ResourceAnnotation.term('DESCRIPTION'), value: f('description') }),
        cv({ term: ResourceAnnotation.term('URL'), value: f('url') }),
    ],
});

const declarations = loadDeclarationFile(declarationFile('cv-terms'));

export const cvTerms = new Resource(
    {
        name: 'cv-terms',
        displayName: 'Controlled vocabularies',
        updateCategory: UpdateCategory.term('STATIC'),
        description: 'The controlled vocabulary terms used to type entities, identifiers and annotations.',
    },
    {
        terms: new Dataset('cv-terms', 'terms', {
            declaration: declarationFor(declarations, 'terms'),
            schema: termsSchema,
            parser: termRows,
            useBronze: false,
        }),
    }
);
