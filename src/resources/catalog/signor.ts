import { EntityType, IdentifierNamespace, License, UpdateCategory, type CvTerm } from '../../cv/registry.js';
import { cv } from '../../mapping/cv.js';
import { EntityBuilder } from '../../mapping/entity-builder.js';
import { FieldConfig, prefixTable } from '../../mapping/field-config.js';
import { MembersFromList } from '../../mapping/membership.js';
import { Dataset } from '../dataset.js';
import { declarationFile, declarationFor, loadDeclarationFile } from '../declaration.js';
import { Resource } from '../resource.js';
import { miTerm, mitab, mitabInteraction } from './mitab.js';

const { f } = new FieldConfig();

/**
 * A named group of proteins: complexes and protein families share the layout.
 */
function proteinGroup(type: CvTerm, nameColumn: string): EntityBuilder {
    return new EntityBuilder({
        type,
        identifiers: [
            cv({ term: IdentifierNamespace.term('SIGNOR'), value: f('SIGNOR ID') }),
            cv({ term: IdentifierNamespace.term('NAME'), value: f(nameColumn) }),
        ],
        membership: [
            new MembersFromList({
                type: EntityType.term('PROTEIN'),
                identifiers: [cv({ term: IdentifierNamespace.term('UNIPROT'), value: f('LIST OF ENTITIES', { delimiter: ',' }) })],
            }),
        ],
    });
}

function describedEntity(type: CvTerm, nameColumn: string, descriptionColumn: string): EntityBuilder {
    return new EntityBuilder({
        type,
        identifiers: [
            cv({ term: IdentifierNamespace.term('SIGNOR'), value: f('SIGNOR ID') }),
            cv({ term: IdentifierNamespace.term('NAME'), value: f(nameColumn) }),
        ],
        annotations: [cv({ term: IdentifierNamespace.term('SYNONYM'), value: f(descriptionColumn) })],
    });
}

export const complexesSchema = proteinGroup(EntityType.term('PROTEIN_COMPLEX'), 'COMPLEX NAME');
export const proteinFamiliesSchema = proteinGroup(EntityType.term('PROTEIN_FAMILY'), 'PROT. FAMILY NAME');
export const phenotypesSchema = describedEntity(EntityType.term('PHENOTYPE'), 'PHENOTYPE NAME', 'PHENOTYPE DESCRIPTION');
export const stimuliSchema = describedEntity(EntityType.term('STIMULUS'), 'STIMULUS NAME', 'STIMULUS DESCRIPTION');

const interactionId = 'Interaction identifier(s)';

export const interactionsSchema = mitabInteraction({
    identifiers: [
        cv({
            term: mitab.f(interactionId, {
                extract: 'prefix_lower',
                map: prefixTable(
                    { signor: IdentifierNamespace.term('SIGNOR'), 'signor-interaction': IdentifierNamespace.term('SIGNOR') },
                    null
                ),
            }),
            value: mitab.f(interactionId, { extract: /^[^:]+:(.*)/ }),
        }),
    ],
    annotations: [miTerm('Causal statement'), miTerm('Causal Regulatory Mechanism')],
});

const declarations = loadDeclarationFile(declarationFile('signor'));

function dataset(name: string, schema: EntityBuilder): Dataset {
    return new Dataset('signor', name, { declaration: declarationFor(declarations, name), schema });
}

export const signor = new Resource(
    {
        name: 'signor',
        displayName: 'SIGNOR',
        url: 'https://signor.uniroma2.it/',
        license: License.term('CC_BY_4_0'),
        updateCategory: UpdateCategory.term('REGULAR'),
        pubmed: '31665520',
        description:
            'Signaling network resource of manually curated causal relationships between biological entities, '
            + 'with mechanistic detail on modifications, transcriptional regulation and small molecule effects.',
    },
    {
        complexes: dataset('complexes', complexesSchema),
        protein_families: dataset('protein_families', proteinFamiliesSchema),
        phenotypes: dataset('phenotypes', phenotypesSchema),
        stimuli: dataset('stimuli', stimuliSchema),
        interactions: dataset('interactions', interactionsSchema),
    }
);
