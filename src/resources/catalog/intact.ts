import { IdentifierNamespace, InteractionMetadata, License, UpdateCategory } from '../../cv/registry.js';
import { cv } from '../../mapping/cv.js';
import { Dataset } from '../dataset.js';
import { declarationFile, declarationFor, loadDeclarationFile } from '../declaration.js';
import { Resource } from '../resource.js';
import { mitab, mitabInteraction } from './mitab.js';

const { f } = mitab;

export const interactionsSchema = mitabInteraction({
    identifiers: [cv({ term: IdentifierNamespace.term('INTACT'), value: f('Interaction identifier(s)', { extract: /intact:([^|"]+)/ }) })],
    annotations: [
        cv({ term: InteractionMetadata.term('CONFIDENCE_VALUE'), value: f('Confidence value(s)') }),
        cv({ term: { true: InteractionMetadata.term('NEGATIVE') }, value: f('Negative') }),
        cv({ term: InteractionMetadata.term('CREATION_DATE'), value: f('Creation date') }),
        cv({ term: InteractionMetadata.term('UPDATE_DATE'), value: f('Update date') }),
    ],
});

const declarations = loadDeclarationFile(declarationFile('intact'));

export const intact = new Resource(
    {
        name: 'intact',
        displayName: 'IntAct',
        url: 'https://www.ebi.ac.uk/intact/',
        license: License.term('CC_BY_4_0'),
        updateCategory: UpdateCategory.term('REGULAR'),
        pubmed: '37953288',
        description:
            'Molecular interaction database curated from the literature and direct submissions, '
            + 'covering protein, small molecule and nucleic acid interactions in PSI-MITAB format.',
    },
    {
        interactions: new Dataset('intact', 'interactions', {
            declaration: declarationFor(declarations, 'interactions'),
            schema: interactionsSchema,
        }),
    }
);
