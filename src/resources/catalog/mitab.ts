import { EntityType, IdentifierNamespace, InteractionMetadata, ParticipantMetadata } from '../../cv/registry.js';
import { cv, type CvSpec } from '../../mapping/cv.js';
import { EntityBuilder } from '../../mapping/entity-builder.js';
import { FieldConfig, prefixTable } from '../../mapping/field-config.js';
import { Member } from '../../mapping/membership.js';

/**
 * PSI-MITAB database prefixes that name an identifier namespace.
 */
export const MITAB_NAMESPACES = prefixTable(
    {
        'cas registry number': IdentifierNamespace.term('CAS'),
        chebi: IdentifierNamespace.term('CHEBI'),
        chembl: IdentifierNamespace.term('CHEMBL'),
        'chembl compound': IdentifierNamespace.term('CHEMBL_COMPOUND'),
        complexportal: IdentifierNamespace.term('COMPLEXPORTAL'),
        'ddbj/embl/genbank': IdentifierNamespace.term('REFSEQ'),
        dip: IdentifierNamespace.term('DIP'),
        ensembl: IdentifierNamespace.term('ENSEMBL'),
        ensemblgenomes: IdentifierNamespace.term('ENSEMBL_GENOMES'),
        'entrezgene/locuslink': IdentifierNamespace.term('ENTREZ'),
        flybase: IdentifierNamespace.term('FLYBASE'),
        hgnc: IdentifierNamespace.term('HGNC'),
        imex: IdentifierNamespace.term('IMEX'),
        intact: IdentifierNamespace.term('INTACT'),
        ipi: IdentifierNamespace.term('IPI'),
        mint: IdentifierNamespace.term('MINT'),
        mirbase: IdentifierNamespace.term('MIRBASE'),
        pdbe: IdentifierNamespace.term('PDB'),
        'psi-mi': IdentifierNamespace.term('CV_TERM_ACCESSION'),
        pubchem: IdentifierNamespace.term('PUBCHEM'),
        refseq: IdentifierNamespace.term('REFSEQ'),
        rfam: IdentifierNamespace.term('RFAM'),
        rnacentral: IdentifierNamespace.term('RNACENTRAL'),
        signor: IdentifierNamespace.term('SIGNOR'),
        uniparc: IdentifierNamespace.term('UNIPARC'),
        uniprotkb: IdentifierNamespace.term('UNIPROT'),
    },
    null
);

export const mitab = new FieldConfig({
    extract: {
        prefix_lower: [/^([^:]+):/, (value) => value.toLowerCase()],
        value: /^[^:]+:([^|"]+)/,
        mi: /(MI:\d+)/,
        tax: /taxid:([-\d]+)/,
        pubmed: /pubmed:(\d+)/i,
    },
    map: {
        namespace: MITAB_NAMESPACES,
    },
    delimiter: '|',
});

const { f } = mitab;

/**
 * `db:value` identifiers of a column, namespaced by their prefix.
 */
export function prefixedIdentifier(column: string): CvSpec {
    return cv({
        term: f(column, { extract: 'prefix_lower', map: 'namespace' }),
        value: f(column, { extract: 'value' }),
    });
}

/**
 * Term-only annotation from the PSI-MI accession in a column.
 */
export function miTerm(column: string): CvSpec {
    return cv({ term: f(column, { extract: 'mi' }) });
}

/**
 * Interactor A or B of a MITAB row. The entity type comes from the
 * interactor type column.
 */
export function mitabParticipant(side: 'A' | 'B'): Member {
    const idColumn = side === 'A' ? '#ID(s) interactor A' : 'ID(s) interactor B';
    return new Member({
        entity: new EntityBuilder({
            type: f(`Type(s) interactor ${side}`, { extract: 'mi' }),
            identifiers: [prefixedIdentifier(idColumn), prefixedIdentifier(`Alt. ID(s) interactor ${side}`)],
            annotations: [
                cv({ term: IdentifierNamespace.term('NCBI_TAX_ID'), value: f(`Taxid interactor ${side}`, { extract: 'tax' }) }),
                cv({ term: ParticipantMetadata.term('ALIAS'), value: f(`Alias(es) interactor ${side}`) }),
                cv({ term: ParticipantMetadata.term('PARTICIPANT_XREF'), value: f(`Xref(s) interactor ${side}`) }),
            ],
        }),
        annotations: [
            miTerm(`Biological role(s) interactor ${side}`),
            miTerm(`Experimental role(s) interactor ${side}`),
            miTerm(`Identification method participant ${side}`),
            cv({ term: ParticipantMetadata.term('FEATURE'), value: f(`Feature(s) interactor ${side}`) }),
            cv({ term: ParticipantMetadata.term('STOICHIOMETRY'), value: f(`Stoichiometry(s) interactor ${side}`) }),
        ],
    });
}

/**
 * Binary interaction from a MITAB 2.7 row. `identifiers` and
 * `annotations` are specific to the provider.
 */
export function mitabInteraction(init: { identifiers: readonly CvSpec[]; annotations?: readonly CvSpec[] }): EntityBuilder {
    return new EntityBuilder({
        type: EntityType.term('INTERACTION'),
        identifiers: init.identifiers,
        annotations: [
            miTerm('Interaction type(s)'),
            miTerm('Interaction detection method(s)'),
            cv({ term: IdentifierNamespace.term('PUBMED'), value: f('Publication Identifier(s)', { extract: 'pubmed' }) }),
            cv({ term: InteractionMetadata.term('SOURCE_DATABASE'), value: f('Source database(s)', { extract: 'mi' }) }),
            cv({ term: InteractionMetadata.term('HOST_ORGANISM'), value: f('Host organism(s)', { extract: 'tax' }) }),
            ...(init.annotations ?? []),
        ],
        membership: [mitabParticipant('A'), mitabParticipant('B')],
    });
}
