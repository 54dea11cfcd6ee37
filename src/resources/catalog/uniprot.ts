import { EntityType, IdentifierNamespace, License, MoleculeAnnotation, Unit, UpdateCategory } from '../../cv/registry.js';
import { cv } from '../../mapping/cv.js';
import { EntityBuilder } from '../../mapping/entity-builder.js';
import { FieldConfig } from '../../mapping/field-config.js';
import { Dataset } from '../dataset.js';
import { declarationFile, declarationFor, loadDeclarationFile } from '../declaration.js';
import { Resource } from '../resource.js';

const { f } = new FieldConfig({
    extract: {
        // "Hemoglobin subunit alpha (Alpha-globin) (Hemoglobin alpha chain)"
        protein_name: /^([^(]+?)\s*(?:\(|$)/,
        protein_synonym: /^([^)]+)\)/,
    },
});

const xref = (column: string) => f(column, { delimiter: ';' });

export const proteinsSchema = new EntityBuilder({
    type: EntityType.term('PROTEIN'),
    identifiers: [
        cv({ term: IdentifierNamespace.term('UNIPROT'), value: f('Entry') }),
        cv({ term: IdentifierNamespace.term('UNIPROT'), value: f('Entry Name') }),
        cv({ term: IdentifierNamespace.term('GENE_NAME_PRIMARY'), value: f('Gene Names (primary)') }),
        cv({ term: IdentifierNamespace.term('GENE_NAME_SYNONYM'), value: f('Gene Names (synonym)', { delimiter: ' ' }) }),
        cv({ term: IdentifierNamespace.term('NAME'), value: f('Protein names', { extract: 'protein_name' }) }),
        cv({ term: IdentifierNamespace.term('SYNONYM'), value: f('Protein names', { delimiter: '(', extract: 'protein_synonym' }) }),
        cv({ term: IdentifierNamespace.term('ENSEMBL'), value: xref('Ensembl') }),
        cv({ term: IdentifierNamespace.term('REFSEQ'), value: xref('RefSeq') }),
        cv({ term: IdentifierNamespace.term('PDB'), value: xref('PDB') }),
        cv({ term: IdentifierNamespace.term('ALPHAFOLDDB'), value: xref('AlphaFoldDB') }),
        cv({ term: IdentifierNamespace.term('KEGG'), value: xref('KEGG') }),
        cv({ term: IdentifierNamespace.term('CHEMBL'), value: xref('ChEMBL') }),
        cv({ term: IdentifierNamespace.term('SIGNOR'), value: xref('SIGNOR') }),
        cv({ term: IdentifierNamespace.term('INTACT'), value: xref('IntAct') }),
        cv({ term: IdentifierNamespace.term('BIOGRID'), value: xref('BioGRID') }),
        cv({ term: IdentifierNamespace.term('COMPLEXPORTAL'), value: xref('ComplexPortal') }),
    ],
    annotations: [
        cv({ term: MoleculeAnnotation.term('LENGTH'), value: f('Length') }),
        cv({ term: MoleculeAnnotation.term('MASS_DALTON'), value: f('Mass'), unit: Unit.term('DALTON') }),
        cv({ term: { reviewed: MoleculeAnnotation.term('REVIEWED') }, value: f('Reviewed') }),
        cv({ term: MoleculeAnnotation.term('FUNCTION'), value: f('Function [CC]') }),
        cv({ term: MoleculeAnnotation.term('SUBCELLULAR_LOCATION'), value: f('Subcellular location [CC]') }),
        cv({ term: MoleculeAnnotation.term('POST_TRANSLATIONAL_MODIFICATION'), value: f('Post-translational modification') }),
        cv({ term: MoleculeAnnotation.term('DISEASE_INVOLVEMENT'), value: f('Involvement in disease') }),
        cv({ term: MoleculeAnnotation.term('PATHWAY_PARTICIPATION'), value: f('Pathway') }),
        cv({ term: MoleculeAnnotation.term('ACTIVITY_REGULATION'), value: f('Activity regulation') }),
        cv({ term: MoleculeAnnotation.term('MUTAGENESIS'), value: f('Mutagenesis') }),
        cv({ term: MoleculeAnnotation.term('TRANSMEMBRANE_REGION'), value: f('Transmembrane') }),
        cv({ term: MoleculeAnnotation.term('PROTEIN_FAMILY'), value: f('Protein families', { delimiter: ',' }) }),
        cv({ term: MoleculeAnnotation.term('EC_NUMBER'), value: xref('EC number') }),
        cv({ term: MoleculeAnnotation.term('KEYWORD'), value: xref('Keyword ID') }),
        cv({ term: MoleculeAnnotation.term('AMINO_ACID_SEQUENCE'), value: f('Sequence') }),
        cv({ term: IdentifierNamespace.term('CV_TERM_ACCESSION'), value: xref('Gene Ontology IDs') }),
        cv({ term: IdentifierNamespace.term('NCBI_TAX_ID'), value: f('Organism (ID)') }),
        cv({ term: IdentifierNamespace.term('PUBMED'), value: xref('PubMed ID') }),
    ],
});

const declarations = loadDeclarationFile(declarationFile('uniprot'));

export const uniprot = new Resource(
    {
        name: 'uniprot',
        displayName: 'UniProt',
        url: 'https://www.uniprot.org/',
        license: License.term('CC_BY_4_0'),
        updateCategory: UpdateCategory.term('REGULAR'),
        pubmed: '33237286',
        description:
            'Protein sequence and function knowledgebase with manually annotated entries '
            + 'covering localization, modifications, disease involvement and cross-references.',
    },
    {
        proteins: new Dataset('uniprot', 'proteins', {
            declaration: declarationFor(declarations, 'proteins'),
            schema: proteinsSchema,
        }),
    }
);
