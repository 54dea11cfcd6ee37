import { describe, it, expect } from 'vitest';
import { EntityType, IdentifierNamespace, MoleculeAnnotation, ParticipantMetadata, Unit } from '../cv/registry.js';
import { entityToJSON, formatEntity } from '../mapping/entity-json.js';
import type { Entity } from '../types/index.js';

const COMPLEX = EntityType.term('PROTEIN_COMPLEX');
const PROTEIN = EntityType.term('PROTEIN');
const SIGNOR = IdentifierNamespace.term('SIGNOR');
const UNIPROT = IdentifierNamespace.term('UNIPROT');
const MASS = MoleculeAnnotation.term('MASS_DALTON');
const REVIEWED = MoleculeAnnotation.term('REVIEWED');
const DALTON = Unit.term('DALTON');
const STOICHIOMETRY = ParticipantMetadata.term('STOICHIOMETRY');

const entity: Entity = {
    type: COMPLEX,
    identifiers: [{ namespace: SIGNOR, value: 'SIGNOR-C1' }],
    annotations: [{ term: MASS, value: '100', unit: DALTON }, { term: REVIEWED }],
    membership: [
        {
            entity: { type: PROTEIN, identifiers: [{ namespace: UNIPROT, value: 'P19838' }], annotations: [], membership: [] },
            annotations: [{ term: STOICHIOMETRY, value: '2' }],
        },
    ],
};

describe('entityToJSON', () => {
    it('should replace terms with accessions', () => {
        expect(entityToJSON(entity)).toEqual({
            type: COMPLEX.accession,
            identifiers: [{ namespace: SIGNOR.accession, value: 'SIGNOR-C1' }],
            annotations: [{ term: MASS.accession, value: '100', unit: DALTON.accession }, { term: REVIEWED.accession }],
            membership: [
                {
                    entity: {
                        type: PROTEIN.accession,
                        identifiers: [{ namespace: UNIPROT.accession, value: 'P19838' }],
                        annotations: [],
                        membership: [],
                    },
                    annotations: [{ term: STOICHIOMETRY.accession, value: '2' }],
                },
            ],
        });
    });

    it('should serialize with a fixed key order', () => {
        const json = JSON.stringify(entityToJSON(entity));

        expect(json.startsWith(`{"type":"${COMPLEX.accession}","identifiers":[{"namespace":"${SIGNOR.accession}","value":"SIGNOR-C1"}],"annotations":`)).toBe(true);
        expect(JSON.stringify(entityToJSON(entity))).toBe(json);
    });

    it('should serialize terms the same way through toJSON', () => {
        expect(JSON.stringify(entity.type)).toBe(JSON.stringify(COMPLEX.accession));
    });
});

describe('formatEntity', () => {
    it('should render an indented outline', () => {
        expect(formatEntity(entity)).toBe(
            [
                'PROTEIN_COMPLEX',
                '  id  SIGNOR: SIGNOR-C1',
                '  ann MASS_DALTON: 100 DALTON',
                '  ann REVIEWED',
                '  member [STOICHIOMETRY: 2]',
                '    PROTEIN',
                '      id  UNIPROT: P19838',
            ].join('\n')
        );
    });
});
