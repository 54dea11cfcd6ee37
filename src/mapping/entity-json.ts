import type { Annotation, Entity } from '../types/index.js';

export interface AnnotationJSON {
    term: string;
    value?: string;
    unit?: string;
}

export interface EntityJSON {
    type: string;
    identifiers: Array<{ namespace: string; value: string }>;
    annotations: AnnotationJSON[];
    membership: Array<{ entity: EntityJSON; annotations: AnnotationJSON[] }>;
}

/**
 * Wire form of an entity: terms become accessions, key order is fixed.
 */
export function entityToJSON(entity: Entity): EntityJSON {
    return {
        type: entity.type.accession,
        identifiers: entity.identifiers.map(({ namespace, value }) => ({ namespace: namespace.accession, value })),
        annotations: entity.annotations.map(annotationToJSON),
        membership: entity.membership.map((member) => ({
            entity: entityToJSON(member.entity),
            annotations: member.annotations.map(annotationToJSON),
        })),
    };
}

function annotationToJSON(annotation: Annotation): AnnotationJSON {
    const out: AnnotationJSON = { term: annotation.term.accession };
    if (annotation.value !== undefined) out.value = annotation.value;
    if (annotation.unit) out.unit = annotation.unit.accession;
    return out;
}

/**
 * Indented, human-readable rendering for the CLI.
 */
export function formatEntity(entity: Entity, indent = 0): string {
    const pad = '  '.repeat(indent);
    const lines = [`${pad}${entity.type.name}`];

    for (const id of entity.identifiers) {
        lines.push(`${pad}  id  ${id.namespace.name}: ${id.value}`);
    }
    for (const annotation of entity.annotations) {
        lines.push(`${pad}  ann ${formatAnnotation(annotation)}`);
    }
    for (const member of entity.membership) {
        const roles = member.annotations.map(formatAnnotation).join(', ');
        lines.push(`${pad}  member${roles ? ` [${roles}]` : ''}`);
        lines.push(formatEntity(member.entity, indent + 2));
    }
    return lines.join('\n');
}

function formatAnnotation(annotation: Annotation): string {
    let text = annotation.term.name;
    if (annotation.value !== undefined) text += `: ${annotation.value}`;
    if (annotation.unit) text += ` ${annotation.unit.name}`;
    return text;
}
