import { ConfigError } from '../utils/errors.js';
import { cvTerms } from './catalog/cv-terms.js';
import { intact } from './catalog/intact.js';
import { signor } from './catalog/signor.js';
import { uniprot } from './catalog/uniprot.js';
import type { Resource } from './resource.js';

/**
 * Every resource known to the CLI. Adding a resource means importing it here.
 */
export const RESOURCES: ReadonlyMap<string, Resource> = new Map<string, Resource>([
    [cvTerms.name, cvTerms],
    [intact.name, intact],
    [signor.name, signor],
    [uniprot.name, uniprot],
]);

export function getResource(name: string): Resource {
    const resource = RESOURCES.get(name);
    if (!resource) {
        throw new ConfigError(`Unknown resource '${name}'`, { available: [...RESOURCES.keys()] });
    }
    return resource;
}

export function listResources(): Resource[] {
    return [...RESOURCES.values()];
}
