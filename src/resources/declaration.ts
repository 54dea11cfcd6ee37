import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { BronzeSpec } from '../cache/bronze-storage.js';
import type { DownloadRequest } from '../cache/download-manager.js';
import type { LoaderOptions, SourceFormat } from '../loaders/registry.js';
import type { ProcessingSpec } from '../pipeline/processing.js';
import { ConfigError } from '../utils/errors.js';

const FilterSchema = z
    .object({
        field: z.string().min(1),
        operator: z.enum(['eq', 'ne', 'gt', 'lt', 'gte', 'lte', 'in', 'not_in', 'regex']),
        value: z.unknown().optional(),
    })
    .strict();

const FieldRefSchema = z.union([
    z.number().int().nonnegative(),
    z.string().min(1),
    z.object({ path: z.string().min(1), attribute: z.string().optional() }).strict(),
]);

const EncodingSchema = z.custom<BufferEncoding>(
    (value) => typeof value === 'string' && Buffer.isEncoding(value),
    { message: 'Unknown text encoding' }
);

/**
 * One dataset entry of a resource declaration file.
 */
export const DatasetDeclarationSchema = z
    .object({
        // Download
        url: z.string().url().optional(),
        method: z.enum(['GET', 'POST']).default('GET'),
        headers: z.record(z.string(), z.string()).optional(),
        params: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).optional(),
        data: z.record(z.string(), z.string()).optional(),
        json_body: z.record(z.string(), z.unknown()).optional(),
        version: z.union([z.string(), z.number()]).optional(),

        // Change detection
        check_etag: z.boolean().default(true),
        check_last_modified: z.boolean().default(true),
        checksum_url: z.string().url().optional(),
        checksum_type: z.enum(['md5', 'sha1', 'sha256']).default('md5'),

        // Parsing
        format: z.enum(['tsv', 'csv', 'excel', 'xml', 'json', 'rda', 'parquet']).optional(),
        compression: z.enum(['gzip', 'zip', 'bz2', 'xz', 'tar']).optional(),
        archive_member: z.string().optional(),
        separator: z.string().min(1).optional(),
        sheet: z.union([z.string(), z.number().int().nonnegative()]).optional(),
        encoding: EncodingSchema.optional(),
        skip_header: z.number().int().nonnegative().optional(),
        header: z.boolean().optional(),
        record_path: z.string().optional(),
        json_lines: z.boolean().optional(),

        // Row processing
        filters: z.array(FilterSchema).optional(),
        field_mapping: z.record(z.string(), FieldRefSchema).optional(),
        subfield_separator: z.record(z.string(), z.string().min(1)).optional(),
        transform: z.string().optional(),
        transform_args: z.record(z.string(), z.unknown()).optional(),

        // Bronze cache
        cache_name: z.string().optional(),
        bronze_path: z.string().optional(),
        partition_by: z
            .union([z.string(), z.array(z.string())])
            .optional()
            .transform((value) => (value === undefined ? undefined : Array.isArray(value) ? value : [value])),

        // Metadata
        description: z.string().optional(),
        organism: z.union([z.number().int(), z.string()]).optional(),
        data_type: z.string().optional(),
        license: z.string().optional(),
        citation: z.string().optional(),
    })
    .strict();

export type DatasetDeclaration = z.infer<typeof DatasetDeclarationSchema>;

const DeclarationFileSchema = z.record(z.string(), DatasetDeclarationSchema);

/**
 * Location of a bundled declaration file under `resources/`.
 */
export function declarationFile(name: string): URL {
    return new URL(`../../resources/${name}.yaml`, import.meta.url);
}

/**
 * Parse a declaration document; top-level keys are dataset names.
 */
export function parseDeclarations(text: string, source = '<inline>'): Record<string, DatasetDeclaration> {
    let document: unknown;
    try {
        document = parseYaml(text);
    } catch (error) {
        throw new ConfigError(`Invalid YAML in ${source}`, { cause: String(error) });
    }

    const parsed = DeclarationFileSchema.safeParse(document ?? {});
    if (!parsed.success) {
        throw new ConfigError(`Invalid resource declaration ${source}`, {
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
    }
    return parsed.data;
}

export function loadDeclarationFile(file: URL | string): Record<string, DatasetDeclaration> {
    return parseDeclarations(readFileSync(file, 'utf-8'), String(file));
}

/**
 * Pick one dataset from a declaration file.
 */
export function declarationFor(declarations: Record<string, DatasetDeclaration>, dataset: string): DatasetDeclaration {
    const found = declarations[dataset];
    if (!found) {
        throw new ConfigError(`No declaration for dataset '${dataset}'`, { available: Object.keys(declarations) });
    }
    return found;
}

// ─── Conversions ──────────────────────────────────────────

export function toDownloadRequest(resource: string, declaration: DatasetDeclaration): DownloadRequest | null {
    if (!declaration.url) return null;
    return {
        resource,
        url: declaration.url,
        method: declaration.method,
        params: declaration.params,
        headers: declaration.headers,
        body: declaration.json_body,
        form: declaration.data,
        checkEtag: declaration.check_etag,
        checkLastModified: declaration.check_last_modified,
        checksumUrl: declaration.checksum_url,
        checksumType: declaration.checksum_type,
    };
}

export function toLoaderOptions(declaration: DatasetDeclaration): LoaderOptions {
    return {
        compression: declaration.compression,
        archiveMember: declaration.archive_member,
        separator: declaration.separator,
        header: declaration.header,
        skipHeader: declaration.skip_header,
        sheet: declaration.sheet,
        encoding: declaration.encoding,
        recordPath: declaration.record_path,
        jsonLines: declaration.json_lines,
    };
}

export function toProcessingSpec(declaration: DatasetDeclaration): ProcessingSpec {
    return {
        filters: declaration.filters,
        fieldMapping: declaration.field_mapping,
        subfieldSeparator: declaration.subfield_separator,
        transform: declaration.transform,
        transformArgs: declaration.transform_args,
    };
}

/**
 * Bronze key inputs: everything that changes the raw rows.
 */
export function toBronzeSpec(resource: string, dataset: string, declaration: DatasetDeclaration, format: SourceFormat): BronzeSpec {
    return {
        resource,
        dataset: declaration.cache_name ?? dataset,
        identity: {
            url: declaration.url,
            params: declaration.params,
            form: declaration.data,
            body: declaration.json_body,
            format,
            loader: toLoaderOptions(declaration),
            version: declaration.version,
            organism: declaration.organism,
        },
        bronzePath: declaration.bronze_path,
        partitionBy: declaration.partition_by,
    };
}
