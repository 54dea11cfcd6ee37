// Data model
export type { Annotation, Entity, Identifier, Membership, RawRow } from './types/index.js';
export { DEFAULT_CONFIG } from './types/index.js';
export type { BiostrataConfig, HttpConfig, LogLevel, RateLimit } from './types/index.js';

// Vocabularies
export * from './cv/registry.js';

// Mapping
export { constant, ColumnSource, ConstantSource, FieldConfig, PrefixTable, prefixTable, normalizeToken, RowSource } from './mapping/field-config.js';
export type { ColumnOptions, ExtractStep, FieldConfigOptions, MapSpec, Slot, Token, TransformSpec } from './mapping/field-config.js';
export { cv, CvSpec } from './mapping/cv.js';
export type { CvSpecInit, FlagTable, TermSpec } from './mapping/cv.js';
export { AnnotationsBuilder, IdentifiersBuilder } from './mapping/builders.js';
export { Member, MembersFromList, MembershipBuilder } from './mapping/membership.js';
export type { MemberSource } from './mapping/membership.js';
export { EntityBuilder } from './mapping/entity-builder.js';
export type { BuildOptions, EntityBuilderInit } from './mapping/entity-builder.js';
export { entityToJSON, formatEntity } from './mapping/entity-json.js';
export type { EntityJSON } from './mapping/entity-json.js';

// Cache and loading
export { DownloadManager } from './cache/download-manager.js';
export type { DownloadRequest, DownloadResult } from './cache/download-manager.js';
export { BronzeStorage } from './cache/bronze-storage.js';
export type { BronzeSpec } from './cache/bronze-storage.js';
export { CacheInventory } from './storage/cache-inventory.js';
export { defaultLoaders, detectFormat, LoaderRegistry } from './loaders/registry.js';
export type { Loader, LoaderOptions, SourceFormat } from './loaders/registry.js';
export { processRows } from './pipeline/processing.js';
export type { FilterSpec, ProcessingSpec, RowTransform } from './pipeline/processing.js';
export { createIngestContext } from './pipeline/context.js';
export type { IngestContext } from './pipeline/context.js';

// Resources
export { Dataset } from './resources/dataset.js';
export type { DatasetInit, EntityOptions, RawParser } from './resources/dataset.js';
export { Resource } from './resources/resource.js';
export type { ResourceInfo } from './resources/resource.js';
export { parseDeclarations, loadDeclarationFile } from './resources/declaration.js';
export type { DatasetDeclaration } from './resources/declaration.js';
export { getResource, listResources, RESOURCES } from './resources/registry.js';

// Ambient
export * from './utils/errors.js';
export { resolveConfig, mergeConfig } from './utils/config.js';
export { initLogger, getLogger, silentLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export { HttpClient } from './utils/http-client.js';
