/**
 * Barrel export for all shared types.
 */
export type { Entity, Identifier, Annotation, Membership, RawRow } from './entity.js';
export { DEFAULT_CONFIG } from './config.js';
export type { BiostrataConfig, HttpConfig, RateLimit, LogLevel } from './config.js';
