/**
 * Schema and instance model.
 */

export * from './types.js';
export * from './LiteralValue.js';
export * from './TypeProperty.js';
export * from './Restriction.js';
export * from './TypeDefinition.js';
export * from './MetadataEntry.js';
