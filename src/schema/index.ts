/**
 * Schema module exports.
 */

export * from './types.js';
export * from './TemplateBuilder.js';
export * from './SchemaRegistry.js';
export * from './ZodIntrospector.js';
export * from './ZodExporter.js';
