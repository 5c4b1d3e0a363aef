/**
 * Maps typed data models onto RDF schema and instance graphs
 * and round-trips them through JSON-LD.
 *
 * This is the main entry point for the library.
 */

// Errors and logging
export * from './core/errors.js';
export { logger, createLogger, setLogLevel } from './core/logger.js';
export type { LogLevel } from './core/logger.js';
export * from './core/vocabulary.js';

// Schema and instance model
export * from './model/index.js';

// Type templates and registry
export * from './schema/index.js';

// Instance resolution
export * from './resolver/index.js';

// JSON-LD generation and graph building
export * from './jsonld/index.js';

// Validation
export * from './validation/index.js';

// Build sessions
export * from './session/index.js';

// Configuration
export * from './config/index.js';
