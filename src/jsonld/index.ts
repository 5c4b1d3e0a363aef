/**
 * JSON-LD module exports.
 */

export * from './types.js';
export * from './IriMapper.js';
export * from './ContextBuilder.js';
export * from './GraphBuilder.js';
export * from './JsonLdGenerator.js';
export * from './JsonLdParser.js';
export * from './NTriplesWriter.js';
