/**
 * Resolver module exports.
 */

export * from './types.js';
export * from './extractors.js';
export * from './InstanceResolver.js';
