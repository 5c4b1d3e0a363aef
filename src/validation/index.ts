/**
 * Validation module exports.
 */

export * from './types.js';
export * from './CardinalityValidator.js';
export * from './ReferenceChecker.js';
