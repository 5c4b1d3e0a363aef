/**
 * Build session exports.
 */

export * from './BuildSession.js';
