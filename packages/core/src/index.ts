/**
 * Shared model for vydoc
 *
 * This package provides:
 * - The immutable contract model produced by the parser
 * - The scalar type vocabulary
 * - Type formatting and diagnostics helpers
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './vocabulary.js';
export * from './format.js';
export * from './diagnostics.js';
