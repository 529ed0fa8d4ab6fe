/**
 * vydoc Parser
 * Extracts a typed contract model from Vyper sources
 */

export * from './types.js'
export * from './errors.js'
export * from './source.js'
export * from './scanner.js'
export * from './type-resolver.js'
export * from './scope-filter.js'
export * from './extractors/index.js'
export * from './assembler.js'
export * from './source-dir.js'
