/**
 * Parser configuration types
 */

import type { TypeVocabulary } from '@vydoc/core'

/**
 * Options for parsing contracts
 */
export interface ParseOptions {
  /** Scalar vocabulary (defaults to the Vyper vocabulary) */
  vocabulary?: TypeVocabulary
  /** File extensions treated as contract sources (default: ['.vy']) */
  extensions?: string[]
}

/**
 * Read-only context shared by every extractor of one file
 */
export interface ExtractionContext {
  vocabulary: TypeVocabulary
}
