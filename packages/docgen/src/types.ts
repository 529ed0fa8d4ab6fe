/**
 * Types for Sphinx documentation generation
 */

import type { Contract, TypeVocabulary } from '@vydoc/core';

/**
 * Values written into the generated `conf.py`
 */
export interface ProjectConfig {
  /** Sphinx project name */
  name: string;
  author: string;
  copyright: string;
  /** HTML theme (default: sphinx_rtd_theme) */
  theme: string;
}

/**
 * Documentation generation configuration
 */
export interface DocGenConfig {
  /** Parsed contracts, one page each */
  contracts: Contract[];
  /** Output directory; pages are written to `<outputDir>/docs` */
  outputDir: string;
  /** Title of the index page */
  title?: string;
  /** Overrides for the `conf.py` values */
  project?: Partial<ProjectConfig>;
  /** Vocabulary used to print types (its array tag) */
  vocabulary?: TypeVocabulary;
}

/**
 * Generated page information
 */
export interface GeneratedPage {
  /** File path relative to the docs directory */
  path: string;
  /** reStructuredText or conf.py content */
  content: string;
}

/**
 * Result of writing a docs tree
 */
export interface GenerationResult {
  /** Absolute docs directory */
  docsDir: string;
  /** Absolute paths of the files written, in write order */
  files: string[];
}
