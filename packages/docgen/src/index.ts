/**
 * vydoc Documentation Generator
 * Sphinx documentation for parsed Vyper contracts
 */

export { generateDocs } from './generator.js';
export {
  buildContractPage,
  buildIndexPage,
  buildConfPy,
  functionSignature,
  toContractView,
  DEFAULT_INDEX_TITLE,
  DEFAULT_PROJECT,
} from './sphinx/page-builder.js';
export type { ContractView } from './sphinx/page-builder.js';
export { buildHtml } from './sphinx/sphinx-runner.js';
export type { SphinxOptions } from './sphinx/sphinx-runner.js';
export { serveDocs, createDocsApp } from './server.js';
export type { ServeOptions } from './server.js';
export { SphinxBuildError, DocsNotFoundError } from './errors.js';
export type { DocGenConfig, ProjectConfig, GeneratedPage, GenerationResult } from './types.js';
