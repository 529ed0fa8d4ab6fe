/**
 * Documentation build errors
 */

export class SphinxBuildError extends Error {
  /** Output sphinx-build wrote to stderr, if any */
  readonly stderr: string;

  constructor(message: string, options: { cause?: unknown; stderr?: string } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SphinxBuildError';
    this.stderr = options.stderr ?? '';
  }
}

export class DocsNotFoundError extends Error {
  constructor(readonly directory: string) {
    super(`Documentation not found in ${directory}. Run 'vydoc build' first to generate the documentation.`);
    this.name = 'DocsNotFoundError';
  }
}
