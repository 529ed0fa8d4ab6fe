/**
 * sphinx-build invocation
 */

import { execa } from 'execa';
import { join } from 'path';
import { SphinxBuildError } from '../errors.js';

export interface SphinxOptions {
  /** Executable to run (default: sphinx-build) */
  command?: string;
  /** HTML output directory (default: `<docsDir>/_build/html`) */
  outputDir?: string;
}

/**
 * Build the HTML site for a generated docs tree
 *
 * @returns The HTML output directory
 * @throws SphinxBuildError if sphinx-build cannot be started or exits non-zero
 */
export async function buildHtml(docsDir: string, options: SphinxOptions = {}): Promise<string> {
  const command = options.command ?? 'sphinx-build';
  const htmlDir = options.outputDir ?? join(docsDir, '_build', 'html');

  try {
    await execa(command, ['-b', 'html', docsDir, htmlDir]);
  } catch (error) {
    const stderr =
      error instanceof Error && 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
    throw new SphinxBuildError(`Failed to build HTML documentation with ${command}`, { cause: error, stderr });
  }

  return htmlDir;
}
