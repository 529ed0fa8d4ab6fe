/**
 * Contract docstring extraction
 */

import { readDocstringAt, skipTrivia, type SourceFile } from '../source.js'

/**
 * The triple-quoted block that opens the file, after blank and comment lines
 * (such as a `# pragma version` line). Null when code comes first.
 */
export function extractContractDocstring(source: SourceFile): string | null {
  return readDocstringAt(source.raw, skipTrivia(source.raw, 0))
}
