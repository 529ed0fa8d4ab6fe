/**
 * Constant extraction
 */

import { fieldError, type Constant } from '@vydoc/core'
import { findMatchingDelimiter } from '../scanner.js'
import { originalText, type SourceFile } from '../source.js'
import { resolveScalar, toDiagnostics } from '../type-resolver.js'
import type { ExtractionContext } from '../types.js'

const CONSTANT_HEADER = /^[ \t]*([A-Za-z_]\w*)[ \t]*:[ \t]*(public[ \t]*\([ \t]*)?constant[ \t]*\(/gm

/**
 * `NAME: constant(type) = value` or `NAME: public(constant(type)) = value`,
 * value read to the end of its line
 */
export function extractConstants(source: SourceFile, context: ExtractionContext): Constant[] {
  const { masked } = source
  const constants: Constant[] = []

  for (const match of masked.matchAll(CONSTANT_HEADER)) {
    const name = match[1]
    const open = (match.index ?? 0) + match[0].length - 1
    const close = findMatchingDelimiter(masked, open)
    const lineEnd = masked.indexOf('\n', open)
    const end = lineEnd === -1 ? masked.length : lineEnd

    if (close === -1 || close > end) {
      constants.push({
        name,
        type: { kind: 'scalar', name: masked.slice(open + 1, end).trim() },
        value: '',
        diagnostics: [fieldError('malformed-type', name, `Missing ')' closing the type of ${name}`)],
      })
      continue
    }

    const { type, warnings } = resolveScalar(masked.slice(open + 1, close), context.vocabulary)
    const diagnostics = toDiagnostics(warnings, name)

    let rest = close + 1
    if (match[2] !== undefined) {
      const wrapperClose = /^[ \t]*\)/.exec(masked.slice(rest, end))
      if (!wrapperClose) {
        diagnostics.push(fieldError('malformed-declaration', name, `Missing ')' closing public(...) of ${name}`))
        constants.push({ name, type, value: '', diagnostics })
        continue
      }
      rest += wrapperClose[0].length
    }

    const assignment = /^\s*=/.exec(masked.slice(rest, end))
    if (!assignment) {
      diagnostics.push(fieldError('malformed-declaration', name, `Constant ${name} has no value`))
    }

    const value = assignment ? originalText(source, rest + assignment[0].length, end) : ''
    constants.push({ name, type, value, diagnostics })
  }

  return constants
}
