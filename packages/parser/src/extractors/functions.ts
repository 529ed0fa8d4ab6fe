/**
 * Function extraction
 * Module-level `def` blocks, partitioned by visibility
 *
 * `@external` and `@deploy` functions are external; every other function,
 * decorated or not, is internal. An undecorated `def` indented deeper than
 * the module's code is an interface member and is skipped.
 */

import { fieldError, type Diagnostic, type FunctionVisibility, type VyperFunction, type VyperType } from '@vydoc/core'
import { TypeSyntaxError } from '../errors.js'
import { fieldSpans, findMatchingDelimiter, indentOf, indexOfTopLevel } from '../scanner.js'
import { lineOf, originalText, readDocstringAt, skipTrivia, type SourceFile } from '../source.js'
import { resolveType, toDiagnostics } from '../type-resolver.js'
import type { ExtractionContext } from '../types.js'
import { parseAll, parseParameter } from './fields.js'

const FUNCTION_HEADER = /^([ \t]*)def[ \t]+([A-Za-z_]\w*)[ \t]*\(/gm
const VISIBILITY_MARKERS: ReadonlySet<string> = new Set(['external', 'internal'])
/** Decorators that list a function as external; `deploy` marks the constructor */
const EXTERNAL_MARKERS: ReadonlySet<string> = new Set(['external', 'deploy'])

export interface ExtractedFunctions {
  external: VyperFunction[]
  internal: VyperFunction[]
}

/**
 * Decorator lines directly above a `def`, outermost first, without `@`.
 * Comment-only lines are skipped; a blank line ends the block.
 */
export function decoratorsAbove(source: SourceFile, defLine: number): string[] {
  const decorators: string[] = []

  for (let n = defLine - 1; n >= 0; n--) {
    const code = source.maskedLines[n].trim()
    if (code.startsWith('@')) {
      const start = source.lineOffsets[n]
      decorators.unshift(originalText(source, start, start + source.maskedLines[n].length).slice(1).trim())
    } else if (code !== '' || source.rawLines[n].trim() === '') {
      break
    }
  }

  return decorators
}

function decoratorName(decorator: string): string {
  const paren = decorator.indexOf('(')
  return (paren === -1 ? decorator : decorator.slice(0, paren)).trim()
}

/**
 * Indentation of the least indented code line, which module-level
 * declarations share
 */
function moduleIndent(source: SourceFile): number {
  const widths = source.maskedLines.filter((line) => line.trim() !== '').map(indentOf)
  return widths.length ? Math.min(...widths) : 0
}

/**
 * Extract every function of the contract
 */
export function extractFunctions(source: SourceFile, context: ExtractionContext): ExtractedFunctions {
  const { masked, raw } = source
  const extracted: ExtractedFunctions = { external: [], internal: [] }
  const baseIndent = moduleIndent(source)

  for (const match of masked.matchAll(FUNCTION_HEADER)) {
    const start = match.index ?? 0
    const name = match[2]
    const decorators = decoratorsAbove(source, lineOf(source, start))
    if (decorators.length === 0 && match[1].length > baseIndent) {
      continue
    }

    const visibility: FunctionVisibility = decorators.some((d) => EXTERNAL_MARKERS.has(decoratorName(d)))
      ? 'external'
      : 'internal'
    const otherDecorators = decorators.filter((d) => !VISIBILITY_MARKERS.has(decoratorName(d)))

    const open = start + match[0].length - 1
    const close = findMatchingDelimiter(masked, open)
    if (close === -1) {
      extracted[visibility].push({
        name,
        params: [],
        returnType: null,
        docstring: null,
        visibility,
        decorators: otherDecorators,
        diagnostics: [fieldError('malformed-declaration', name, `Missing ')' closing the parameters of ${name}`)],
      })
      continue
    }

    const entries = fieldSpans(masked.slice(open + 1, close)).map((span) => ({
      code: masked.slice(open + 1 + span.start, open + 1 + span.end).trim(),
      original: originalText(source, open + 1 + span.start, open + 1 + span.end),
    }))
    const { values: params, diagnostics } = parseAll(entries, (entry) =>
      parseParameter(entry.code, name, context, entry.original)
    )

    // The signature ends at the first top-level ':' after the parameter list
    const colon = indexOfTopLevel(masked, ':', close + 1)
    const closeLineEnd = masked.indexOf('\n', close)
    const signatureEnd = colon !== -1 ? colon : closeLineEnd === -1 ? masked.length : closeLineEnd
    const returnType = parseReturnType(masked.slice(close + 1, signatureEnd), name, context, diagnostics)
    const docstring = colon === -1 ? null : readDocstringAt(raw, skipTrivia(raw, colon + 1))

    extracted[visibility].push({
      name,
      params,
      returnType,
      docstring,
      visibility,
      decorators: otherDecorators,
      diagnostics,
    })
  }

  return extracted
}

function parseReturnType(
  annotation: string,
  name: string,
  context: ExtractionContext,
  diagnostics: Diagnostic[]
): VyperType | null {
  const arrow = annotation.trim()
  if (!arrow.startsWith('->')) {
    return null
  }

  const subject = `${name}.return`
  try {
    const { type, warnings } = resolveType(arrow.slice(2), context.vocabulary)
    diagnostics.push(...toDiagnostics(warnings, subject))
    return type
  } catch (error) {
    if (error instanceof TypeSyntaxError) {
      diagnostics.push(fieldError('malformed-type', subject, error.message))
      return null
    }
    throw error
  }
}
