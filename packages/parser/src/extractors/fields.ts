/**
 * Field and parameter parsing shared by structs, events and functions
 */

import { fieldError, type Diagnostic, type Parameter } from '@vydoc/core'
import { TypeSyntaxError } from '../errors.js'
import { indexOfTopLevel, splitFieldList, type DeclarationBody } from '../scanner.js'
import { resolveType, toDiagnostics } from '../type-resolver.js'
import type { ExtractionContext } from '../types.js'

const IDENTIFIER = /^[A-Za-z_]\w*$/

/**
 * Result of parsing one entry: the value, if it survived, and what was found
 */
export interface Parsed<T> {
  value: T | null
  diagnostics: Diagnostic[]
}

/**
 * Split `name: type` into its parts, or null when the entry has no such shape
 */
export function splitDeclaration(entry: string): { name: string; typeText: string } | null {
  const colon = entry.indexOf(':')
  if (colon === -1) {
    return null
  }

  const name = entry.slice(0, colon).trim()
  const typeText = entry.slice(colon + 1).trim()
  if (!IDENTIFIER.test(name) || typeText === '') {
    return null
  }

  return { name, typeText }
}

/**
 * Entries of a declaration body, one per field; `pass` is an empty body
 */
export function bodyEntries(body: Extract<DeclarationBody, { status: 'ok' }>): string[] {
  const lines = body.form === 'indent' ? body.text.split('\n') : [body.text]
  return lines.flatMap(splitFieldList).filter((entry) => entry !== 'pass')
}

/**
 * Parse a masked `name: type` entry.
 *
 * When `original` (the same entry read from the raw text) is given, a
 * `= default` is allowed and its value is taken from `original`, so string
 * literals keep their contents. A malformed entry yields no value and an
 * error naming it.
 */
export function parseParameter(
  entry: string,
  owner: string,
  context: ExtractionContext,
  original?: string
): Parsed<Parameter> {
  let declaration = entry
  let defaultValue: string | undefined

  if (original !== undefined) {
    const equals = indexOfTopLevel(entry, '=')
    if (equals !== -1) {
      declaration = entry.slice(0, equals)
      defaultValue = original.slice(equals + 1).trim()
    }
  }

  const parts = splitDeclaration(declaration)
  if (!parts) {
    const text = original ?? entry
    return {
      value: null,
      diagnostics: [
        fieldError('malformed-declaration', `${owner}.${text}`, `Expected 'name: type' but found '${text}'`),
      ],
    }
  }

  const subject = `${owner}.${parts.name}`
  try {
    const { type, warnings } = resolveType(parts.typeText, context.vocabulary)
    const value: Parameter = defaultValue === undefined ? { name: parts.name, type } : { name: parts.name, type, defaultValue }
    return { value, diagnostics: toDiagnostics(warnings, subject) }
  } catch (error) {
    if (error instanceof TypeSyntaxError) {
      return { value: null, diagnostics: [fieldError('malformed-type', subject, error.message)] }
    }
    throw error
  }
}

/**
 * Parse every entry, keeping the siblings of a malformed one
 */
export function parseAll<T, E = string>(entries: E[], parse: (entry: E) => Parsed<T>): { values: T[]; diagnostics: Diagnostic[] } {
  const values: T[] = []
  const diagnostics: Diagnostic[] = []

  for (const entry of entries) {
    const parsed = parse(entry)
    if (parsed.value !== null) {
      values.push(parsed.value)
    }
    diagnostics.push(...parsed.diagnostics)
  }

  return { values, diagnostics }
}

export function unterminatedBody(owner: string, form: DeclarationBody['form']): Diagnostic {
  const delimiter = form === 'brace' ? '}' : ')'
  return fieldError('malformed-declaration', owner, `Missing '${delimiter}' closing ${owner}`)
}
