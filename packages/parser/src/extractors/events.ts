/**
 * Event extraction
 */

import { fieldError, type Event, type EventField } from '@vydoc/core'
import { findDeclarations, isBalanced, readDeclarationBody } from '../scanner.js'
import type { SourceFile } from '../source.js'
import { resolveScalar, toDiagnostics } from '../type-resolver.js'
import type { ExtractionContext } from '../types.js'
import { bodyEntries, parseAll, splitDeclaration, unterminatedBody, type Parsed } from './fields.js'

const INDEXED = /^indexed\s*\(([\s\S]*)\)$/

/**
 * Parse `name: type` or `name: indexed(type)`
 */
export function parseEventField(entry: string, owner: string, context: ExtractionContext): Parsed<EventField> {
  const parts = splitDeclaration(entry)
  if (!parts) {
    return {
      value: null,
      diagnostics: [
        fieldError('malformed-declaration', `${owner}.${entry}`, `Expected 'name: type' but found '${entry}'`),
      ],
    }
  }

  const subject = `${owner}.${parts.name}`
  if (!isBalanced(parts.typeText)) {
    return {
      value: null,
      diagnostics: [fieldError('malformed-type', subject, `Unbalanced brackets in type '${parts.typeText}'`)],
    }
  }

  const indexed = INDEXED.exec(parts.typeText)
  const { type, warnings } = resolveScalar(indexed ? indexed[1] : parts.typeText, context.vocabulary)

  return {
    value: { name: parts.name, type, indexed: indexed !== null },
    diagnostics: toDiagnostics(warnings, subject),
  }
}

export function extractEvents(source: SourceFile, context: ExtractionContext): Event[] {
  const events: Event[] = []

  for (const header of findDeclarations(source, ['event'])) {
    const body = readDeclarationBody(source, header)
    if (!body) {
      continue
    }
    if (body.status === 'unterminated') {
      events.push({ name: header.name, fields: [], diagnostics: [unterminatedBody(header.name, body.form)] })
      continue
    }

    const { values, diagnostics } = parseAll(bodyEntries(body), (entry) =>
      parseEventField(entry, header.name, context)
    )
    events.push({ name: header.name, fields: values, diagnostics })
  }

  return events
}
