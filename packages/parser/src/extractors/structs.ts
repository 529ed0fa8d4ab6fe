/**
 * Struct extraction
 */

import type { Struct } from '@vydoc/core'
import { findDeclarations, readDeclarationBody } from '../scanner.js'
import type { SourceFile } from '../source.js'
import type { ExtractionContext } from '../types.js'
import { bodyEntries, parseAll, parseParameter, unterminatedBody } from './fields.js'

export function extractStructs(source: SourceFile, context: ExtractionContext): Struct[] {
  const structs: Struct[] = []

  for (const header of findDeclarations(source, ['struct'])) {
    const body = readDeclarationBody(source, header)
    if (!body) {
      continue
    }
    if (body.status === 'unterminated') {
      structs.push({ name: header.name, fields: [], diagnostics: [unterminatedBody(header.name, body.form)] })
      continue
    }

    const { values, diagnostics } = parseAll(bodyEntries(body), (entry) =>
      parseParameter(entry, header.name, context)
    )
    structs.push({ name: header.name, fields: values, diagnostics })
  }

  return structs
}
