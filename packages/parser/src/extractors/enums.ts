/**
 * Enum extraction (`enum` and `flag` declarations)
 */

import { fieldError, warning, type Diagnostic, type Enum } from '@vydoc/core'
import { findDeclarations, readDeclarationBody, splitFieldList } from '../scanner.js'
import type { SourceFile } from '../source.js'
import { unterminatedBody } from './fields.js'

const IDENTIFIER = /^[A-Za-z_]\w*$/

export function extractEnums(source: SourceFile): Enum[] {
  const enums: Enum[] = []

  for (const header of findDeclarations(source, ['enum', 'flag'])) {
    const body = readDeclarationBody(source, header)
    if (!body) {
      continue
    }
    if (body.status === 'unterminated') {
      enums.push({ name: header.name, values: [], diagnostics: [unterminatedBody(header.name, body.form)] })
      continue
    }

    const values: string[] = []
    const diagnostics: Diagnostic[] = []

    for (const value of splitFieldList(body.text)) {
      if (value === 'pass') {
        continue
      }
      if (!IDENTIFIER.test(value)) {
        diagnostics.push(
          fieldError('malformed-declaration', `${header.name}.${value}`, `'${value}' is not a valid enum member`)
        )
      } else if (values.includes(value)) {
        diagnostics.push(
          warning('duplicate-enum-value', `${header.name}.${value}`, `'${value}' is declared more than once`)
        )
      } else {
        values.push(value)
      }
    }

    enums.push({ name: header.name, values, diagnostics })
  }

  return enums
}
