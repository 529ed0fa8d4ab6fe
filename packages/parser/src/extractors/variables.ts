/**
 * Module-level variable extraction
 */

import type { Variable, VariableVisibility } from '@vydoc/core'
import { findDeclarations, indexOfTopLevel, readDeclarationBody } from '../scanner.js'
import { scanModuleScope } from '../scope-filter.js'
import type { SourceFile } from '../source.js'
import { resolveScalar, toDiagnostics } from '../type-resolver.js'
import type { ExtractionContext } from '../types.js'

const DECLARATION = /^[ \t]*([A-Za-z_]\w*)[ \t]*:[ \t]*(\S.*?)[ \t]*$/
const PUBLIC = /^public\s*\(([\s\S]*)\)$/
const CONSTANT = /^constant\s*\(/

/** Module statements that share the `name: value` shape */
const MODULE_STATEMENTS: ReadonlySet<string> = new Set(['implements', 'uses', 'initializes', 'exports'])

/**
 * Lines covered by struct, event and enum declarations, whose fields share
 * the `name: type` shape of a variable
 */
function declarationLines(source: SourceFile): Set<number> {
  const covered = new Set<number>()

  for (const header of findDeclarations(source, ['struct', 'event', 'enum', 'flag', 'interface'])) {
    const body = readDeclarationBody(source, header)
    const lastLine = body?.status === 'ok' ? body.lastLine : header.line
    for (let n = header.line; n <= lastLine; n++) {
      covered.add(n)
    }
  }

  return covered
}

/**
 * Contract state: `name: type` or `name: public(type)` lines seen outside
 * function bodies
 */
export function extractVariables(source: SourceFile, context: ExtractionContext): Variable[] {
  const covered = declarationLines(source)
  const variables: Variable[] = []

  for (const { line, text } of scanModuleScope(source).lines) {
    const match = DECLARATION.exec(text)
    if (!match || covered.has(line) || MODULE_STATEMENTS.has(match[1])) {
      continue
    }

    const name = match[1]
    let typeText = match[2]

    const assignment = indexOfTopLevel(typeText, '=')
    if (assignment !== -1) {
      typeText = typeText.slice(0, assignment).trim()
    }

    let visibility: VariableVisibility = 'private'
    const wrapped = PUBLIC.exec(typeText)
    if (wrapped) {
      visibility = 'public'
      typeText = wrapped[1].trim()
    }
    if (CONSTANT.test(typeText)) {
      continue
    }

    const { type, warnings } = resolveScalar(typeText, context.vocabulary)
    variables.push({ name, type, visibility, diagnostics: toDiagnostics(warnings, name) })
  }

  return variables
}
