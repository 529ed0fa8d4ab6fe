/**
 * Contract Assembler
 * Runs every extractor over one file and packages the result
 */

import path from 'node:path'
import {
  DEFAULT_VOCABULARY,
  type Constant,
  type Contract,
  type Parameter,
  type VyperFunction,
  type VyperType,
} from '@vydoc/core'
import {
  extractConstants,
  extractContractDocstring,
  extractEnums,
  extractEvents,
  extractFunctions,
  extractStructs,
  extractVariables,
} from './extractors/index.js'
import { createSourceFile } from './source.js'
import type { ExtractionContext, ParseOptions } from './types.js'

/**
 * Attach the matching constant to every constant-named array bound.
 * Bounds naming no known constant are left as bare references.
 */
export function resolveConstantBounds(type: VyperType, constants: ReadonlyMap<string, Constant>): VyperType {
  switch (type.kind) {
    case 'scalar':
      return type
    case 'tuple':
      return { kind: 'tuple', members: type.members.map((member) => resolveConstantBounds(member, constants)) }
    case 'dynarray': {
      if (type.bound.kind !== 'constant') {
        return type
      }
      const constant = constants.get(type.bound.name)
      return constant ? { ...type, bound: { kind: 'constant', name: type.bound.name, constant } } : type
    }
  }
}

function withResolvedBounds(params: readonly Parameter[], constants: ReadonlyMap<string, Constant>): Parameter[] {
  return params.map((param) => ({ ...param, type: resolveConstantBounds(param.type, constants) }))
}

/**
 * Build the Contract for one file's text
 *
 * @param text - File contents
 * @param relativePath - Path relative to the source directory; its base name names the contract
 */
export function parseContract(text: string, relativePath: string, options: ParseOptions = {}): Contract {
  const source = createSourceFile(text)
  const context: ExtractionContext = { vocabulary: options.vocabulary ?? DEFAULT_VOCABULARY }

  const constants = extractConstants(source, context)
  const byName = new Map(constants.map((constant) => [constant.name, constant]))
  const { external, internal } = extractFunctions(source, context)

  const resolveFunction = (fn: VyperFunction): VyperFunction => ({
    ...fn,
    params: withResolvedBounds(fn.params, byName),
    returnType: fn.returnType && resolveConstantBounds(fn.returnType, byName),
  })

  return {
    name: path.parse(relativePath).name,
    path: relativePath,
    docstring: extractContractDocstring(source),
    enums: extractEnums(source),
    structs: extractStructs(source, context).map((struct) => ({
      ...struct,
      fields: withResolvedBounds(struct.fields, byName),
    })),
    events: extractEvents(source, context),
    constants,
    variables: extractVariables(source, context),
    functions: [...external, ...internal].map(resolveFunction),
  }
}
