/**
 * Type Resolver
 * Parses type expressions into scalars, tuples and bounded dynamic arrays
 */

import {
  isConformingScalar,
  isKnownScalar,
  warning,
  type ArrayBound,
  type Diagnostic,
  type ScalarType,
  type TypeVocabulary,
  type VyperType,
} from '@vydoc/core'
import { TypeSyntaxError } from './errors.js'
import { findMatchingDelimiter, isBalanced, splitTopLevel } from './scanner.js'

/**
 * Scalar name outside the vocabulary
 */
export interface TypeWarning {
  typeName: string
  message: string
}

/**
 * Resolved type plus the soft validation results
 */
export interface Resolution<T extends VyperType = VyperType> {
  type: T
  warnings: TypeWarning[]
}

const INTEGER_LITERAL = /^(?:\d+|0x[0-9a-fA-F]+)$/

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function scalar(name: string): ScalarType {
  return { kind: 'scalar', name }
}

/**
 * Build the structural type for an expression, without vocabulary checks
 * beyond recognising exact scalar names.
 *
 * @throws TypeSyntaxError for unbalanced brackets, empty tuple members or an
 * array marker that does not split into element and bound
 *
 * @example parseTypeExpression('DynArray[uint256, MAX]', vocabulary)
 * // { kind: 'dynarray', element: { kind: 'scalar', name: 'uint256' }, bound: { kind: 'constant', name: 'MAX' } }
 */
export function parseTypeExpression(expression: string, vocabulary: TypeVocabulary): VyperType {
  const text = expression.trim()

  if (text === '') {
    throw new TypeSyntaxError('Empty type expression', expression)
  }

  if (isKnownScalar(text, vocabulary)) {
    return scalar(text)
  }

  if (!isBalanced(text)) {
    throw new TypeSyntaxError(`Unbalanced brackets in type '${text}'`, expression)
  }

  const arrayMarker = new RegExp(`^${escapeRegExp(vocabulary.arrayTag)}\\s*\\[`).exec(text)
  if (arrayMarker) {
    const open = arrayMarker[0].length - 1
    if (findMatchingDelimiter(text, open) !== text.length - 1) {
      throw new TypeSyntaxError(`Unexpected text after '${vocabulary.arrayTag}[...]' in '${text}'`, expression)
    }
    return parseDynArray(text, text.slice(open + 1, -1), vocabulary)
  }

  if (text.startsWith('(')) {
    if (findMatchingDelimiter(text, 0) !== text.length - 1) {
      throw new TypeSyntaxError(`Unexpected text after tuple in '${text}'`, expression)
    }
    return parseTuple(text, text.slice(1, -1), vocabulary)
  }

  return scalar(text)
}

function parseDynArray(text: string, inner: string, vocabulary: TypeVocabulary): VyperType {
  const parts = splitTopLevel(inner)
  if (parts.length !== 2 || parts.some((part) => part === '')) {
    throw new TypeSyntaxError(
      `Expected ${vocabulary.arrayTag}[type, bound] but found '${text}'`,
      text
    )
  }

  const [element, boundText] = parts
  const bound: ArrayBound = INTEGER_LITERAL.test(boundText)
    ? { kind: 'literal', value: BigInt(boundText) }
    : { kind: 'constant', name: boundText }

  return { kind: 'dynarray', element: scalar(element), bound }
}

function parseTuple(text: string, inner: string, vocabulary: TypeVocabulary): VyperType {
  if (inner.trim() === '') {
    return { kind: 'tuple', members: [] }
  }

  const parts = splitTopLevel(inner)
  // (T,) is a one-element tuple
  if (parts.length > 1 && parts[parts.length - 1] === '') {
    parts.pop()
  }
  if (parts.some((part) => part === '')) {
    throw new TypeSyntaxError(`Empty tuple member in '${text}'`, text)
  }

  return { kind: 'tuple', members: parts.map((part) => parseTypeExpression(part, vocabulary)) }
}

/**
 * Collect every scalar name, element types included, that is outside the vocabulary
 */
export function validateType(type: VyperType, vocabulary: TypeVocabulary): TypeWarning[] {
  switch (type.kind) {
    case 'scalar':
      return isConformingScalar(type.name, vocabulary)
        ? []
        : [{ typeName: type.name, message: `'${type.name}' is not a valid Vyper type` }]
    case 'tuple':
      return type.members.flatMap((member) => validateType(member, vocabulary))
    case 'dynarray':
      return validateType(type.element, vocabulary)
  }
}

/**
 * Parse then validate a type expression
 * @throws TypeSyntaxError for malformed bracket syntax
 */
export function resolveType(expression: string, vocabulary: TypeVocabulary): Resolution {
  const type = parseTypeExpression(expression, vocabulary)
  return { type, warnings: validateType(type, vocabulary) }
}

/**
 * Wrap a whole expression as a scalar and validate it. Never throws.
 */
export function resolveScalar(expression: string, vocabulary: TypeVocabulary): Resolution<ScalarType> {
  const type = scalar(expression.trim())
  return { type, warnings: validateType(type, vocabulary) }
}

/**
 * Attach type warnings to the entity they were found on
 */
export function toDiagnostics(warnings: TypeWarning[], subject: string): Diagnostic[] {
  return warnings.map((w) => warning('non-conforming-type', subject, w.message))
}
