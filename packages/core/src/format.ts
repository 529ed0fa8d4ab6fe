/**
 * Type serialization back to source syntax
 */

import type { ArrayBound, VyperType } from './types.js';
import { DEFAULT_VOCABULARY, type TypeVocabulary } from './vocabulary.js';

export function formatBound(bound: ArrayBound): string {
  return bound.kind === 'literal' ? String(bound.value) : bound.name;
}

/**
 * Render a type the way it is written in source
 * @example formatType({ kind: 'tuple', members: [] }) // '()'
 */
export function formatType(type: VyperType, vocabulary: TypeVocabulary = DEFAULT_VOCABULARY): string {
  switch (type.kind) {
    case 'scalar':
      return type.name;
    case 'tuple':
      return `(${type.members.map((member) => formatType(member, vocabulary)).join(', ')})`;
    case 'dynarray':
      return `${vocabulary.arrayTag}[${type.element.name}, ${formatBound(type.bound)}]`;
  }
}

/**
 * Structural equality, ignoring whether a constant bound has been resolved
 */
export function typesEqual(a: VyperType, b: VyperType): boolean {
  if (a.kind === 'scalar' && b.kind === 'scalar') {
    return a.name === b.name;
  }
  if (a.kind === 'tuple' && b.kind === 'tuple') {
    return (
      a.members.length === b.members.length &&
      a.members.every((member, i) => typesEqual(member, b.members[i]))
    );
  }
  if (a.kind === 'dynarray' && b.kind === 'dynarray') {
    return (
      a.element.name === b.element.name &&
      a.bound.kind === b.bound.kind &&
      formatBound(a.bound) === formatBound(b.bound)
    );
  }
  return false;
}
