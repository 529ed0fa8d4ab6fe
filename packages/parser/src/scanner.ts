/**
 * Structural scanning helpers
 * Bracket-aware splitting and declaration block boundaries
 */

import { TypeSyntaxError } from './errors.js'
import { lineOf, type SourceFile } from './source.js'

const CLOSING: Record<string, string> = { '(': ')', '[': ']', '{': '}' }
const OPENING: Record<string, string> = { ')': '(', ']': '[', '}': '{' }

/**
 * Declaration header such as `struct Point` or `event Transfer`
 */
export interface DeclarationHeader {
  keyword: string
  name: string
  /** Width of the header line's indentation */
  indent: number
  /** Zero-based line of the header */
  line: number
  /** Offset just past the declared name */
  nameEnd: number
}

export type BodyForm = 'brace' | 'paren' | 'indent'

export type DeclarationBody =
  | { status: 'ok'; form: BodyForm; text: string; lastLine: number }
  | { status: 'unterminated'; form: BodyForm }

/**
 * Index of the delimiter closing the one at `openIndex`, or -1.
 * Only the opener's own kind is counted, so a stray bracket of another kind
 * inside the span does not hide the closer.
 */
export function findMatchingDelimiter(text: string, openIndex: number): number {
  const open = text[openIndex]
  const close = CLOSING[open]
  if (!close) {
    return -1
  }

  let depth = 0
  for (let i = openIndex; i < text.length; i++) {
    if (text[i] === open) {
      depth++
    } else if (text[i] === close) {
      depth--
      if (depth === 0) {
        return i
      }
    }
  }

  return -1
}

/**
 * Check that every bracket is closed by its own kind, in order
 */
export function isBalanced(text: string): boolean {
  const stack: string[] = []

  for (const ch of text) {
    if (CLOSING[ch]) {
      stack.push(ch)
    } else if (OPENING[ch]) {
      if (stack.pop() !== OPENING[ch]) {
        return false
      }
    }
  }

  return stack.length === 0
}

/**
 * Split on commas outside any bracket. Pieces are trimmed and may be empty.
 *
 * @throws TypeSyntaxError when the brackets are unbalanced
 * @example splitTopLevel('DynArray[uint8, 3], bool') // ['DynArray[uint8, 3]', 'bool']
 */
export function splitTopLevel(text: string): string[] {
  if (!isBalanced(text)) {
    throw new TypeSyntaxError(`Unbalanced brackets in '${text.trim()}'`, text)
  }

  const pieces: string[] = []
  let depth = 0
  let start = 0

  for (let i = 0; i < text.length; i++) {
    const ch = text[i]
    if (CLOSING[ch]) {
      depth++
    } else if (OPENING[ch]) {
      depth--
    } else if (ch === ',' && depth === 0) {
      pieces.push(text.slice(start, i).trim())
      start = i + 1
    }
  }
  pieces.push(text.slice(start).trim())

  return pieces
}

/**
 * Offsets of one entry within a field list, surrounding whitespace included
 */
export interface FieldSpan {
  start: number
  end: number
}

/**
 * Locate the entries of a field or parameter list.
 *
 * Commas and newlines separate entries outside brackets. Unlike
 * `splitTopLevel` this never throws: a stray closer counts as text and an
 * unclosed opener keeps the rest of the list in one entry, which then fails
 * on its own when its type is resolved. Blank entries are left out.
 */
export function fieldSpans(text: string): FieldSpan[] {
  const spans: FieldSpan[] = []
  let depth = 0
  let start = 0

  for (let i = 0; i < text.length; i++) {
    const ch = text[i]
    if (CLOSING[ch]) {
      depth++
    } else if (OPENING[ch] && depth > 0) {
      depth--
    } else if ((ch === ',' || ch === '\n') && depth === 0) {
      spans.push({ start, end: i })
      start = i + 1
    }
  }
  spans.push({ start, end: text.length })

  return spans.filter((span) => text.slice(span.start, span.end).trim() !== '')
}

/**
 * Split a field or parameter list into trimmed entries
 *
 * @example splitFieldList('to: address,\n amount: uint256') // ['to: address', 'amount: uint256']
 */
export function splitFieldList(text: string): string[] {
  return fieldSpans(text).map(({ start, end }) => text.slice(start, end).trim())
}

/**
 * Index of the first `target` character outside brackets, or -1
 */
export function indexOfTopLevel(text: string, target: string, from = 0): number {
  let depth = 0

  for (let i = from; i < text.length; i++) {
    const ch = text[i]
    if (ch === target && depth === 0) {
      return i
    }
    if (CLOSING[ch]) {
      depth++
    } else if (OPENING[ch] && depth > 0) {
      depth--
    }
  }

  return -1
}

/**
 * Find declaration headers (`<keyword> <Name>`) that begin a line
 */
export function findDeclarations(source: SourceFile, keywords: string[]): DeclarationHeader[] {
  const pattern = new RegExp(`^([ \\t]*)(${keywords.join('|')})[ \\t]+([A-Za-z_]\\w*)`, 'gm')
  const headers: DeclarationHeader[] = []

  for (const match of source.masked.matchAll(pattern)) {
    const start = match.index ?? 0
    headers.push({
      keyword: match[2],
      name: match[3],
      indent: match[1].length,
      line: lineOf(source, start),
      nameEnd: start + match[0].length,
    })
  }

  return headers
}

/**
 * Read the body following a declaration header.
 *
 * Bodies are `{ ... }`, `( ... )` (legacy events, optional inner braces) or a
 * colon followed by lines indented deeper than the header. An indented body
 * ends at the first blank line or dedent; comment-only lines are skipped.
 * Returns null when no body marker follows the name.
 */
export function readDeclarationBody(source: SourceFile, header: DeclarationHeader): DeclarationBody | null {
  const { masked } = source
  let i = header.nameEnd
  while (masked[i] === ' ' || masked[i] === '\t') {
    i++
  }

  const marker = masked[i]

  if (marker === '{' || marker === '(') {
    const form: BodyForm = marker === '{' ? 'brace' : 'paren'
    const close = findMatchingDelimiter(masked, i)
    if (close === -1) {
      return { status: 'unterminated', form }
    }

    let text = masked.slice(i + 1, close).trim()
    if (form === 'paren' && text.startsWith('{') && findMatchingDelimiter(text, 0) === text.length - 1) {
      text = text.slice(1, -1)
    }

    return { status: 'ok', form, text, lastLine: lineOf(source, close) }
  }

  if (marker === ':') {
    const lines: string[] = []
    const inline = masked.slice(i + 1, source.lineOffsets[header.line] + source.maskedLines[header.line].length).trim()
    if (inline !== '') {
      lines.push(inline)
    }

    let lastLine = header.line
    for (let n = header.line + 1; n < source.rawLines.length; n++) {
      const code = source.maskedLines[n]
      if (source.rawLines[n].trim() === '') {
        break
      }
      if (code.trim() === '') {
        continue
      }
      if (indentOf(code) <= header.indent) {
        break
      }
      lines.push(code.trim())
      lastLine = n
    }

    return { status: 'ok', form: 'indent', text: lines.join('\n'), lastLine }
  }

  return null
}

export function indentOf(line: string): number {
  return line.length - line.trimStart().length
}
