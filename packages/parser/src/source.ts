/**
 * Source text preparation
 * Masks comments and docstrings so structural scans only see code
 */

const TRIPLE_QUOTES = ['"""', "'''"] as const

/**
 * One contract file, raw and masked
 *
 * `masked` has the same length and line breaks as `raw`, so an offset or line
 * number found in one is valid in the other.
 */
export interface SourceFile {
  raw: string
  masked: string
  rawLines: string[]
  maskedLines: string[]
  /** Offset of the first character of each line */
  lineOffsets: number[]
}

/**
 * Replace comments, triple-quoted blocks and the contents of single-line
 * string literals with spaces, keeping newlines and literal quotes.
 *
 * @example maskSource('x: uint8  # note') // 'x: uint8        '
 * @example maskSource('s: String[4] = ")"') // 's: String[4] = " "'
 */
export function maskSource(raw: string): string {
  let masked = ''
  let i = 0

  while (i < raw.length) {
    const ch = raw[i]

    if (ch === '#') {
      const end = lineEnd(raw, i)
      masked += ' '.repeat(end - i)
      i = end
      continue
    }

    if (ch === '"' || ch === "'") {
      const delimiter = ch.repeat(3)
      if (raw.startsWith(delimiter, i)) {
        const close = raw.indexOf(delimiter, i + 3)
        const end = close === -1 ? raw.length : close + 3
        masked += blank(raw.slice(i, end))
        i = end
        continue
      }

      // Single-line literal: quotes kept, contents blanked
      let j = i + 1
      while (j < raw.length && raw[j] !== ch && raw[j] !== '\n') {
        j += raw[j] === '\\' && raw[j + 1] !== '\n' ? 2 : 1
      }
      const closed = j < raw.length && raw[j] === ch
      const contentEnd = Math.min(j, raw.length)
      masked += ch + blank(raw.slice(i + 1, contentEnd)) + (closed ? ch : '')
      i = closed ? j + 1 : contentEnd
      continue
    }

    masked += ch
    i++
  }

  return masked
}

/**
 * Build the raw/masked pair for a file's text
 */
export function createSourceFile(text: string): SourceFile {
  const raw = text.replace(/\r\n?/g, '\n')
  const masked = maskSource(raw)
  const rawLines = raw.split('\n')

  const lineOffsets: number[] = []
  let offset = 0
  for (const line of rawLines) {
    lineOffsets.push(offset)
    offset += line.length + 1
  }

  return { raw, masked, rawLines, maskedLines: masked.split('\n'), lineOffsets }
}

/**
 * Raw text between two offsets, trimmed where the masked text is blank so
 * that a trailing comment is left out
 */
export function originalText(source: SourceFile, start: number, end: number): string {
  let from = start
  let to = end
  while (from < to && /\s/.test(source.masked[from])) {
    from++
  }
  while (to > from && /\s/.test(source.masked[to - 1])) {
    to--
  }

  return source.raw.slice(from, to)
}

/**
 * Zero-based line number containing an offset
 */
export function lineOf(source: SourceFile, offset: number): number {
  let low = 0
  let high = source.lineOffsets.length - 1

  while (low < high) {
    const mid = (low + high + 1) >> 1
    if (source.lineOffsets[mid] <= offset) {
      low = mid
    } else {
      high = mid - 1
    }
  }

  return low
}

/**
 * Skip whitespace and comment lines in raw text
 */
export function skipTrivia(raw: string, from: number): number {
  let i = from

  while (i < raw.length) {
    if (/\s/.test(raw[i])) {
      i++
    } else if (raw[i] === '#') {
      i = lineEnd(raw, i)
    } else {
      break
    }
  }

  return i
}

/**
 * Read the triple-quoted block starting exactly at `offset`, if there is one
 */
export function readDocstringAt(raw: string, offset: number): string | null {
  const delimiter = TRIPLE_QUOTES.find((quotes) => raw.startsWith(quotes, offset))
  if (!delimiter) {
    return null
  }

  const close = raw.indexOf(delimiter, offset + 3)
  if (close === -1) {
    return null
  }

  const docstring = cleanDocstring(raw.slice(offset + 3, close))
  return docstring === '' ? null : docstring
}

/**
 * Remove the common indentation of continuation lines and trim blank edges
 *
 * @example cleanDocstring('\n    Transfer tokens.\n    ') // 'Transfer tokens.'
 */
export function cleanDocstring(body: string): string {
  const lines = body.split('\n')
  const continuation = lines.slice(1).filter((line) => line.trim() !== '')
  const indent = continuation.length
    ? Math.min(...continuation.map((line) => line.length - line.trimStart().length))
    : 0

  const cleaned = [lines[0].trim(), ...lines.slice(1).map((line) => line.slice(indent).trimEnd())]

  while (cleaned.length && cleaned[0] === '') {
    cleaned.shift()
  }
  while (cleaned.length && cleaned[cleaned.length - 1] === '') {
    cleaned.pop()
  }

  return cleaned.join('\n')
}

function lineEnd(text: string, from: number): number {
  const newline = text.indexOf('\n', from)
  return newline === -1 ? text.length : newline
}

function blank(text: string): string {
  return text.replace(/[^\n]/g, ' ')
}
