/**
 * Scope Filter
 * Line-oriented scan separating module scope from function bodies
 *
 * The scan is a two-state machine:
 *
 *   outside-function --function-start--> inside-function
 *   inside-function  --blank-line------> outside-function
 *
 * A function starts at a decorator or `def` line. A blank line ends it, which
 * is the only block terminator a line scan can see. A function body that
 * contains a blank line (a blank line inside its docstring included) is
 * therefore treated as module scope from that line until the next function
 * start; declarations there are reported as module-level.
 */

import type { SourceFile } from './source.js'

export type ScopeState = 'outside-function' | 'inside-function'

export type ScopeTrigger = 'function-start' | 'blank-line'

export interface ScopeTransition {
  /** Zero-based line that fired the trigger */
  line: number
  trigger: ScopeTrigger
  from: ScopeState
  to: ScopeState
}

export interface ScopedLine {
  /** Zero-based line number */
  line: number
  /** Masked line text (comments and docstrings blanked) */
  text: string
}

export interface ModuleScope {
  /** Lines observed outside any function, in order */
  lines: ScopedLine[]
  /** State changes, in order */
  transitions: ScopeTransition[]
}

const NEXT_STATE: Record<ScopeTrigger, ScopeState> = {
  'function-start': 'inside-function',
  'blank-line': 'outside-function',
}

/**
 * Trigger fired by a line, if any
 */
export function classifyLine(rawLine: string, maskedLine: string): ScopeTrigger | null {
  if (rawLine.trim() === '') {
    return 'blank-line'
  }

  const code = maskedLine.trimStart()
  if (code.startsWith('@') || /^def\b/.test(code)) {
    return 'function-start'
  }

  return null
}

export function nextState(trigger: ScopeTrigger): ScopeState {
  return NEXT_STATE[trigger]
}

/**
 * Run the scan over a whole file
 */
export function scanModuleScope(source: SourceFile): ModuleScope {
  const lines: ScopedLine[] = []
  const transitions: ScopeTransition[] = []
  let state: ScopeState = 'outside-function'

  source.rawLines.forEach((rawLine, line) => {
    const trigger = classifyLine(rawLine, source.maskedLines[line])

    if (trigger) {
      const to = nextState(trigger)
      if (to !== state) {
        transitions.push({ line, trigger, from: state, to })
        state = to
      }
    }

    if (state === 'outside-function' && trigger !== 'blank-line') {
      lines.push({ line, text: source.maskedLines[line] })
    }
  })

  return { lines, transitions }
}
