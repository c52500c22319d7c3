/**
 * Transform pipeline: ordered cleaning steps over one raw candidate.
 */

import type { TransformResult, TransformStep } from './types.js'

// Commas sitting between digit groups: "1,234,567.8" -> "1234567.8"
const THOUSANDS_SEPARATOR = /(?<=\d),(?=\d{3}(?:\D|$))/g
const NUMERIC = /[-+]?\d*\.?\d+/

function escapeCharClass(chars: string): string {
  return chars.replace(/[\\\]^-]/g, '\\$&')
}

export function stripChars(value: string, chars?: string): string {
  if (chars === undefined) {
    return value.trim()
  }
  if (chars === '') {
    return value
  }
  const set = escapeCharClass(chars)
  return value.replace(new RegExp(`^[${set}]+|[${set}]+$`, 'gu'), '')
}

export function regexSubstitute(value: string, pattern: string, replacement: string): string {
  return value.replace(new RegExp(pattern, 'g'), replacement)
}

/**
 * Locale-agnostic numeric parse: thousands separators dropped, first number taken.
 */
export function parseNumber(value: string): number | null {
  const match = NUMERIC.exec(value.replace(THOUSANDS_SEPARATOR, ''))
  if (!match) {
    return null
  }
  const parsed = Number.parseFloat(match[0])
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * Run `steps` in order. Load-time validation guarantees `convert_to_number` is last.
 * A chain that cleans the candidate down to blank text fails with `EMPTY_RESULT`.
 */
export function applyTransforms(raw: string, steps: readonly TransformStep[]): TransformResult {
  let current = raw

  for (const [index, step] of steps.entries()) {
    switch (step.kind) {
      case 'regex_substitute':
        current = regexSubstitute(current, step.pattern, step.replacement)
        break
      case 'strip_chars':
        current = stripChars(current, step.chars)
        break
      case 'convert_to_number': {
        const parsed = parseNumber(current)
        if (parsed === null) {
          return { ok: false, failure: { reason: 'NOT_NUMERIC', step: index, input: current } }
        }
        return { ok: true, value: parsed }
      }
    }
  }

  if (steps.length > 0 && current.trim() === '') {
    return { ok: false, failure: { reason: 'EMPTY_RESULT', step: steps.length - 1, input: raw } }
  }
  return { ok: true, value: current }
}
