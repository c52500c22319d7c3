/** Flags used when a text pattern does not set its own: case-insensitive, dot matches newline */
export const DEFAULT_PATTERN_FLAGS = 'is'

/**
 * Number of capturing groups (named ones included) declared by a compiled regex.
 * An alternation with the empty pattern always matches, exposing every group slot.
 */
export function countCaptureGroups(regex: RegExp): number {
  const withEmpty = new RegExp(`${regex.source}|`, regex.flags.replace(/[gy]/g, ''))
  const match = withEmpty.exec('')
  return match ? match.length - 1 : 0
}

export function compilePattern(pattern: string, flags: string = DEFAULT_PATTERN_FLAGS): RegExp {
  // Matching always starts from the beginning of the text
  return new RegExp(pattern, flags.replace(/[gy]/g, ''))
}

/**
 * First match's sole capture group, trimmed. `null` on no match or an empty capture.
 */
export function matchPattern(text: string, regex: RegExp): string | null {
  const match = regex.exec(text)
  const captured = match?.[1]?.trim()
  return captured ? captured : null
}
