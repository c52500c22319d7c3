export type Flags = Record<string, string | boolean>

/** Single-letter aliases for long flags */
export const SHORT_FLAGS: Record<string, string> = {
  c: 'config',
  f: 'fields',
  u: 'url',
  U: 'url-file',
  o: 'out',
  h: 'help',
}

function flagName(token: string, aliases: Record<string, string>): string | null {
  if (token.startsWith('--')) {
    return token.length > 2 ? token.slice(2) : null
  }
  if (/^-[A-Za-z]$/.test(token)) {
    return aliases[token.slice(1)] ?? token.slice(1)
  }
  return null
}

/**
 * `--name value` and `-n value` pairs; a flag without a value is `true`.
 * Values spanning several tokens are joined with a space.
 */
export function parseFlags(argv: string[], aliases: Record<string, string> = SHORT_FLAGS): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const key = flagName(argv[i], aliases)
    if (key === null) {
      continue
    }

    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && flagName(argv[j], aliases) === null) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}
