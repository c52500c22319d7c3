import { readFile } from 'node:fs/promises'
import { ConfigurationError, ERROR_CODES, errorMessage } from '../engine/errors.js'

/**
 * One URL per line. Lines are trimmed; blank lines and `#` comments are skipped.
 * Duplicates are kept.
 */
export function parseUrlList(source: string): string[] {
  return source
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '' && !line.startsWith('#'))
}

export async function readUrlFile(path: string): Promise<string[]> {
  let source: string
  try {
    source = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read URL file ${path}: ${errorMessage(error)}`,
      [],
      ERROR_CODES.CONFIG_FILE_UNREADABLE
    )
  }
  return parseUrlList(source)
}
