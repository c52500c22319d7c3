import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import * as yaml from 'js-yaml'
import { ConfigurationError, ERROR_CODES, errorMessage } from '../errors.js'
import { safeJsonParse } from './json.js'

export type DocumentFormat = 'yaml' | 'json'

export function documentFormatForPath(path: string): DocumentFormat {
  const ext = extname(path).toLowerCase()
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json'
}

export function parseDocument(source: string, format: DocumentFormat, label: string): unknown {
  if (format === 'json') {
    const parsed = safeJsonParse(source)
    if (!parsed.ok) {
      throw new ConfigurationError(`${label} is not valid JSON: ${parsed.error}`)
    }
    return parsed.value
  }

  try {
    return yaml.load(source)
  } catch (error) {
    throw new ConfigurationError(`${label} is not valid YAML: ${errorMessage(error)}`)
  }
}

/**
 * Read a YAML (`.yaml`, `.yml`) or JSON document from disk.
 */
export function readConfigDocument(path: string): unknown {
  let source: string
  try {
    source = readFileSync(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read ${path}: ${errorMessage(error)}`,
      [],
      ERROR_CODES.CONFIG_FILE_UNREADABLE
    )
  }
  return parseDocument(source, documentFormatForPath(path), path)
}
