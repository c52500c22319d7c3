/**
 * Error taxonomy for extraction runs.
 *
 * ConfigurationError is fatal and raised before any URL is processed.
 * RenderError and ExportError are recovered at their URL / format boundary.
 * Transform failures are result values (see TransformResult), never thrown.
 */

import { ZodError } from 'zod'

export const ERROR_CODES = {
  // Configuration (fatal, load time)
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INVALID_SELECTOR: 'INVALID_SELECTOR',
  INVALID_XPATH: 'INVALID_XPATH',
  INVALID_PATTERN: 'INVALID_PATTERN',
  CAPTURE_GROUP_COUNT: 'CAPTURE_GROUP_COUNT',
  DUPLICATE_FIELD: 'DUPLICATE_FIELD',
  CONFIG_FILE_UNREADABLE: 'CONFIG_FILE_UNREADABLE',

  // Per URL
  RENDER_FAILED: 'RENDER_FAILED',
  RENDER_TIMEOUT: 'RENDER_TIMEOUT',
  RENDER_BLOCKED: 'RENDER_BLOCKED',

  // Per format
  EXPORT_FAILED: 'EXPORT_FAILED',

  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export interface ConfigurationIssue {
  /** Dotted path into the loaded document, e.g. `fields.2.strategies.0.pattern` */
  path: string
  message: string
  code?: ErrorCode
}

export class PageSiftError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PageSiftError'
    this.code = code
  }
}

export class ConfigurationError extends PageSiftError {
  readonly issues: ConfigurationIssue[]

  constructor(
    message: string,
    issues: ConfigurationIssue[] = [],
    code: ErrorCode = ERROR_CODES.CONFIGURATION_ERROR
  ) {
    const detail = issues.length > 0 ? `\n${issues.map(i => `  - ${i.path}: ${i.message}`).join('\n')}` : ''
    super(code, `${message}${detail}`)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

export class RenderError extends PageSiftError {
  readonly url: string
  readonly statusCode?: number

  constructor(
    url: string,
    message: string,
    options: { code?: ErrorCode; statusCode?: number; cause?: unknown } = {}
  ) {
    super(options.code ?? ERROR_CODES.RENDER_FAILED, message, { cause: options.cause })
    this.name = 'RenderError'
    this.url = url
    this.statusCode = options.statusCode
  }
}

export class ExportError extends PageSiftError {
  readonly format: string

  constructor(format: string, message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.EXPORT_FAILED, message, options)
    this.name = 'ExportError'
    this.format = format
  }
}

export interface ClassifiedError {
  code: ErrorCode
  message: string
  /** Recovered at a URL or format boundary; only configuration errors stop a run */
  recoverable: boolean
}

/**
 * Convert a zod failure into a ConfigurationError listing every issue with its path.
 */
export function configurationErrorFromZod(message: string, error: ZodError): ConfigurationError {
  return new ConfigurationError(
    message,
    error.issues.map(issue => ({
      path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
      message: issue.message,
    }))
  )
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name
  }
  return String(error)
}

/**
 * Classify any thrown value for logging and exit codes.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ConfigurationError) {
    return { code: error.code, message: error.message, recoverable: false }
  }

  if (error instanceof ZodError) {
    return {
      code: ERROR_CODES.CONFIGURATION_ERROR,
      message: configurationErrorFromZod('Validation failed', error).message,
      recoverable: false,
    }
  }

  if (error instanceof PageSiftError) {
    return { code: error.code, message: error.message, recoverable: true }
  }

  if (error instanceof Error) {
    const lower = error.message.toLowerCase()
    if (error.name === 'TimeoutError' || lower.includes('timeout') || lower.includes('timed out')) {
      return { code: ERROR_CODES.RENDER_TIMEOUT, message: error.message, recoverable: true }
    }
    return { code: ERROR_CODES.UNEXPECTED_ERROR, message: errorMessage(error), recoverable: false }
  }

  return { code: ERROR_CODES.UNEXPECTED_ERROR, message: String(error), recoverable: false }
}
