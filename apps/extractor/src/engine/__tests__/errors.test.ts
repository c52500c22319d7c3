import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import {
  ConfigurationError,
  ERROR_CODES,
  RenderError,
  classifyError,
  errorMessage,
} from '../errors.js'

describe('ConfigurationError', () => {
  it('lists every issue in its message', () => {
    const error = new ConfigurationError('Invalid field configuration', [
      { path: 'fields.0.name', message: 'field name is required' },
      { path: 'fields.1.strategies', message: 'at least one strategy is required' },
    ])
    expect(error.message).toBe(
      'Invalid field configuration\n' +
        '  - fields.0.name: field name is required\n' +
        '  - fields.1.strategies: at least one strategy is required'
    )
  })
})

describe('classifyError', () => {
  it('treats configuration errors as fatal', () => {
    expect(classifyError(new ConfigurationError('bad'))).toEqual({
      code: ERROR_CODES.CONFIGURATION_ERROR,
      message: 'bad',
      recoverable: false,
    })
  })

  it('treats zod failures as configuration errors', () => {
    const parsed = z.string().safeParse(1)
    expect(parsed.success).toBe(false)
    if (!parsed.success) {
      expect(classifyError(parsed.error)).toMatchObject({
        code: ERROR_CODES.CONFIGURATION_ERROR,
        recoverable: false,
      })
    }
  })

  it('treats render errors as recoverable', () => {
    const error = new RenderError('https://shop.example', 'HTTP 404: Not Found', { statusCode: 404 })
    expect(classifyError(error)).toEqual({
      code: ERROR_CODES.RENDER_FAILED,
      message: 'HTTP 404: Not Found',
      recoverable: true,
    })
  })

  it('recognises timeouts in plain errors', () => {
    expect(classifyError(new Error('socket timed out')).code).toBe(ERROR_CODES.RENDER_TIMEOUT)
  })

  it('falls back to unexpected', () => {
    expect(classifyError('boom')).toEqual({
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: 'boom',
      recoverable: false,
    })
  })
})

describe('errorMessage', () => {
  it('uses the name of an error without message', () => {
    expect(errorMessage(new TypeError())).toBe('TypeError')
  })
})
