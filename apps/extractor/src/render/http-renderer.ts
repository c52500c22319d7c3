/**
 * HTTP Renderer
 *
 * Plain GET with native fetch, no script execution. Supports timeout, size limit,
 * retries with exponential backoff and a blocked-page heuristic.
 * Every non-ok outcome throws a RenderError.
 */

import { ERROR_CODES, RenderError, errorMessage } from '../engine/errors.js'
import { PageContent } from '../engine/page-content.js'
import {
  DEFAULT_FETCH_HEADERS,
  DEFAULT_FETCH_LIMITS,
  DEFAULT_RETRY_POLICY,
  type FetchLimits,
  type Renderer,
  type RetryPolicy,
} from './types.js'

export interface HttpRendererOptions {
  retryPolicy?: RetryPolicy
  limits?: Partial<FetchLimits>
  headers?: Record<string, string>
}

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
  'bot detection',
  'rate limit',
]

export function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase()
  return BLOCK_INDICATORS.some(indicator => lowerHtml.includes(indicator))
}

export class HttpRenderer implements Renderer {
  readonly name = 'http'

  private readonly retryPolicy: RetryPolicy
  private readonly limits: FetchLimits
  private readonly headers: Record<string, string>

  constructor(options: HttpRendererOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.limits = { ...DEFAULT_FETCH_LIMITS, ...options.limits }
    this.headers = { ...DEFAULT_FETCH_HEADERS, ...options.headers }
  }

  async render(url: string): Promise<PageContent> {
    let lastError: RenderError | null = null

    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      try {
        return await this.fetchOnce(url)
      } catch (error) {
        lastError =
          error instanceof RenderError
            ? error
            : new RenderError(url, `Request failed: ${errorMessage(error)}`, { cause: error })

        if (!this.isRetryable(lastError) || attempt >= this.retryPolicy.maxAttempts) {
          throw lastError
        }
        await this.sleep(this.backoffDelay(attempt))
      }
    }

    throw lastError ?? new RenderError(url, 'Unknown error after retries')
  }

  private isRetryable(error: RenderError): boolean {
    if (error.code === ERROR_CODES.RENDER_BLOCKED) {
      return false
    }
    // Network errors carry no status code
    if (error.statusCode === undefined) {
      return true
    }
    return this.retryPolicy.retryableStatusCodes.includes(error.statusCode)
  }

  private backoffDelay(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(url: string): Promise<PageContent> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.limits.timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      // Blocked responses (403, 503 with captcha indicators)
      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (looksLikeBlockedPage(text)) {
          throw new RenderError(url, 'Request blocked (captcha or access denied)', {
            code: ERROR_CODES.RENDER_BLOCKED,
            statusCode: response.status,
          })
        }
      }

      if (!response.ok) {
        throw new RenderError(url, `HTTP ${response.status}: ${response.statusText}`, {
          statusCode: response.status,
        })
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > this.limits.maxSizeBytes) {
        throw new RenderError(url, `Response too large: ${contentLength} bytes`, {
          statusCode: response.status,
        })
      }

      const html = await this.readBodyWithLimit(response, this.limits.maxSizeBytes)
      if (html === null) {
        throw new RenderError(url, 'Response exceeded size limit', { statusCode: response.status })
      }

      return new PageContent({ url, html, finalUrl: response.url || url })
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RenderError(url, `Request timed out after ${this.limits.timeoutMs}ms`, {
          code: ERROR_CODES.RENDER_TIMEOUT,
          cause: error,
        })
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}
