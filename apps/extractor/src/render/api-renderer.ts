/**
 * API Renderer
 *
 * Calls a configured endpoint instead of loading the page. HTML responses are used as is;
 * JSON and other text responses are wrapped in a `<pre>` block so text patterns apply to them.
 */

import { ERROR_CODES, RenderError, errorMessage } from '../engine/errors.js'
import { PageContent } from '../engine/page-content.js'
import { DEFAULT_FETCH_LIMITS, type ApiEndpoint, type Renderer } from './types.js'

const PLACEHOLDER = /\{url\}/g

function expand(template: string, url: string, encode: boolean): string {
  const value = encode ? encodeURIComponent(url) : url
  return template.replace(PLACEHOLDER, () => value)
}

function expandBody(value: unknown, url: string): unknown {
  if (typeof value === 'string') {
    return expand(value, url, false)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandBody(item, url))
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, expandBody(item, url)])
    )
  }
  return value
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

export function buildApiRequest(
  endpoint: ApiEndpoint,
  pageUrl: string
): { url: string; init: RequestInit } {
  const target = new URL(expand(endpoint.url, pageUrl, true))
  for (const [key, value] of Object.entries(endpoint.params)) {
    target.searchParams.set(key, expand(value, pageUrl, false))
  }

  const headers: Record<string, string> = {
    Accept: 'application/json, text/html;q=0.9',
    ...endpoint.headers,
  }
  const init: RequestInit = { method: endpoint.method, headers }
  if (endpoint.method === 'POST' && endpoint.body !== undefined) {
    headers['Content-Type'] = 'application/json'
    init.body = JSON.stringify(expandBody(endpoint.body, pageUrl))
  }

  return { url: target.toString(), init }
}

/**
 * Page markup for an API response body.
 */
export function apiResponseToHtml(body: string, contentType: string): string {
  if (contentType.includes('html')) {
    return body
  }

  let text = body
  if (contentType.includes('json')) {
    try {
      text = JSON.stringify(JSON.parse(body), null, 2)
    } catch (error) {
      throw new Error(`Malformed JSON response: ${errorMessage(error)}`, { cause: error })
    }
  }
  return `<html><body><pre>${escapeHtml(text)}</pre></body></html>`
}

export class ApiRenderer implements Renderer {
  readonly name: string

  private readonly endpoint: ApiEndpoint
  private readonly timeoutMs: number

  constructor(endpoint: ApiEndpoint, options: { name?: string; timeoutMs?: number } = {}) {
    this.endpoint = endpoint
    this.name = options.name ?? 'api'
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_LIMITS.timeoutMs
  }

  async render(url: string): Promise<PageContent> {
    const request = buildApiRequest(this.endpoint, url)
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await fetch(request.url, { ...request.init, signal: controller.signal })
      if (!response.ok) {
        throw new RenderError(url, `API ${response.status}: ${response.statusText}`, {
          statusCode: response.status,
        })
      }

      const contentType = response.headers.get('content-type') ?? ''
      const html = apiResponseToHtml(await response.text(), contentType)
      return new PageContent({ url, html, finalUrl: request.url })
    } catch (error) {
      if (error instanceof RenderError) {
        throw error
      }
      const aborted = error instanceof Error && error.name === 'AbortError'
      throw new RenderError(url, `API request failed: ${errorMessage(error)}`, {
        code: aborted ? ERROR_CODES.RENDER_TIMEOUT : ERROR_CODES.RENDER_FAILED,
        cause: error,
      })
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
