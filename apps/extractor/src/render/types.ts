/**
 * Rendering collaborators
 *
 * A Renderer turns a URL into page content. The batch orchestrator only sees this interface;
 * browser sessions, HTTP clients and API endpoints live behind it.
 */

import { noopLogger, type ILogger } from '@pagesift/logger'
import type { PageContent } from '../engine/page-content.js'

export interface Renderer {
  /** Short name recorded on each record (`browser`, `http`, `api`) */
  readonly name: string

  /** Throws (usually RenderError) when no usable content could be produced */
  render(url: string): Promise<PageContent>

  /** Release sessions held by this renderer. Safe to call more than once. */
  close?(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 10000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [429, 500, 502, 503, 504]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
}

export interface FetchLimits {
  timeoutMs: number
  maxSizeBytes: number
}

export const DEFAULT_FETCH_LIMITS: FetchLimits = {
  timeoutMs: 30000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
}

// ═══════════════════════════════════════════════════════════════════════════════
// API endpoints
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Direct-fetch alternative to rendering. `url` may contain `{url}`, replaced by the
 * URI-encoded page URL; the same placeholder is expanded in params and string body values.
 */
export interface ApiEndpoint {
  url: string
  method: 'GET' | 'POST'
  headers: Record<string, string>
  params: Record<string, string>
  body?: Record<string, unknown>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Browser
// ═══════════════════════════════════════════════════════════════════════════════

export interface BrowserRendererOptions {
  headless: boolean
  pageLoadTimeoutMs: number
  /** Selectors to wait for after navigation; none found is logged, not fatal */
  waitForSelectors: string[]
  waitTimeoutMs: number
  /** Fixed pause after load when no wait selectors are configured */
  settleDelayMs: number
  /** Full-page screenshot per URL when set */
  screenshotDir?: string
}

export const DEFAULT_BROWSER_OPTIONS: BrowserRendererOptions = {
  headless: false,
  pageLoadTimeoutMs: 30000,
  waitForSelectors: [],
  waitTimeoutMs: 15000,
  settleDelayMs: 3000,
}

/**
 * Run `fn` with the renderers, then close every one of them, even when `fn` throws.
 * A renderer that fails to close is logged; the outcome of `fn` is kept.
 */
export async function withRenderers<T>(
  renderers: readonly Renderer[],
  fn: (renderers: readonly Renderer[]) => Promise<T>,
  log: ILogger = noopLogger
): Promise<T> {
  try {
    return await fn(renderers)
  } finally {
    const closing = await Promise.allSettled(renderers.map(renderer => renderer.close?.()))
    closing.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        log.warn('Renderer failed to close', { renderer: renderers[index]?.name }, outcome.reason)
      }
    })
  }
}
