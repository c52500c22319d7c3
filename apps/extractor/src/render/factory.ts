import type { ILogger } from '@pagesift/logger'
import type { RunConfig } from '../config/run-config.js'
import { ConfigurationError } from '../engine/errors.js'
import { ApiRenderer } from './api-renderer.js'
import { BrowserRenderer } from './browser-renderer.js'
import { HttpRenderer } from './http-renderer.js'
import type { Renderer } from './types.js'

/**
 * Renderers in fallback order: browser, HTTP, then each API endpoint.
 */
export function createRenderers(config: RunConfig, log: ILogger): Renderer[] {
  const renderers: Renderer[] = []

  if (config.useBrowser) {
    renderers.push(
      new BrowserRenderer(
        {
          headless: config.headless,
          pageLoadTimeoutMs: config.pageLoadTimeoutMs,
          waitForSelectors: config.waitCssSelectors,
          waitTimeoutMs: config.waitMs,
          settleDelayMs: config.sleepAfterLoadMs,
          screenshotDir: config.screenshotsDir,
        },
        log.child('browser')
      )
    )
  }

  if (config.httpFallback) {
    renderers.push(new HttpRenderer({ limits: { timeoutMs: config.pageLoadTimeoutMs } }))
  }

  config.apiEndpoints.forEach((endpoint, index) => {
    const name = config.apiEndpoints.length > 1 ? `api:${index + 1}` : 'api'
    renderers.push(new ApiRenderer(endpoint, { name, timeoutMs: config.pageLoadTimeoutMs }))
  })

  if (renderers.length === 0) {
    throw new ConfigurationError('No renderer enabled', [
      {
        path: 'use_browser',
        message: 'enable use_browser or http_fallback, or configure api_endpoints',
      },
    ])
  }

  return renderers
}
