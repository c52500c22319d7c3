/**
 * Browser Renderer
 *
 * Chromium through Playwright. The browser is launched on first use and owned by this
 * instance until close(); each URL gets its own page, closed whatever happens.
 */

import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import { chromium, type Browser, type Page } from 'playwright-core'
import { noopLogger, type ILogger } from '@pagesift/logger'
import { ERROR_CODES, RenderError, errorMessage } from '../engine/errors.js'
import { indexedFileName } from '../engine/kit/url.js'
import { PageContent } from '../engine/page-content.js'
import {
  DEFAULT_BROWSER_OPTIONS,
  DEFAULT_FETCH_HEADERS,
  type BrowserRendererOptions,
  type Renderer,
} from './types.js'

const BROWSER_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
]

const DEFAULT_VIEWPORT = { width: 1920, height: 1080 }

/** The part of a Playwright page that selector waits need */
export interface SelectorWaiter {
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>
}

/**
 * Wait for each selector in turn, each with its own timeout. A selector that never appears
 * is logged and the next one is still awaited. Returns the selectors that were missing.
 */
export async function waitForSelectors(
  page: SelectorWaiter,
  selectors: readonly string[],
  timeoutMs: number,
  url: string,
  log: ILogger = noopLogger
): Promise<string[]> {
  const missing: string[] = []
  for (const selector of selectors) {
    try {
      await page.waitForSelector(selector, { timeout: timeoutMs })
    } catch (error) {
      missing.push(selector)
      log.warn('Wait selector not found, extracting anyway', {
        url,
        selector,
        reason: errorMessage(error),
      })
    }
  }
  return missing
}

export class BrowserRenderer implements Renderer {
  readonly name = 'browser'

  private readonly options: BrowserRendererOptions
  private readonly log: ILogger
  private browser: Browser | null = null
  private launching: Promise<Browser> | null = null
  private rendered = 0

  constructor(options: Partial<BrowserRendererOptions> = {}, log: ILogger = noopLogger) {
    this.options = { ...DEFAULT_BROWSER_OPTIONS, ...options }
    this.log = log
  }

  private async acquire(url: string): Promise<Browser> {
    if (this.browser) {
      return this.browser
    }
    if (!this.launching) {
      this.log.info('Launching browser', { headless: this.options.headless })
      this.launching = chromium.launch({ headless: this.options.headless, args: BROWSER_ARGS })
    }
    try {
      this.browser = await this.launching
      return this.browser
    } catch (error) {
      throw new RenderError(url, `Browser launch failed: ${errorMessage(error)}`, { cause: error })
    } finally {
      this.launching = null
    }
  }

  async render(url: string): Promise<PageContent> {
    const browser = await this.acquire(url)
    const context = await browser.newContext({
      viewport: DEFAULT_VIEWPORT,
      userAgent: DEFAULT_FETCH_HEADERS['User-Agent'],
    })
    const index = ++this.rendered

    try {
      const page = await context.newPage()
      await this.navigate(page, url)
      await this.waitForContent(page, url)

      if (this.options.screenshotDir) {
        await this.screenshot(page, url, index)
      }

      return new PageContent({
        url,
        html: await page.content(),
        finalUrl: page.url(),
        title: await page.title(),
      })
    } finally {
      await context.close()
    }
  }

  private async navigate(page: Page, url: string): Promise<void> {
    try {
      const response = await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.pageLoadTimeoutMs,
      })
      if (response && response.status() >= 400) {
        throw new RenderError(url, `HTTP ${response.status()}: ${response.statusText()}`, {
          statusCode: response.status(),
        })
      }
    } catch (error) {
      if (error instanceof RenderError) {
        throw error
      }
      const timedOut = error instanceof Error && error.name === 'TimeoutError'
      throw new RenderError(url, `Navigation failed: ${errorMessage(error)}`, {
        code: timedOut ? ERROR_CODES.RENDER_TIMEOUT : ERROR_CODES.RENDER_FAILED,
        cause: error,
      })
    }
  }

  /**
   * Wait for every configured selector, or settle for a fixed delay.
   */
  private async waitForContent(page: Page, url: string): Promise<void> {
    const selectors = this.options.waitForSelectors
    if (selectors.length === 0) {
      if (this.options.settleDelayMs > 0) {
        await page.waitForTimeout(this.options.settleDelayMs)
      }
      return
    }
    await waitForSelectors(page, selectors, this.options.waitTimeoutMs, url, this.log)
  }

  private async screenshot(page: Page, url: string, index: number): Promise<void> {
    const dir = this.options.screenshotDir
    if (!dir) return
    try {
      await mkdir(dir, { recursive: true })
      const path = join(dir, indexedFileName(url, index, 'png'))
      await page.screenshot({ path, fullPage: true })
      this.log.debug('Saved screenshot', { url, path })
    } catch (error) {
      this.log.warn('Screenshot failed', { url }, error)
    }
  }

  async close(): Promise<void> {
    const browser = this.browser
    this.browser = null
    if (browser) {
      await browser.close()
      this.log.info('Browser closed')
    }
  }
}
