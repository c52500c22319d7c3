import type { CheerioAPI } from 'cheerio'
import type { JSDOM } from 'jsdom'
import { documentTitle, loadHtml, visibleText } from './kit/html.js'
import { loadXPathDocument } from './kit/xpath.js'

export interface PageContentInit {
  /** URL the content was requested for */
  url: string
  html: string
  /** URL after redirects, when the renderer knows it */
  finalUrl?: string
  /** Title reported by the renderer; read from `<title>` otherwise */
  title?: string
}

/**
 * Content of one rendered page.
 *
 * Parsed views are built on first use and cached: cheerio for CSS, attributes and text,
 * jsdom only when an XPath strategy asks for it. One instance serves one URL iteration.
 */
export class PageContent {
  readonly url: string
  readonly finalUrl: string
  readonly html: string
  private readonly reportedTitle?: string

  private cheerioDoc: CheerioAPI | null = null
  private xpathDoc: JSDOM | null = null
  private textCache: string | null = null

  constructor(init: PageContentInit) {
    this.url = init.url
    this.finalUrl = init.finalUrl ?? init.url
    this.html = init.html
    this.reportedTitle = init.title?.trim() || undefined
  }

  static fromHtml(url: string, html: string): PageContent {
    return new PageContent({ url, html })
  }

  get $(): CheerioAPI {
    if (!this.cheerioDoc) {
      this.cheerioDoc = loadHtml(this.html)
    }
    return this.cheerioDoc
  }

  get dom(): JSDOM {
    if (!this.xpathDoc) {
      this.xpathDoc = loadXPathDocument(this.html)
    }
    return this.xpathDoc
  }

  get text(): string {
    if (this.textCache === null) {
      this.textCache = visibleText(this.$)
    }
    return this.textCache
  }

  get title(): string | undefined {
    return this.reportedTitle ?? documentTitle(this.$)
  }

  /**
   * Release the jsdom window. A later XPath query parses the document again.
   */
  dispose(): void {
    this.xpathDoc?.window.close()
    this.xpathDoc = null
  }
}
