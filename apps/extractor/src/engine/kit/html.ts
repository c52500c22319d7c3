import * as cheerio from 'cheerio'
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler'

/** Elements whose text is never part of the page's visible text */
const NON_CONTENT_TAGS = new Set(['script', 'style', 'noscript', 'template'])

// Shared scratch document for selector syntax checks
let scratch: cheerio.CheerioAPI | null = null

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/**
 * Trimmed text of every element matching `selector`, in document order.
 * `find` keeps strings like `<div>` from being parsed as markup.
 */
export function selectTexts($: cheerio.CheerioAPI, selector: string): string[] {
  return $.root()
    .find(selector)
    .toArray()
    .map(element => $(element).text().trim())
}

/**
 * Trimmed `attr` value of every element matching `selector` that carries it.
 */
export function selectAttrs($: cheerio.CheerioAPI, selector: string, attr: string): string[] {
  const values: string[] = []
  for (const element of $.root().find(selector).toArray()) {
    const value = $(element).attr(attr)
    if (value !== undefined) {
      values.push(value.trim())
    }
  }
  return values
}

function collectText(node: AnyNode, pieces: string[]): void {
  if (isText(node)) {
    pieces.push(node.data)
    return
  }
  if (isTag(node) && NON_CONTENT_TAGS.has(node.name)) {
    return
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, pieces)
    }
  }
}

/**
 * Visible text of the document: every text node joined with a newline.
 * Block boundaries stay line boundaries, so `[^\n]+` style patterns stop at them.
 */
export function visibleText($: cheerio.CheerioAPI): string {
  const pieces: string[] = []
  for (const node of $.root().toArray()) {
    collectText(node, pieces)
  }
  return pieces.join('\n')
}

export function documentTitle($: cheerio.CheerioAPI): string | undefined {
  const value = $('title').first().text().trim()
  return value || undefined
}

/**
 * Throws when `selector` is not valid CSS. Parsing and compiling happen on first match,
 * so the scratch document carries one element to match against.
 */
export function assertValidSelector(selector: string): void {
  if (!scratch) {
    scratch = cheerio.load('<html><body><div></div></body></html>')
  }
  scratch.root().find(selector)
}
