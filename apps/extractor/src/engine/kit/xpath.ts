import { JSDOM } from 'jsdom'

// jsdom node type constants (DOM Level 1)
const ELEMENT_NODE = 1
const ATTRIBUTE_NODE = 2

let scratch: JSDOM | null = null

export function loadXPathDocument(html: string, url?: string): JSDOM {
  return new JSDOM(html, url ? { url } : undefined)
}

function nodeValue(node: Node): string {
  if (node.nodeType === ATTRIBUTE_NODE) {
    return (node.nodeValue ?? '').trim()
  }
  if (node.nodeType === ELEMENT_NODE) {
    return (node.textContent ?? '').trim()
  }
  return (node.textContent ?? node.nodeValue ?? '').trim()
}

function isScalarResultError(error: unknown): boolean {
  // XPathException TYPE_ERR (52): the expression evaluated to a string, number or boolean
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 52
}

/**
 * Evaluate `expression` against the document.
 * Node-sets give one string per node in document order; scalar results give one string.
 */
export function evaluateXPath(dom: JSDOM, expression: string): string[] {
  const { document, XPathResult } = dom.window

  let snapshot: XPathResult
  try {
    snapshot = document.evaluate(
      expression,
      document,
      null,
      XPathResult.ORDERED_NODE_SNAPSHOT_TYPE,
      null
    )
  } catch (error) {
    if (!isScalarResultError(error)) {
      throw error
    }
    const scalar = document.evaluate(expression, document, null, XPathResult.STRING_TYPE, null)
    return [scalar.stringValue.trim()]
  }

  const values: string[] = []
  for (let i = 0; i < snapshot.snapshotLength; i++) {
    const node = snapshot.snapshotItem(i)
    if (node) {
      values.push(nodeValue(node))
    }
  }
  return values
}

/**
 * Throws when `expression` is not valid XPath.
 */
export function assertValidXPath(expression: string): void {
  if (!scratch) {
    scratch = new JSDOM('<!DOCTYPE html><html><body></body></html>')
  }
  const { document, XPathResult } = scratch.window
  try {
    document.evaluate(expression, document, null, XPathResult.ANY_TYPE, null)
  } catch (error) {
    // jsdom's XPathException carries no message
    throw new Error(`invalid XPath expression '${expression}'`, { cause: error })
  }
}
