import { describe, expect, it } from 'vitest'
import { assertValidXPath, evaluateXPath, loadXPathDocument } from '../xpath.js'

const HTML =
  '<html><body><h1> Title </h1><a href="/x" class="l">Link</a><ul><li>a</li><li>b</li></ul></body></html>'

describe('evaluateXPath', () => {
  const dom = loadXPathDocument(HTML)

  it('returns trimmed element text in document order', () => {
    expect(evaluateXPath(dom, '//li')).toEqual(['a', 'b'])
    expect(evaluateXPath(dom, '//h1')).toEqual(['Title'])
  })

  it('returns attribute values for attribute nodes', () => {
    expect(evaluateXPath(dom, '//a/@href')).toEqual(['/x'])
  })

  it('returns an empty list when nothing matches', () => {
    expect(evaluateXPath(dom, '//table')).toEqual([])
  })
})

describe('assertValidXPath', () => {
  it('accepts a valid expression', () => {
    expect(() => assertValidXPath('//div[@class="price"]/span')).not.toThrow()
  })

  it('names the expression it rejects', () => {
    expect(() => assertValidXPath('//div[')).toThrow("invalid XPath expression '//div['")
  })
})
