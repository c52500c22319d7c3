import { describe, expect, it } from 'vitest'
import { assembleRecord, foundRatio } from '../assembler.js'
import { PageContent } from '../page-content.js'
import type { FieldSpec } from '../types.js'

const PAGE_URL = 'https://shop.example/p/1'
const HTML =
  '<html><head><title>Widget Page</title></head><body><h1>Blue Widget</h1><p class="price">$19.99</p></body></html>'

const FIELDS: FieldSpec[] = [
  { name: 'Title', strategies: [{ kind: 'css', selector: 'h1' }], transforms: [] },
  {
    name: 'Price',
    strategies: [{ kind: 'css', selector: '.price' }],
    transforms: [{ kind: 'strip_chars', chars: '$' }, { kind: 'convert_to_number' }],
  },
  { name: 'Missing', strategies: [{ kind: 'css', selector: '.sku' }], transforms: [] },
]

const clock = () => new Date('2024-03-01T10:00:00.000Z')

describe('assembleRecord', () => {
  it('resolves every field in declaration order and adds metadata', () => {
    const record = assembleRecord(PAGE_URL, PageContent.fromHtml(PAGE_URL, HTML), FIELDS, {
      clock,
      renderer: 'http',
    })

    expect(Object.keys(record.values)).toEqual(['Title', 'Price', 'Missing'])
    expect(record.values).toEqual({ Title: 'Blue Widget', Price: 19.99, Missing: null })
    expect(record.meta).toEqual({
      sourceUrl: PAGE_URL,
      retrievedAt: '2024-03-01T10:00:00.000Z',
      pageTitle: 'Widget Page',
      renderer: 'http',
    })
    expect(record.foundCount).toBe(2)
  })

  it('gives equal records for the same page and clock', () => {
    const first = assembleRecord(PAGE_URL, PageContent.fromHtml(PAGE_URL, HTML), FIELDS, { clock })
    const second = assembleRecord(PAGE_URL, PageContent.fromHtml(PAGE_URL, HTML), FIELDS, { clock })
    expect(second).toEqual(first)
  })

  it('freezes the record', () => {
    const record = assembleRecord(PAGE_URL, PageContent.fromHtml(PAGE_URL, HTML), FIELDS, { clock })
    expect(Object.isFrozen(record)).toBe(true)
    expect(Object.isFrozen(record.values)).toBe(true)
    expect(Object.isFrozen(record.meta)).toBe(true)
  })

  it('omits the page title when the page has none', () => {
    const record = assembleRecord(PAGE_URL, PageContent.fromHtml(PAGE_URL, '<p>x</p>'), FIELDS, { clock })
    expect(record.meta).toEqual({ sourceUrl: PAGE_URL, retrievedAt: '2024-03-01T10:00:00.000Z' })
  })
})

describe('assembleRecord field names and URLs', () => {
  it('keeps a field named __proto__ as an own value', () => {
    const fields: FieldSpec[] = [
      { name: '__proto__', strategies: [{ kind: 'css', selector: 'h1' }], transforms: [] },
      { name: 'B', strategies: [{ kind: 'css', selector: 'title' }], transforms: [] },
    ]
    const record = assembleRecord(PAGE_URL, PageContent.fromHtml(PAGE_URL, HTML), fields, { clock })

    expect(Object.keys(record.values)).toEqual(['__proto__', 'B'])
    expect(record.values['__proto__']).toBe('Blue Widget')
    expect(Object.getPrototypeOf(record.values)).toBe(Object.prototype)
    expect(record.foundCount).toBe(2)
    expect(foundRatio(record)).toBe(1)
  })

  it('records the final URL only when it differs', () => {
    const redirected = new PageContent({
      url: PAGE_URL,
      html: HTML,
      finalUrl: 'https://shop.example/p/1?ref=home',
    })
    const record = assembleRecord(PAGE_URL, redirected, FIELDS, { clock })
    expect(record.meta.finalUrl).toBe('https://shop.example/p/1?ref=home')

    const direct = assembleRecord(PAGE_URL, PageContent.fromHtml(PAGE_URL, HTML), FIELDS, { clock })
    expect(direct.meta.finalUrl).toBeUndefined()
  })
})

describe('foundRatio', () => {
  it('is the share of fields with a value', () => {
    const record = assembleRecord(PAGE_URL, PageContent.fromHtml(PAGE_URL, HTML), FIELDS, { clock })
    expect(foundRatio(record)).toBeCloseTo(2 / 3)
  })

  it('is 0 without fields', () => {
    const record = assembleRecord(PAGE_URL, PageContent.fromHtml(PAGE_URL, HTML), [], { clock })
    expect(foundRatio(record)).toBe(0)
  })
})
