import { describe, expect, it } from 'vitest'
import {
  PageContent,
  assembleRecord,
  loadFieldConfig,
  exportColumns,
} from '../index.js'

const PRODUCT_PAGE = `<html>
<head>
  <title>Trail Lantern</title>
  <meta property="og:title" content="Trail Lantern 300" />
</head>
<body>
  <div class="product" data-sku="TL-300">
    <span itemprop="price">$1,249.00</span>
    <p class="stock-status">In
      Stock</p>
    <table class="specs"><tr><th>Weight</th><td>1.2 kg</td></tr></table>
  </div>
</body>
</html>`

describe('public entry point', () => {
  it('extracts the bundled sample fields from a product page', () => {
    const url = 'https://shop.example/lantern'
    const record = assembleRecord(url, PageContent.fromHtml(url, PRODUCT_PAGE), loadFieldConfig(), {
      clock: () => new Date('2024-03-01T10:00:00.000Z'),
    })

    expect(record.values).toEqual({
      'Product Name': 'Trail Lantern 300',
      Price: 1249,
      SKU: 'TL-300',
      Availability: 'In Stock',
      Weight: '1.2 kg',
    })
    expect(record.foundCount).toBe(5)
    expect(exportColumns(['Price'])).toEqual(['Price', 'source_url', 'retrieved_at', 'page_title'])
  })
})
