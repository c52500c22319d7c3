import { describe, expect, it } from 'vitest'
import { describeStrategy, evaluateStrategy } from '../evaluators.js'
import { PageContent } from '../page-content.js'

const HTML = `<html><head><title>Catalog</title></head><body>
<div class="item" data-id="7"><b>Weight:</b> 2.5 kg</div>
<a href="/next">Next</a>
</body></html>`

describe('PageContent', () => {
  it('defaults the final URL to the requested one', () => {
    const page = PageContent.fromHtml('https://shop.example/a', HTML)
    expect(page.finalUrl).toBe('https://shop.example/a')
  })

  it('prefers a reported title over <title>', () => {
    const page = new PageContent({ url: 'https://shop.example/a', html: HTML, title: ' Reported ' })
    expect(page.title).toBe('Reported')
    expect(PageContent.fromHtml('https://shop.example/a', HTML).title).toBe('Catalog')
  })

  it('answers XPath queries again after dispose', () => {
    const page = PageContent.fromHtml('https://shop.example/a', HTML)
    expect(evaluateStrategy(page, { kind: 'xpath', expression: '//a/@href' })).toEqual(['/next'])
    page.dispose()
    expect(evaluateStrategy(page, { kind: 'xpath', expression: '//a/@href' })).toEqual(['/next'])
  })
})

describe('evaluateStrategy', () => {
  const page = PageContent.fromHtml('https://shop.example/a', HTML)

  it('evaluates each strategy kind', () => {
    expect(evaluateStrategy(page, { kind: 'css', selector: '.item b' })).toEqual(['Weight:'])
    expect(evaluateStrategy(page, { kind: 'attribute', selector: '.item', attribute: 'data-id' })).toEqual(['7'])
    expect(
      evaluateStrategy(page, { kind: 'text_pattern', pattern: 'weight:\\s*([\\d.]+\\s*kg)', flags: 'is' })
    ).toEqual(['2.5 kg'])
  })

  it('gives no candidate when a pattern does not match', () => {
    expect(evaluateStrategy(page, { kind: 'text_pattern', pattern: 'SKU (\\d+)', flags: 'is' })).toEqual([])
  })
})

describe('describeStrategy', () => {
  it('renders a one-line summary', () => {
    expect(describeStrategy({ kind: 'attribute', selector: 'meta', attribute: 'content' })).toBe(
      'attribute(meta @content)'
    )
    expect(describeStrategy({ kind: 'text_pattern', pattern: 'a(b)', flags: 'is' })).toBe(
      'text_pattern(/a(b)/is)'
    )
  })
})
