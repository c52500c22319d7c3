import { afterEach, describe, expect, it, vi } from 'vitest'
import { evaluateStrategy } from '../../engine/evaluators.js'
import { ApiRenderer, apiResponseToHtml, buildApiRequest } from '../api-renderer.js'
import type { ApiEndpoint } from '../types.js'

const PAGE_URL = 'https://shop.example/p?id=1'

describe('buildApiRequest', () => {
  it('expands the page URL in the URL template and params', () => {
    const endpoint: ApiEndpoint = {
      url: 'https://api.example.com/lookup?target={url}',
      method: 'GET',
      headers: { 'X-Api-Key': 'test-key' },
      params: { src: '{url}' },
    }

    const request = buildApiRequest(endpoint, PAGE_URL)
    const target = new URL(request.url)

    expect(target.searchParams.get('target')).toBe(PAGE_URL)
    expect(target.searchParams.get('src')).toBe(PAGE_URL)
    expect(request.init.method).toBe('GET')
    expect(request.init.headers).toEqual({
      Accept: 'application/json, text/html;q=0.9',
      'X-Api-Key': 'test-key',
    })
    expect(request.init.body).toBeUndefined()
  })

  it('sends a JSON body with the page URL for POST', () => {
    const request = buildApiRequest(
      {
        url: 'https://api.example.com/search',
        method: 'POST',
        headers: {},
        params: {},
        body: { query: '{url}', nested: { list: ['{url}', 3] } },
      },
      PAGE_URL
    )

    expect(request.init.body).toBe(
      JSON.stringify({ query: PAGE_URL, nested: { list: [PAGE_URL, 3] } })
    )
    expect(request.init.headers).toMatchObject({ 'Content-Type': 'application/json' })
  })
})

describe('apiResponseToHtml', () => {
  it('passes HTML through', () => {
    expect(apiResponseToHtml('<p>x</p>', 'text/html; charset=utf-8')).toBe('<p>x</p>')
  })

  it('pretty-prints and escapes JSON', () => {
    expect(apiResponseToHtml('{"a":"<b>"}', 'application/json')).toBe(
      '<html><body><pre>{\n  "a": "&lt;b&gt;"\n}</pre></body></html>'
    )
  })

  it('rejects malformed JSON', () => {
    expect(() => apiResponseToHtml('{oops', 'application/json')).toThrow('Malformed JSON response')
  })
})

describe('ApiRenderer', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('exposes JSON fields to text patterns', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(() =>
        Promise.resolve(
          new Response('{"price": 12}', { headers: { 'content-type': 'application/json' } })
        )
      )
    )
    const renderer = new ApiRenderer({
      url: 'https://api.example.com/price?u={url}',
      method: 'GET',
      headers: {},
      params: {},
    })

    const content = await renderer.render(PAGE_URL)

    expect(renderer.name).toBe('api')
    expect(
      evaluateStrategy(content, { kind: 'text_pattern', pattern: '"price":\\s*(\\d+)', flags: 'is' })
    ).toEqual(['12'])
  })

  it('fails on a non-ok response', async () => {
    vi.stubGlobal('fetch', vi.fn(() => Promise.resolve(new Response('no', { status: 500 }))))
    const renderer = new ApiRenderer(
      { url: 'https://api.example.com/price', method: 'GET', headers: {}, params: {} },
      { name: 'api:2' }
    )

    await expect(renderer.render(PAGE_URL)).rejects.toMatchObject({ statusCode: 500 })
  })
})
