import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../engine/errors.js'
import { loadRunConfig, parseRunConfig } from '../run-config.js'

describe('parseRunConfig', () => {
  it('fills every default for an empty document', () => {
    expect(parseRunConfig(undefined)).toEqual({
      config: {
        headless: false,
        useBrowser: true,
        httpFallback: true,
        apiEndpoints: [],
        saveHtml: false,
        htmlDumpDir: 'debug_html',
        outputDir: '.',
        formats: ['xlsx', 'csv', 'json'],
        successThreshold: 0.5,
        politenessDelayMs: 2000,
        pageLoadTimeoutMs: 30000,
        waitCssSelectors: [],
        waitMs: 15000,
        sleepAfterLoadMs: 3000,
        notFoundValue: 'Not Found',
        transformFailure: 'absent',
      },
      warnings: [],
    })
    expect(loadRunConfig().config.formats).toEqual(['xlsx', 'csv', 'json'])
  })

  it('converts seconds to milliseconds and wraps a single wait selector', () => {
    const { config } = parseRunConfig({
      politeness_delay_seconds: 0.25,
      wait_css_selectors: '#main',
      formats: ['csv', 'csv', 'json'],
    })
    expect(config.politenessDelayMs).toBe(250)
    expect(config.waitCssSelectors).toEqual(['#main'])
    expect(config.formats).toEqual(['csv', 'json'])
  })

  it('folds grouped sections into flat keys', () => {
    const { config, warnings } = parseRunConfig({
      browser: { headless: true, wait_seconds: 5, save_screenshots: true, zoom: 2 },
      debug: { save_html: true },
      api_endpoint: {
        url: 'https://api.example.com/items?u={url}',
        method: 'post',
        headers: { 'X-Api-Key': 'test-key', 'X-Page': 1 },
        body: { q: '{url}' },
      },
      extra_key: 1,
    })

    expect(config.headless).toBe(true)
    expect(config.waitMs).toBe(5000)
    expect(config.screenshotsDir).toBe('screenshots')
    expect(config.saveHtml).toBe(true)
    expect(config.apiEndpoints).toEqual([
      {
        url: 'https://api.example.com/items?u={url}',
        method: 'POST',
        headers: { 'X-Api-Key': 'test-key', 'X-Page': '1' },
        params: {},
        body: { q: '{url}' },
      },
    ])
    expect(warnings).toEqual([
      "Unknown run config key 'browser.zoom' ignored",
      "Unknown run config key 'extra_key' ignored",
    ])
  })

  it('lets flat keys win over grouped ones', () => {
    const { config } = parseRunConfig({ headless: false, browser: { headless: true } })
    expect(config.headless).toBe(false)
  })

  it('rejects invalid values', () => {
    expect(() => parseRunConfig({ formats: ['pdf'] })).toThrow(ConfigurationError)
    expect(() => parseRunConfig({ success_threshold: 2 })).toThrow(ConfigurationError)
    expect(() => parseRunConfig({ api_endpoints: [{ url: 'https://api.example.com', method: 'PUT' }] })).toThrow(
      ConfigurationError
    )
  })

  it('rejects a document that is not a mapping', () => {
    expect(() => parseRunConfig(['headless'])).toThrow('run configuration must be a mapping')
  })
})
