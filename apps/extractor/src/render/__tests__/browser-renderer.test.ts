import { describe, expect, it, vi } from 'vitest'
import { noopLogger } from '@pagesift/logger'
import { waitForSelectors } from '../browser-renderer.js'

describe('waitForSelectors', () => {
  it('waits for each selector in turn with its own timeout', async () => {
    const page = { waitForSelector: vi.fn(async () => null) }

    const missing = await waitForSelectors(page, ['#main', '.price'], 5000, 'https://shop.example/p')

    expect(missing).toEqual([])
    expect(page.waitForSelector.mock.calls).toEqual([
      ['#main', { timeout: 5000 }],
      ['.price', { timeout: 5000 }],
    ])
  })

  it('logs a missing selector and still waits for the next one', async () => {
    const page = {
      waitForSelector: vi.fn(async (selector: string) => {
        if (selector === '#main') {
          throw new Error('Timeout 5000ms exceeded')
        }
        return null
      }),
    }
    const log = { ...noopLogger, warn: vi.fn() }

    const missing = await waitForSelectors(page, ['#main', '.price'], 5000, 'https://shop.example/p', log)

    expect(missing).toEqual(['#main'])
    expect(page.waitForSelector).toHaveBeenCalledTimes(2)
    expect(log.warn).toHaveBeenCalledWith('Wait selector not found, extracting anyway', {
      url: 'https://shop.example/p',
      selector: '#main',
      reason: 'Timeout 5000ms exceeded',
    })
  })
})
