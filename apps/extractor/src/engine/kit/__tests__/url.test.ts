import { describe, expect, it } from 'vitest'
import { fileSafeHost, indexedFileName } from '../url.js'

describe('indexedFileName', () => {
  it('pads the index and keeps the host', () => {
    expect(indexedFileName('https://shop.example.com/p/1', 7, 'html')).toBe(
      '007_shop.example.com.html'
    )
  })

  it('falls back to a placeholder host for unparsable URLs', () => {
    expect(fileSafeHost('not a url')).toBe('page')
  })
})
