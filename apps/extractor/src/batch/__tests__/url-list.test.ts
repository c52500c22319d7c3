import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../engine/errors.js'
import { parseUrlList, readUrlFile } from '../url-list.js'

describe('parseUrlList', () => {
  it('trims lines and skips blanks and comments, keeping duplicates', () => {
    const source = ' https://a.example/1 \n\n# seasonal\nhttps://a.example/2\r\nhttps://a.example/1\n'
    expect(parseUrlList(source)).toEqual([
      'https://a.example/1',
      'https://a.example/2',
      'https://a.example/1',
    ])
  })
})

describe('readUrlFile', () => {
  it('reports a missing file as a configuration error', async () => {
    await expect(readUrlFile('/nonexistent/urls.txt')).rejects.toBeInstanceOf(ConfigurationError)
  })
})
