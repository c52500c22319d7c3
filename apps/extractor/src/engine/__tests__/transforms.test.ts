import { describe, expect, it } from 'vitest'
import { applyTransforms, parseNumber, regexSubstitute, stripChars } from '../transforms.js'

describe('stripChars', () => {
  it('trims whitespace when no characters are given', () => {
    expect(stripChars('  x  ')).toBe('x')
  })

  it('removes the given characters from both ends only', () => {
    expect(stripChars('$$12$', '$')).toBe('12')
    expect(stripChars('--a-b--', '-')).toBe('a-b')
  })

  it('leaves the value alone for an empty set', () => {
    expect(stripChars(' x ', '')).toBe(' x ')
  })
})

describe('regexSubstitute', () => {
  it('replaces every match', () => {
    expect(regexSubstitute('mailto:a@b.example', 'mailto:', '')).toBe('a@b.example')
    expect(regexSubstitute('a  b   c', '\\s+', ' ')).toBe('a b c')
  })

  it('supports numbered back-references', () => {
    expect(regexSubstitute('2024-01-05', '(\\d+)-(\\d+)-(\\d+)', '$3/$2/$1')).toBe('05/01/2024')
  })
})

describe('parseNumber', () => {
  it('drops thousands separators', () => {
    expect(parseNumber('1,234,567')).toBe(1234567)
  })

  it('takes the first number in the text', () => {
    expect(parseNumber('-3.5%')).toBe(-3.5)
    expect(parseNumber('.5 kg')).toBe(0.5)
  })

  it('returns null without digits', () => {
    expect(parseNumber('abc')).toBeNull()
  })
})

describe('applyTransforms', () => {
  it('returns the raw candidate unchanged without steps', () => {
    expect(applyTransforms('  raw ', [])).toEqual({ ok: true, value: '  raw ' })
  })

  it('strips then converts a formatted number', () => {
    expect(
      applyTransforms('1,234.50 kg', [{ kind: 'strip_chars' }, { kind: 'convert_to_number' }])
    ).toEqual({ ok: true, value: 1234.5 })
  })

  it('runs steps in order', () => {
    expect(
      applyTransforms('Price: $19.99', [
        { kind: 'regex_substitute', pattern: '^Price:\\s*', replacement: '' },
        { kind: 'strip_chars', chars: '$' },
      ])
    ).toEqual({ ok: true, value: '19.99' })
  })

  it('fails when the chain leaves blank text', () => {
    expect(
      applyTransforms('abc', [{ kind: 'regex_substitute', pattern: '.+', replacement: '' }])
    ).toEqual({ ok: false, failure: { reason: 'EMPTY_RESULT', step: 0, input: 'abc' } })
    expect(
      applyTransforms('$ ', [{ kind: 'strip_chars', chars: '$' }, { kind: 'strip_chars' }])
    ).toEqual({ ok: false, failure: { reason: 'EMPTY_RESULT', step: 1, input: '$ ' } })
  })

  it('reports a non-numeric value as a failure', () => {
    expect(applyTransforms('n/a', [{ kind: 'convert_to_number' }])).toEqual({
      ok: false,
      failure: { reason: 'NOT_NUMERIC', step: 0, input: 'n/a' },
    })
  })
})
