/**
 * Selector evaluators and pattern matcher dispatch.
 *
 * Each strategy kind maps a page to zero or more raw candidates. An empty list means
 * "nothing from this strategy"; syntax problems were rejected when the configuration loaded.
 */

import type { PageContent } from './page-content.js'
import type { ExtractionStrategy } from './types.js'
import { selectAttrs, selectTexts } from './kit/html.js'
import { evaluateXPath } from './kit/xpath.js'
import { compilePattern, matchPattern } from './kit/pattern.js'

const patternCache = new Map<string, RegExp>()

function cachedPattern(pattern: string, flags: string): RegExp {
  const key = `${flags}/${pattern}`
  let regex = patternCache.get(key)
  if (!regex) {
    regex = compilePattern(pattern, flags)
    patternCache.set(key, regex)
  }
  return regex
}

export function evaluateStrategy(content: PageContent, strategy: ExtractionStrategy): string[] {
  switch (strategy.kind) {
    case 'css':
      return selectTexts(content.$, strategy.selector)
    case 'xpath':
      return evaluateXPath(content.dom, strategy.expression)
    case 'attribute':
      return selectAttrs(content.$, strategy.selector, strategy.attribute)
    case 'text_pattern': {
      const captured = matchPattern(content.text, cachedPattern(strategy.pattern, strategy.flags))
      return captured === null ? [] : [captured]
    }
  }
}

export function describeStrategy(strategy: ExtractionStrategy): string {
  switch (strategy.kind) {
    case 'css':
      return `css(${strategy.selector})`
    case 'xpath':
      return `xpath(${strategy.expression})`
    case 'attribute':
      return `attribute(${strategy.selector} @${strategy.attribute})`
    case 'text_pattern':
      return `text_pattern(/${strategy.pattern}/${strategy.flags})`
  }
}
