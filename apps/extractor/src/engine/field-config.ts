/**
 * Field configuration loader.
 *
 * Accepts two document shapes and compiles both into FieldSpec[]:
 *
 * Canonical:
 *   fields:
 *     - name: Price
 *       strategies:
 *         - { kind: css, selector: '.price' }
 *         - { kind: text_pattern, pattern: 'Price[:\s]*([^\n]+)' }
 *       transform:
 *         - { kind: convert_to_number }
 *
 * Legacy mapping (one key per field):
 *   Price:
 *     css_selectors: ['.price']
 *     text_patterns: ['Price[:\s]*([^\n]+)']
 *     transform: { type: convert_to_number }
 *
 * Every selector, XPath and regex is checked here, so resolution never meets a syntax error.
 */

import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import {
  ConfigurationError,
  ERROR_CODES,
  configurationErrorFromZod,
  errorMessage,
  type ConfigurationIssue,
  type ErrorCode,
} from './errors.js'
import { readConfigDocument } from './kit/document.js'
import { assertValidSelector } from './kit/html.js'
import { isPlainObject } from './kit/json.js'
import { DEFAULT_PATTERN_FLAGS, compilePattern, countCaptureGroups } from './kit/pattern.js'
import { assertValidXPath } from './kit/xpath.js'
import {
  METADATA_COLUMNS,
  type ExtractionStrategy,
  type FieldSpec,
  type TransformStep,
} from './types.js'

/** Bundled sample configuration, used when a run names no field file */
export const SAMPLE_FIELDS_PATH = fileURLToPath(
  new URL('../../config/sample-fields.yaml', import.meta.url)
)

// ═══════════════════════════════════════════════════════════════════════════════
// Canonical schema
// ═══════════════════════════════════════════════════════════════════════════════

const nonEmpty = z.string().min(1, 'must not be empty')

const flagsSchema = z
  .string()
  .regex(/^[imsu]*$/, 'flags may only contain i, m, s, u')
  .default(DEFAULT_PATTERN_FLAGS)

const strategySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('css'), selector: nonEmpty }).strict(),
  z.object({ kind: z.literal('xpath'), expression: nonEmpty }).strict(),
  z.object({ kind: z.literal('attribute'), selector: nonEmpty, attribute: nonEmpty }).strict(),
  z.object({ kind: z.literal('text_pattern'), pattern: nonEmpty, flags: flagsSchema }).strict(),
])

const transformSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('regex_substitute'),
      pattern: nonEmpty,
      replacement: z.string().default(''),
    })
    .strict(),
  z.object({ kind: z.literal('strip_chars'), chars: z.string().optional() }).strict(),
  z.object({ kind: z.literal('convert_to_number') }).strict(),
])

const fieldSchema = z
  .object({
    name: z.string().trim().min(1, 'field name is required'),
    strategies: z.array(strategySchema).min(1, 'at least one strategy is required'),
    transform: z.union([transformSchema, z.array(transformSchema)]).optional(),
  })
  .strict()

const canonicalSchema = z
  .object({
    fields: z.array(fieldSchema).min(1, 'at least one field is required'),
  })
  .strict()

// ═══════════════════════════════════════════════════════════════════════════════
// Legacy mapping schema
// ═══════════════════════════════════════════════════════════════════════════════

const legacyTransformSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('regex'), pattern: nonEmpty, replacement: z.string().default('') }),
  z.object({ type: z.literal('strip_chars'), chars: z.string().nullable().optional() }),
  z.object({ type: z.literal('convert_to_number') }),
])

const legacyFieldSchema = z
  .object({
    css_selectors: z.array(nonEmpty).default([]),
    xpath: z.array(nonEmpty).default([]),
    text_patterns: z.array(nonEmpty).default([]),
    attributes: z.array(z.object({ selector: nonEmpty, attribute: nonEmpty }).strict()).default([]),
    transform: z.union([legacyTransformSchema, z.array(legacyTransformSchema)]).optional(),
  })
  .strict()

const legacySchema = z.record(z.string(), legacyFieldSchema)

type LegacyField = z.infer<typeof legacyFieldSchema>
type LegacyTransform = z.infer<typeof legacyTransformSchema>

/** `(?P<name>` groups and `\1` replacements become their JavaScript spelling */
function portPattern(pattern: string): string {
  return pattern.replace(/\(\?P</g, '(?<')
}

function portReplacement(replacement: string): string {
  return replacement.replace(/\\(\d+)/g, '$$$1')
}

function compileLegacyTransform(step: LegacyTransform): TransformStep {
  switch (step.type) {
    case 'regex':
      return {
        kind: 'regex_substitute',
        pattern: portPattern(step.pattern),
        replacement: portReplacement(step.replacement),
      }
    case 'strip_chars':
      return step.chars === null || step.chars === undefined
        ? { kind: 'strip_chars' }
        : { kind: 'strip_chars', chars: step.chars }
    case 'convert_to_number':
      return { kind: 'convert_to_number' }
  }
}

function compileLegacyField(name: string, field: LegacyField): FieldSpec {
  // Strategy order of the legacy format: css, xpath, text patterns, attributes
  const strategies: ExtractionStrategy[] = [
    ...field.css_selectors.map(selector => ({ kind: 'css' as const, selector })),
    ...field.xpath.map(expression => ({ kind: 'xpath' as const, expression })),
    ...field.text_patterns.map(pattern => ({
      kind: 'text_pattern' as const,
      pattern: portPattern(pattern),
      flags: DEFAULT_PATTERN_FLAGS,
    })),
    ...field.attributes.map(({ selector, attribute }) => ({
      kind: 'attribute' as const,
      selector,
      attribute,
    })),
  ]

  const transform = field.transform === undefined ? [] : [field.transform].flat()

  return {
    name: name.trim(),
    strategies,
    transforms: transform.map(compileLegacyTransform),
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Semantic validation
// ═══════════════════════════════════════════════════════════════════════════════

function checkSyntax(
  issues: ConfigurationIssue[],
  path: string,
  code: ErrorCode,
  check: () => void
): void {
  try {
    check()
  } catch (error) {
    issues.push({ path, message: errorMessage(error), code })
  }
}

function validateStrategy(
  issues: ConfigurationIssue[],
  path: string,
  strategy: ExtractionStrategy
): void {
  switch (strategy.kind) {
    case 'css':
    case 'attribute':
      checkSyntax(issues, `${path}.selector`, ERROR_CODES.INVALID_SELECTOR, () =>
        assertValidSelector(strategy.selector)
      )
      return
    case 'xpath':
      checkSyntax(issues, `${path}.expression`, ERROR_CODES.INVALID_XPATH, () =>
        assertValidXPath(strategy.expression)
      )
      return
    case 'text_pattern': {
      let regex: RegExp
      try {
        regex = compilePattern(strategy.pattern, strategy.flags)
      } catch (error) {
        issues.push({
          path: `${path}.pattern`,
          message: errorMessage(error),
          code: ERROR_CODES.INVALID_PATTERN,
        })
        return
      }
      const groups = countCaptureGroups(regex)
      if (groups !== 1) {
        issues.push({
          path: `${path}.pattern`,
          message: `text pattern must declare exactly one capturing group, found ${groups}`,
          code: ERROR_CODES.CAPTURE_GROUP_COUNT,
        })
      }
      return
    }
  }
}

function validateTransforms(
  issues: ConfigurationIssue[],
  path: string,
  steps: TransformStep[]
): void {
  steps.forEach((step, index) => {
    if (step.kind === 'regex_substitute') {
      checkSyntax(issues, `${path}.${index}.pattern`, ERROR_CODES.INVALID_PATTERN, () =>
        compilePattern(step.pattern, 'g')
      )
    }
    if (step.kind === 'convert_to_number' && index !== steps.length - 1) {
      issues.push({
        path: `${path}.${index}`,
        message: 'convert_to_number must be the last transform step',
      })
    }
  })
}

/**
 * Check names, selectors, XPath and regexes of compiled fields. Throws one
 * ConfigurationError listing every problem.
 */
export function validateFieldSpecs(fields: FieldSpec[]): FieldSpec[] {
  const issues: ConfigurationIssue[] = []
  const seen = new Set<string>()
  const reserved = new Set<string>(METADATA_COLUMNS)

  if (fields.length === 0) {
    issues.push({ path: 'fields', message: 'at least one field is required' })
  }

  fields.forEach((field, index) => {
    const path = `fields.${index}`
    if (!field.name) {
      issues.push({ path: `${path}.name`, message: 'field name is required' })
    } else if (seen.has(field.name)) {
      issues.push({
        path: `${path}.name`,
        message: `duplicate field name '${field.name}'`,
        code: ERROR_CODES.DUPLICATE_FIELD,
      })
    } else if (reserved.has(field.name)) {
      issues.push({
        path: `${path}.name`,
        message: `'${field.name}' is reserved for record metadata`,
      })
    }
    seen.add(field.name)

    if (field.strategies.length === 0) {
      issues.push({ path: `${path}.strategies`, message: 'at least one strategy is required' })
    }
    field.strategies.forEach((strategy, strategyIndex) =>
      validateStrategy(issues, `${path}.strategies.${strategyIndex}`, strategy)
    )
    validateTransforms(issues, `${path}.transform`, field.transforms)
  })

  if (issues.length > 0) {
    const codes = new Set(issues.map(issue => issue.code ?? ERROR_CODES.CONFIGURATION_ERROR))
    const [onlyCode] = codes
    throw new ConfigurationError(
      'Invalid field configuration',
      issues,
      codes.size === 1 && onlyCode ? onlyCode : ERROR_CODES.CONFIGURATION_ERROR
    )
  }

  return fields
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entry points
// ═══════════════════════════════════════════════════════════════════════════════

function isCanonicalDocument(raw: unknown): boolean {
  return Array.isArray(raw) || (isPlainObject(raw) && Array.isArray(raw.fields))
}

/**
 * Compile and validate a loaded field configuration document.
 */
export function parseFieldConfig(raw: unknown): FieldSpec[] {
  if (isCanonicalDocument(raw)) {
    const parsed = canonicalSchema.safeParse(Array.isArray(raw) ? { fields: raw } : raw)
    if (!parsed.success) {
      throw configurationErrorFromZod('Invalid field configuration', parsed.error)
    }
    return validateFieldSpecs(
      parsed.data.fields.map(field => ({
        name: field.name,
        strategies: field.strategies,
        transforms: field.transform === undefined ? [] : [field.transform].flat(),
      }))
    )
  }

  if (!isPlainObject(raw)) {
    throw new ConfigurationError(
      'Field configuration must be a list of fields, an object with `fields`, or a mapping of field names'
    )
  }

  const parsed = legacySchema.safeParse(raw)
  if (!parsed.success) {
    throw configurationErrorFromZod('Invalid field configuration', parsed.error)
  }
  return validateFieldSpecs(
    Object.entries(parsed.data).map(([name, field]) => compileLegacyField(name, field))
  )
}

export function loadFieldConfig(path: string = SAMPLE_FIELDS_PATH): FieldSpec[] {
  return parseFieldConfig(readConfigDocument(path))
}
