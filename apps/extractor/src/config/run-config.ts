/**
 * Run configuration
 *
 * Loaded from YAML or JSON with snake_case keys; every option has a default, so an empty
 * document (or no file at all) is a valid configuration. Grouped sections `browser`,
 * `debug` and a single `api_endpoint` are folded into the flat keys. Unknown keys are
 * returned as warnings rather than rejected.
 */

import { z } from 'zod'
import { ConfigurationError, configurationErrorFromZod } from '../engine/errors.js'
import { readConfigDocument } from '../engine/kit/document.js'
import { isPlainObject } from '../engine/kit/json.js'
import type { TransformFailurePolicy } from '../engine/types.js'
import { DEFAULT_NOT_FOUND_VALUE, EXPORT_FORMATS, type ExportFormat } from '../export/writers.js'
import type { ApiEndpoint } from '../render/types.js'

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value))

const apiEndpointSchema = z.object({
  url: z.string().min(1, 'url is required'),
  method: z
    .string()
    .default('GET')
    .transform(value => value.toUpperCase())
    .pipe(z.enum(['GET', 'POST'])),
  headers: z.record(z.string(), scalar).default({}),
  params: z.record(z.string(), scalar).default({}),
  body: z.record(z.string(), z.unknown()).optional(),
})

const seconds = z.number().nonnegative()

const runConfigSchema = z.object({
  headless: z.boolean().default(false),
  use_browser: z.boolean().default(true),
  http_fallback: z.boolean().default(true),
  api_endpoints: z.array(apiEndpointSchema).default([]),
  save_html: z.boolean().default(false),
  html_dump_dir: z.string().min(1).default('debug_html'),
  screenshots_dir: z.string().min(1).optional(),
  output_dir: z.string().min(1).default('.'),
  formats: z
    .array(z.enum(EXPORT_FORMATS))
    .min(1, 'at least one format is required')
    .default([...EXPORT_FORMATS]),
  success_threshold: z.number().min(0).max(1).default(0.5),
  politeness_delay_seconds: seconds.default(2),
  page_load_timeout_seconds: seconds.default(30),
  wait_css_selectors: z
    .union([z.string().min(1), z.array(z.string().min(1))])
    .default([])
    .transform(value => (typeof value === 'string' ? [value] : value)),
  wait_seconds: seconds.default(15),
  sleep_after_load_seconds: seconds.default(3),
  not_found_value: z.string().default(DEFAULT_NOT_FOUND_VALUE),
  transform_failure: z.enum(['absent', 'next-strategy']).default('absent'),
})

export interface RunConfig {
  headless: boolean
  useBrowser: boolean
  httpFallback: boolean
  apiEndpoints: ApiEndpoint[]
  saveHtml: boolean
  htmlDumpDir: string
  screenshotsDir?: string
  outputDir: string
  formats: ExportFormat[]
  successThreshold: number
  politenessDelayMs: number
  pageLoadTimeoutMs: number
  waitCssSelectors: string[]
  waitMs: number
  sleepAfterLoadMs: number
  notFoundValue: string
  transformFailure: TransformFailurePolicy
}

export interface LoadedRunConfig {
  config: RunConfig
  warnings: string[]
}

const KNOWN_KEYS = new Set(Object.keys(runConfigSchema.shape))

// Grouped keys and the flat key each one feeds
const BROWSER_SECTION: Record<string, string> = {
  headless: 'headless',
  wait_seconds: 'wait_seconds',
  sleep_after_load: 'sleep_after_load_seconds',
  page_load_timeout: 'page_load_timeout_seconds',
}

function foldSections(raw: Record<string, unknown>, warnings: string[]): Record<string, unknown> {
  const { browser, debug, api_endpoint: apiEndpoint, ...flat } = raw
  const fill = (key: string, value: unknown) => {
    if (flat[key] === undefined && value !== undefined) {
      flat[key] = value
    }
  }

  if (isPlainObject(browser)) {
    for (const [key, value] of Object.entries(browser)) {
      const target = BROWSER_SECTION[key]
      if (target) {
        fill(target, value)
      } else if (key === 'save_screenshots') {
        if (value === true) fill('screenshots_dir', 'screenshots')
      } else {
        warnings.push(`Unknown run config key 'browser.${key}' ignored`)
      }
    }
  }
  if (isPlainObject(debug)) {
    fill('save_html', debug.save_html)
  }
  if (apiEndpoint !== undefined && flat.api_endpoints === undefined) {
    flat.api_endpoints = [apiEndpoint]
  }

  return flat
}

export function parseRunConfig(raw: unknown): LoadedRunConfig {
  const warnings: string[] = []
  const source = raw === null || raw === undefined ? {} : raw

  if (!isPlainObject(source)) {
    throw new ConfigurationError('Invalid run configuration', [
      { path: '(root)', message: 'run configuration must be a mapping' },
    ])
  }

  const flat = foldSections(source, warnings)
  for (const key of Object.keys(flat)) {
    if (!KNOWN_KEYS.has(key)) {
      warnings.push(`Unknown run config key '${key}' ignored`)
    }
  }

  const parsed = runConfigSchema.safeParse(flat)
  if (!parsed.success) {
    throw configurationErrorFromZod('Invalid run configuration', parsed.error)
  }
  const data = parsed.data

  const config: RunConfig = {
    headless: data.headless,
    useBrowser: data.use_browser,
    httpFallback: data.http_fallback,
    apiEndpoints: data.api_endpoints,
    saveHtml: data.save_html,
    htmlDumpDir: data.html_dump_dir,
    outputDir: data.output_dir,
    formats: [...new Set(data.formats)],
    successThreshold: data.success_threshold,
    politenessDelayMs: Math.round(data.politeness_delay_seconds * 1000),
    pageLoadTimeoutMs: Math.round(data.page_load_timeout_seconds * 1000),
    waitCssSelectors: data.wait_css_selectors,
    waitMs: Math.round(data.wait_seconds * 1000),
    sleepAfterLoadMs: Math.round(data.sleep_after_load_seconds * 1000),
    notFoundValue: data.not_found_value,
    transformFailure: data.transform_failure,
  }
  if (data.screenshots_dir !== undefined) {
    config.screenshotsDir = data.screenshots_dir
  }

  return { config, warnings }
}

/**
 * Load the run configuration at `path`; defaults only when no path is given.
 */
export function loadRunConfig(path?: string): LoadedRunConfig {
  return parseRunConfig(path === undefined ? {} : readConfigDocument(path))
}
