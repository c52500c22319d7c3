import type { ILogger } from '@pagesift/logger'
import { runBatch } from '../../batch/orchestrator.js'
import { parseUrlList, readUrlFile } from '../../batch/url-list.js'
import { loggers } from '../../config/logger.js'
import { loadRunConfig, type RunConfig } from '../../config/run-config.js'
import { ConfigurationError } from '../../engine/errors.js'
import { SAMPLE_FIELDS_PATH, loadFieldConfig } from '../../engine/field-config.js'
import type { FieldSpec, RunResult } from '../../engine/types.js'
import { formatRunTimestamp } from '../../export/timestamp.js'
import {
  EXPORT_FORMATS,
  writeExports,
  type ExportFormat,
  type ExportResult,
} from '../../export/writers.js'
import { createRenderers } from '../../render/factory.js'
import { withRenderers, type Renderer } from '../../render/types.js'
import { EXIT_CODES, type ExitCode } from '../exit-codes.js'

export interface RunCommandArgs {
  configPath?: string
  fieldsPath?: string
  url?: string
  urlFile?: string
  baseName: string
  /** Overrides `output_dir` */
  outputDir?: string
  /** Comma separated; overrides `formats` */
  formats?: string
  /** Overrides `headless` */
  headless?: boolean
  signal?: AbortSignal
  /** Renderer construction, replaced in tests */
  renderers?: (config: RunConfig, log: ILogger) => Renderer[]
}

export const DEFAULT_BASE_NAME = 'extracted_data'

export function parseFormats(value: string): ExportFormat[] {
  const requested = value
    .split(',')
    .map(format => format.trim().toLowerCase())
    .filter(format => format !== '')

  const formats: ExportFormat[] = []
  for (const format of requested) {
    const known = EXPORT_FORMATS.find(candidate => candidate === format)
    if (!known) {
      throw new ConfigurationError(`Unknown export format '${format}'`, [
        { path: 'formats', message: `expected one of ${EXPORT_FORMATS.join(', ')}` },
      ])
    }
    if (!formats.includes(known)) {
      formats.push(known)
    }
  }
  if (formats.length === 0) {
    throw new ConfigurationError('No export format given')
  }
  return formats
}

async function collectUrls(args: RunCommandArgs): Promise<string[]> {
  const urls: string[] = []
  if (args.url) {
    urls.push(...parseUrlList(args.url))
  }
  if (args.urlFile) {
    urls.push(...(await readUrlFile(args.urlFile)))
  }
  return urls
}

function applyOverrides(config: RunConfig, args: RunCommandArgs): RunConfig {
  return {
    ...config,
    outputDir: args.outputDir || config.outputDir,
    formats: args.formats ? parseFormats(args.formats) : config.formats,
    headless: args.headless ?? config.headless,
  }
}

function printSummary(fields: FieldSpec[], run: RunResult, exported: ExportResult): void {
  console.log('')
  console.log(`Fields:   ${fields.length}`)
  console.log(`Records:  ${run.records.length}`)
  console.log(`Failures: ${run.failures.length}`)
  for (const failure of run.failures) {
    console.log(`  - ${failure.url}: ${failure.reason}`)
  }
  for (const file of exported.files) {
    console.log(`Saved ${file}`)
  }
  for (const failure of exported.failures) {
    console.log(`Export ${failure.format} failed: ${failure.reason}`)
  }
  if (run.cancelled) {
    console.log('Run cancelled before all URLs were processed')
  }
}

/**
 * Load configuration, extract every URL and write the exports.
 * Configuration problems surface before any URL is rendered.
 */
export async function runRunCommand(args: RunCommandArgs): Promise<ExitCode> {
  const loaded = loadRunConfig(args.configPath)
  for (const warning of loaded.warnings) {
    loggers.config.warn(warning, { config: args.configPath })
  }
  const config = applyOverrides(loaded.config, args)

  if (!args.fieldsPath) {
    loggers.config.info('No field configuration given, using the bundled sample', {
      path: SAMPLE_FIELDS_PATH,
    })
  }
  const fields = loadFieldConfig(args.fieldsPath || SAMPLE_FIELDS_PATH)

  const urls = await collectUrls(args)
  if (urls.length === 0) {
    console.error('No URLs given: pass --url <url> and/or --url-file <path>')
    return EXIT_CODES.USAGE
  }

  const timestamp = formatRunTimestamp()
  const build = args.renderers ?? createRenderers
  const run = await withRenderers(
    build(config, loggers.render),
    renderers =>
      runBatch(urls, fields, renderers, {
        policy: { transformFailure: config.transformFailure },
        successThreshold: config.successThreshold,
        politenessDelayMs: config.politenessDelayMs,
        saveHtmlDir: config.saveHtml ? config.htmlDumpDir : undefined,
        signal: args.signal,
        logger: loggers.batch,
      }),
    loggers.render
  )

  const exported = await writeExports(run, {
    formats: config.formats,
    outputDir: config.outputDir,
    baseName: args.baseName,
    timestamp,
    notFoundValue: config.notFoundValue,
    logger: loggers.export,
  })

  printSummary(fields, run, exported)

  if (run.cancelled) {
    return EXIT_CODES.CANCELLED
  }
  if (run.failures.length > 0 || exported.failures.length > 0) {
    return EXIT_CODES.PARTIAL
  }
  return EXIT_CODES.OK
}
