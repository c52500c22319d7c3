/**
 * Batch Orchestrator
 *
 * Processes URLs strictly one at a time, in input order. A URL whose rendering fails is
 * recorded in `failures` and the run moves on; nothing raised while handling one URL
 * reaches the next.
 *
 * With several renderers (browser, then HTTP, then API) the first record whose share of
 * found fields reaches `successThreshold` wins. Otherwise the best record seen is kept,
 * and the URL only fails when every renderer threw.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { noopLogger, type ILogger } from '@pagesift/logger'
import { assembleRecord, foundRatio } from '../engine/assembler.js'
import { errorMessage } from '../engine/errors.js'
import { indexedFileName } from '../engine/kit/url.js'
import type { PageContent } from '../engine/page-content.js'
import {
  DEFAULT_RESOLVER_POLICY,
  type ExtractedRecord,
  type FieldSpec,
  type ResolverPolicy,
  type RunResult,
  type UrlFailure,
} from '../engine/types.js'
import type { Renderer } from '../render/types.js'

export const DEFAULT_SUCCESS_THRESHOLD = 0.5

export interface BatchOptions {
  policy?: ResolverPolicy
  /** Share of found fields (0..1) that accepts a record without trying the next renderer */
  successThreshold?: number
  /** Pause between two URLs */
  politenessDelayMs?: number
  /** Write each rendered document here for debugging */
  saveHtmlDir?: string
  /** Checked before each URL; a URL in progress always completes */
  signal?: AbortSignal
  clock?: () => Date
  sleep?: (ms: number) => Promise<void>
  logger?: ILogger
}

type UrlOutcome = { ok: true; record: ExtractedRecord } | { ok: false; failure: UrlFailure }

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

async function dumpHtml(
  dir: string,
  url: string,
  index: number,
  content: PageContent,
  renderer: string,
  log: ILogger
): Promise<void> {
  try {
    await mkdir(dir, { recursive: true })
    const path = join(dir, indexedFileName(url, index, `${renderer}.html`))
    await writeFile(path, content.html, 'utf8')
    log.debug('Saved HTML', { url, path })
  } catch (error) {
    log.warn('Failed to save HTML', { url, dir }, error)
  }
}

async function processUrl(
  url: string,
  index: number,
  fields: readonly FieldSpec[],
  renderers: readonly Renderer[],
  options: Required<Pick<BatchOptions, 'policy' | 'successThreshold'>> & BatchOptions,
  log: ILogger
): Promise<UrlOutcome> {
  const reasons: string[] = []
  let best: { record: ExtractedRecord; ratio: number } | null = null

  for (const renderer of renderers) {
    let content: PageContent | null = null
    try {
      content = await renderer.render(url)

      if (options.saveHtmlDir) {
        await dumpHtml(options.saveHtmlDir, url, index, content, renderer.name, log)
      }

      const record = assembleRecord(url, content, fields, {
        policy: options.policy,
        clock: options.clock,
        renderer: renderer.name,
        logger: log,
      })
      const ratio = foundRatio(record)

      log.debug('Renderer produced record', {
        url,
        renderer: renderer.name,
        found: record.foundCount,
        total: fields.length,
      })

      if (ratio >= options.successThreshold) {
        return { ok: true, record }
      }
      if (!best || ratio > best.ratio) {
        best = { record, ratio }
      }
    } catch (error) {
      const reason = errorMessage(error)
      reasons.push(`${renderer.name}: ${reason}`)
      log.warn('Render failed', { url, renderer: renderer.name, reason })
    } finally {
      content?.dispose()
    }
  }

  if (best) {
    return { ok: true, record: best.record }
  }
  return {
    ok: false,
    failure: { url, reason: reasons.length > 0 ? reasons.join('; ') : 'No renderer configured' },
  }
}

/**
 * Render and extract every URL, in order.
 */
export async function runBatch(
  urls: readonly string[],
  fields: readonly FieldSpec[],
  renderers: readonly Renderer[],
  options: BatchOptions = {}
): Promise<RunResult> {
  const log = options.logger ?? noopLogger
  const clock = options.clock ?? (() => new Date())
  const sleep = options.sleep ?? defaultSleep
  const delay = options.politenessDelayMs ?? 0
  const resolved = {
    ...options,
    clock,
    policy: options.policy ?? DEFAULT_RESOLVER_POLICY,
    successThreshold: options.successThreshold ?? DEFAULT_SUCCESS_THRESHOLD,
  }

  const startedAt = clock().toISOString()
  const records: ExtractedRecord[] = []
  const failures: UrlFailure[] = []
  let cancelled = false

  log.info('Run started', {
    urls: urls.length,
    fields: fields.length,
    renderers: renderers.map(renderer => renderer.name),
  })

  for (const [i, url] of urls.entries()) {
    if (i > 0 && delay > 0) {
      await sleep(delay)
    }
    if (options.signal?.aborted) {
      cancelled = true
      log.warn('Run cancelled', { processed: i, remaining: urls.length - i })
      break
    }

    log.info('Processing URL', { index: i + 1, total: urls.length, url })
    const outcome = await processUrl(url, i + 1, fields, renderers, resolved, log)

    if (outcome.ok) {
      records.push(outcome.record)
      log.info('Record assembled', {
        url,
        renderer: outcome.record.meta.renderer,
        found: outcome.record.foundCount,
        total: fields.length,
      })
    } else {
      failures.push(outcome.failure)
      log.error('URL failed', { url, reason: outcome.failure.reason })
    }
  }

  const finishedAt = clock().toISOString()
  log.info('Run finished', {
    records: records.length,
    failures: failures.length,
    cancelled,
  })

  return {
    fields: fields.map(field => field.name),
    records,
    failures,
    cancelled,
    startedAt,
    finishedAt,
  }
}
