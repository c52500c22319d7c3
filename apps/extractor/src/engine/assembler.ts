/**
 * Record Assembler
 *
 * One record per page: every field resolved independently, values in declaration order,
 * then metadata. Records are frozen once built.
 */

import { noopLogger, type ILogger } from '@pagesift/logger'
import type { PageContent } from './page-content.js'
import { resolveField } from './resolver.js'
import {
  DEFAULT_RESOLVER_POLICY,
  type ExtractedRecord,
  type FieldSpec,
  type FieldValue,
  type RecordMeta,
  type ResolverPolicy,
} from './types.js'

export interface AssembleOptions {
  policy?: ResolverPolicy
  /** Source of `retrievedAt` */
  clock?: () => Date
  /** Name of the renderer that produced `content` */
  renderer?: string
  logger?: ILogger
}

export function assembleRecord(
  url: string,
  content: PageContent,
  fields: readonly FieldSpec[],
  options: AssembleOptions = {}
): ExtractedRecord {
  const policy = options.policy ?? DEFAULT_RESOLVER_POLICY
  const clock = options.clock ?? (() => new Date())
  const log = options.logger ?? noopLogger

  // Own data properties, also for names such as `__proto__`
  const entries: [string, FieldValue][] = []
  let foundCount = 0

  for (const field of fields) {
    const resolution = resolveField(content, field, policy)
    entries.push([field.name, resolution.value])

    switch (resolution.status) {
      case 'found':
        foundCount++
        log.debug('Field resolved', {
          url,
          field: field.name,
          strategy: resolution.strategyIndex,
        })
        break
      case 'transform_failed':
        log.debug('Field transform failed', {
          url,
          field: field.name,
          strategy: resolution.strategyIndex,
          reason: resolution.failure.reason,
          input: resolution.failure.input,
        })
        break
      case 'not_found':
        log.debug('Field not found', { url, field: field.name })
        break
    }
  }

  const meta: RecordMeta = {
    sourceUrl: url,
    retrievedAt: clock().toISOString(),
  }
  const pageTitle = content.title
  if (pageTitle !== undefined) {
    meta.pageTitle = pageTitle
  }
  if (content.finalUrl !== url) {
    meta.finalUrl = content.finalUrl
  }
  if (options.renderer !== undefined) {
    meta.renderer = options.renderer
  }

  return Object.freeze({
    values: Object.freeze(Object.fromEntries(entries)),
    meta: Object.freeze(meta),
    foundCount,
  })
}

/**
 * Share of fields with a value, 0 when the record has no fields.
 */
export function foundRatio(record: ExtractedRecord): number {
  const total = Object.keys(record.values).length
  return total === 0 ? 0 : record.foundCount / total
}
