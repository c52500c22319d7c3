/**
 * Export Writer
 *
 * One file per requested format, `{baseName}_{timestamp}.{ext}`, all sharing the run's
 * timestamp. Columns: fields in declaration order, then metadata. Each file is written to a
 * temporary path and renamed, so a failed format leaves nothing behind and the remaining
 * formats are still attempted.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import ExcelJS from 'exceljs'
import { stringify } from 'csv-stringify/sync'
import { noopLogger, type ILogger } from '@pagesift/logger'
import { ExportError, errorMessage } from '../engine/errors.js'
import { METADATA_COLUMNS, type ExtractedRecord, type RunResult } from '../engine/types.js'
import { formatRunTimestamp } from './timestamp.js'

export const EXPORT_FORMATS = ['xlsx', 'csv', 'json'] as const

export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export const DEFAULT_NOT_FOUND_VALUE = 'Not Found'

export interface ExportOptions {
  formats: readonly ExportFormat[]
  outputDir: string
  baseName: string
  /** `YYYYMMDD_HHMMSS`; generated once when omitted */
  timestamp?: string
  /** Written in place of absent values */
  notFoundValue?: string
  logger?: ILogger
}

export interface ExportFailure {
  format: ExportFormat
  reason: string
}

export interface ExportResult {
  /** Written paths, in format order */
  files: string[]
  failures: ExportFailure[]
  timestamp: string
}

type Cell = string | number

export type ExportRun = Pick<RunResult, 'fields' | 'records'>

export function exportColumns(fields: readonly string[]): string[] {
  return [...fields, ...METADATA_COLUMNS]
}

/**
 * Cells of one record in column order.
 */
export function recordRow(
  record: ExtractedRecord,
  fields: readonly string[],
  notFoundValue: string = DEFAULT_NOT_FOUND_VALUE
): Cell[] {
  const values = fields.map(field => record.values[field] ?? notFoundValue)
  return [...values, record.meta.sourceUrl, record.meta.retrievedAt, record.meta.pageTitle ?? '']
}

export function exportFileName(baseName: string, timestamp: string, format: ExportFormat): string {
  return `${baseName}_${timestamp}.${format}`
}

async function writeXlsx(path: string, columns: string[], rows: Cell[][]): Promise<void> {
  const workbook = new ExcelJS.Workbook()
  const sheet = workbook.addWorksheet('Data')
  sheet.addRow(columns)
  sheet.getRow(1).font = { bold: true }
  for (const row of rows) {
    sheet.addRow(row)
  }
  columns.forEach((header, index) => {
    sheet.getColumn(index + 1).width = Math.min(Math.max(header.length + 2, 12), 60)
  })
  await workbook.xlsx.writeFile(path)
}

async function writeCsv(path: string, columns: string[], rows: Cell[][]): Promise<void> {
  // BOM so spreadsheet apps detect UTF-8
  await writeFile(path, stringify([columns, ...rows], { bom: true }), 'utf8')
}

async function writeJson(path: string, columns: string[], rows: Cell[][]): Promise<void> {
  const objects = rows.map(row =>
    Object.fromEntries(columns.map((column, index) => [column, row[index] ?? '']))
  )
  await writeFile(path, `${JSON.stringify(objects, null, 2)}\n`, 'utf8')
}

type FormatWriter = (path: string, columns: string[], rows: Cell[][]) => Promise<void>

const WRITERS: Record<ExportFormat, FormatWriter> = {
  xlsx: writeXlsx,
  csv: writeCsv,
  json: writeJson,
}

/**
 * Write `run` in every requested format. Formats go in the fixed order xlsx, csv, json.
 */
export async function writeExports(run: ExportRun, options: ExportOptions): Promise<ExportResult> {
  const log = options.logger ?? noopLogger
  const timestamp = options.timestamp ?? formatRunTimestamp()
  const result: ExportResult = { files: [], failures: [], timestamp }

  if (run.records.length === 0) {
    log.warn('No records to export')
    return result
  }

  const columns = exportColumns(run.fields)
  const rows = run.records.map(record => recordRow(record, run.fields, options.notFoundValue))
  const requested = EXPORT_FORMATS.filter(format => options.formats.includes(format))

  for (const format of requested) {
    const path = join(options.outputDir, exportFileName(options.baseName, timestamp, format))
    const tempPath = `${path}.partial`

    try {
      await mkdir(options.outputDir, { recursive: true })
      await WRITERS[format](tempPath, columns, rows)
      await rename(tempPath, path)
      result.files.push(path)
      log.info('Export written', { format, path, rows: rows.length })
    } catch (error) {
      await rm(tempPath, { force: true }).catch(cleanupError => {
        log.warn('Failed to remove partial export', { format, path: tempPath }, cleanupError)
      })
      const failure = new ExportError(format, `Failed to write ${format}: ${errorMessage(error)}`, {
        cause: error,
      })
      result.failures.push({ format, reason: failure.message })
      log.error('Export failed', { format, path }, failure)
    }
  }

  return result
}
