export * from './engine/types.js'
export * from './engine/errors.js'
export { PageContent, type PageContentInit } from './engine/page-content.js'
export { evaluateStrategy, describeStrategy } from './engine/evaluators.js'
export { applyTransforms, parseNumber, regexSubstitute, stripChars } from './engine/transforms.js'
export { resolve, resolveField } from './engine/resolver.js'
export { assembleRecord, foundRatio, type AssembleOptions } from './engine/assembler.js'
export {
  SAMPLE_FIELDS_PATH,
  loadFieldConfig,
  parseFieldConfig,
  validateFieldSpecs,
} from './engine/field-config.js'
export { matchPattern, compilePattern } from './engine/kit/pattern.js'
export { runBatch, DEFAULT_SUCCESS_THRESHOLD, type BatchOptions } from './batch/orchestrator.js'
export { parseUrlList, readUrlFile } from './batch/url-list.js'
export {
  writeExports,
  exportColumns,
  recordRow,
  EXPORT_FORMATS,
  DEFAULT_NOT_FOUND_VALUE,
  type ExportFormat,
  type ExportOptions,
  type ExportResult,
} from './export/writers.js'
export { formatRunTimestamp } from './export/timestamp.js'
export { loadRunConfig, parseRunConfig, type RunConfig } from './config/run-config.js'
export { withRenderers, type Renderer } from './render/types.js'
export { HttpRenderer } from './render/http-renderer.js'
export { BrowserRenderer } from './render/browser-renderer.js'
export { ApiRenderer } from './render/api-renderer.js'
export { createRenderers } from './render/factory.js'
