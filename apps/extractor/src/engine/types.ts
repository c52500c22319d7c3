/**
 * Field Resolution Engine Types
 *
 * Field definitions, extraction strategies, transforms, records and run results.
 * Strategies and transforms are closed tagged unions: every kind is known at load time.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction Strategies
// ═══════════════════════════════════════════════════════════════════════════════

export interface CssStrategy {
  kind: 'css'
  selector: string
}

export interface XPathStrategy {
  kind: 'xpath'
  expression: string
}

export interface AttributeStrategy {
  kind: 'attribute'
  selector: string
  attribute: string
}

/**
 * Regex over the page's visible text.
 * The pattern must declare exactly one capturing group; its capture is the candidate.
 */
export interface TextPatternStrategy {
  kind: 'text_pattern'
  pattern: string
  flags: string
}

export type ExtractionStrategy =
  | CssStrategy
  | XPathStrategy
  | AttributeStrategy
  | TextPatternStrategy

export type StrategyKind = ExtractionStrategy['kind']

// ═══════════════════════════════════════════════════════════════════════════════
// Transform Steps
// ═══════════════════════════════════════════════════════════════════════════════

export interface RegexSubstituteStep {
  kind: 'regex_substitute'
  pattern: string
  /** `$1` style back-references */
  replacement: string
}

export interface StripCharsStep {
  kind: 'strip_chars'
  /** Characters removed from both ends. Whitespace when omitted. */
  chars?: string
}

/** Terminal step: must be last in a chain */
export interface ConvertToNumberStep {
  kind: 'convert_to_number'
}

export type TransformStep = RegexSubstituteStep | StripCharsStep | ConvertToNumberStep

export type TransformKind = TransformStep['kind']

export type TransformFailureReason = 'NOT_NUMERIC' | 'EMPTY_RESULT'

export interface TransformFailure {
  reason: TransformFailureReason
  step: number
  input: string
}

export type TransformResult =
  | { ok: true; value: string | number }
  | { ok: false; failure: TransformFailure }

// ═══════════════════════════════════════════════════════════════════════════════
// Field Specs
// ═══════════════════════════════════════════════════════════════════════════════

export interface FieldSpec {
  /** Output column name, unique within a configuration */
  name: string
  /** Tried in order; the first strategy with a non-empty candidate wins */
  strategies: ExtractionStrategy[]
  transforms: TransformStep[]
}

/**
 * What the resolver does when the winning candidate fails its transform chain.
 * - absent: the field is recorded absent (default)
 * - next-strategy: resolution resumes with the next strategy
 */
export type TransformFailurePolicy = 'absent' | 'next-strategy'

export interface ResolverPolicy {
  transformFailure: TransformFailurePolicy
}

export const DEFAULT_RESOLVER_POLICY: ResolverPolicy = {
  transformFailure: 'absent',
}

// ═══════════════════════════════════════════════════════════════════════════════
// Values and Records
// ═══════════════════════════════════════════════════════════════════════════════

/** `null` marks an absent value */
export type FieldValue = string | number | null

export type FieldResolution =
  | { status: 'found'; value: string | number; strategyIndex: number; raw: string }
  | { status: 'not_found'; value: null }
  | {
      status: 'transform_failed'
      value: null
      strategyIndex: number
      raw: string
      failure: TransformFailure
    }

export interface RecordMeta {
  sourceUrl: string
  /** ISO-8601 */
  retrievedAt: string
  pageTitle?: string
  /** URL after redirects, when it differs from `sourceUrl` */
  finalUrl?: string
  /** Name of the renderer that produced the page */
  renderer?: string
}

export interface ExtractedRecord {
  readonly values: Readonly<Record<string, FieldValue>>
  readonly meta: Readonly<RecordMeta>
  readonly foundCount: number
}

/** Metadata columns, in export order, after the field columns */
export const METADATA_COLUMNS = ['source_url', 'retrieved_at', 'page_title'] as const

export type MetadataColumn = (typeof METADATA_COLUMNS)[number]

// ═══════════════════════════════════════════════════════════════════════════════
// Run Results
// ═══════════════════════════════════════════════════════════════════════════════

export interface UrlFailure {
  url: string
  reason: string
}

export interface RunResult {
  /** Field names in declaration order */
  fields: string[]
  records: ExtractedRecord[]
  failures: UrlFailure[]
  /** True when the run stopped early on an abort signal */
  cancelled: boolean
  startedAt: string
  finishedAt: string
}
