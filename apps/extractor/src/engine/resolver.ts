/**
 * Field Resolver
 *
 * Strategies are tried in declared order and resolution stops at the first one producing a
 * non-empty candidate. Later strategies are never evaluated, unless the candidate fails its
 * transform chain and the policy is `next-strategy`.
 */

import { evaluateStrategy } from './evaluators.js'
import type { PageContent } from './page-content.js'
import { applyTransforms } from './transforms.js'
import {
  DEFAULT_RESOLVER_POLICY,
  type FieldResolution,
  type FieldSpec,
  type FieldValue,
  type ResolverPolicy,
  type TransformFailure,
} from './types.js'

export function resolveField(
  content: PageContent,
  field: FieldSpec,
  policy: ResolverPolicy = DEFAULT_RESOLVER_POLICY
): FieldResolution {
  let lastFailure: { strategyIndex: number; raw: string; failure: TransformFailure } | null = null

  for (const [strategyIndex, strategy] of field.strategies.entries()) {
    const raw = evaluateStrategy(content, strategy).find(candidate => candidate !== '')
    if (raw === undefined) {
      continue
    }

    const result = applyTransforms(raw, field.transforms)
    if (result.ok) {
      return { status: 'found', value: result.value, strategyIndex, raw }
    }

    lastFailure = { strategyIndex, raw, failure: result.failure }
    if (policy.transformFailure === 'absent') {
      break
    }
  }

  if (lastFailure) {
    return { status: 'transform_failed', value: null, ...lastFailure }
  }
  return { status: 'not_found', value: null }
}

/**
 * Final value of `field` on `content`, `null` when absent.
 */
export function resolve(
  content: PageContent,
  field: FieldSpec,
  policy: ResolverPolicy = DEFAULT_RESOLVER_POLICY
): FieldValue {
  return resolveField(content, field, policy).value
}
