/**
 * Mapping spec compilation
 *
 * Turns the loosely shaped, author-facing {@link MappingSpec} into a tree of
 * tagged {@link MappingNode}s. Resolution and key extraction then switch on
 * `kind` instead of probing object shapes at every step.
 *
 * Shape rules, checked in order:
 * - string                      → `direct`
 * - object with `condition`     → `conditional` wrapping the rest of the rule
 * - object with string `value`  → `scalar`
 * - object with object `value`  → `composite`
 * - object without `value`      → `nested` (every member compiled as an entry)
 *
 * Anything else (null, numbers, arrays, a non-string `value`) compiles to null
 * and is skipped by the caller.
 */

import type { CompiledMapping, MappingNode } from '../types'
import { is } from '../utils/is'

const RULE_FIELDS = new Set(['condition', 'value', 'return_size'])

const compileMembers = (
  entries: Record<string, unknown>,
  skip?: Set<string>,
): CompiledMapping => {
  const members: CompiledMapping = {}
  for (const [name, entry] of Object.entries(entries)) {
    if (skip?.has(name)) continue
    const node = compileMappingRule(entry)
    if (node) members[name] = node
  }
  return members
}

/** Everything a rule resolves to once its condition (if any) has passed */
const compileBody = (
  rule: Record<string, unknown>,
  hasCondition: boolean,
): MappingNode | null => {
  if ('value' in rule) {
    const value = rule['value']
    if (is.string(value)) {
      const returnSize = rule['return_size']
      return {
        kind: 'scalar',
        key: value,
        returnSize: is.boolean(returnSize) ? returnSize : undefined,
      }
    }
    if (is.object(value)) {
      return { kind: 'composite', members: compileMembers(value) }
    }
    return null
  }

  if (!hasCondition) {
    return { kind: 'nested', members: compileMembers(rule) }
  }

  // `{ condition, ...members }`: the remaining members form a gated nested map
  const members = compileMembers(rule, RULE_FIELDS)
  return is.emptyObject(members) ? null : { kind: 'nested', members }
}

/** Compile one entry; null when its shape is not supported */
export const compileMappingRule = (entry: unknown): MappingNode | null => {
  if (is.string(entry)) return { kind: 'direct', key: entry }
  if (!is.object(entry)) return null

  const condition = entry['condition']
  if (is.string(condition)) {
    return {
      kind: 'conditional',
      condition,
      then: compileBody(entry, true),
    }
  }

  return compileBody(entry, false)
}

/**
 * @example
 * ```typescript
 * compileMappingSpec({
 *   color: 'bg_color',
 *   size: { condition: 'has_size', value: 'size_px' },
 * })
 * // {
 * //   color: { kind: 'direct', key: 'bg_color' },
 * //   size: {
 * //     kind: 'conditional',
 * //     condition: 'has_size',
 * //     then: { kind: 'scalar', key: 'size_px', returnSize: undefined },
 * //   },
 * // }
 * ```
 */
export const compileMappingSpec = (spec: unknown): CompiledMapping =>
  is.object(spec) ? compileMembers(spec) : {}
