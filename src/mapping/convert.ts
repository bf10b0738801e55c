/**
 * Settings conversion
 *
 * Resolves a compiled mapping against a flat dictionary of upstream values.
 *
 * Two resolution contexts exist. At the top level (and inside plain nested
 * maps hanging off it) a `{ value }` rule passes dimension objects through
 * untouched unless `return_size: true`. Inside a composite `value: { ... }`
 * the default flips: dimension objects are reduced to their `size`, and
 * `return_size: false` formats them as "size+unit" instead.
 *
 * Undefined results are omitted at every level, never written as undefined
 * or null.
 */

import type {
  CompiledMapping,
  ConvertedOptions,
  MappingNode,
  MappingSpec,
  RawSettings,
  ScalarValueNode,
} from '../types'
import { is } from '../utils/is'
import { compileMappingRule, compileMappingSpec } from './compile'
import { formatSizeValue, isSizeUnitValue, isSizeValue } from './size-value'

type ResolveContext = 'top' | 'composite'

const read = (settings: RawSettings, key: string): unknown =>
  Object.prototype.hasOwnProperty.call(settings, key) ? settings[key] : undefined

const resolveScalar = (
  node: ScalarValueNode,
  settings: RawSettings,
  context: ResolveContext,
): unknown => {
  const value = read(settings, node.key)

  if (context === 'top') {
    return node.returnSize === true && isSizeValue(value) ? value.size : value
  }

  if (node.returnSize === false) {
    return isSizeUnitValue(value) ? formatSizeValue(value) : value
  }
  return isSizeValue(value) ? value.size : value
}

const resolveNode = (
  node: MappingNode,
  settings: RawSettings,
  context: ResolveContext,
): unknown => {
  switch (node.kind) {
    case 'direct':
      return read(settings, node.key)
    case 'conditional':
      if (!read(settings, node.condition)) return false
      return node.then ? resolveNode(node.then, settings, context) : undefined
    case 'scalar':
      return resolveScalar(node, settings, context)
    case 'composite':
      return resolveMembers(node.members, settings, 'composite')
    case 'nested':
      return resolveMembers(node.members, settings, context)
  }
}

const resolveMembers = (
  members: CompiledMapping,
  settings: RawSettings,
  context: ResolveContext,
): ConvertedOptions => {
  const result: ConvertedOptions = {}
  for (const [name, node] of Object.entries(members)) {
    const value = resolveNode(node, settings, context)
    if (is.not.undefined(value)) result[name] = value
  }
  return result
}

/**
 * Convert raw upstream settings into component options.
 * The whole mapping is resolved on every call; inputs are never mutated.
 *
 * @example
 * ```typescript
 * convertSettings(
 *   { enable_autoplay: 'yes', autoplay_speed: 300, gap: { size: 20, unit: 'px' } },
 *   {
 *     speed: { condition: 'enable_autoplay', value: 'autoplay_speed' },
 *     gap: { value: 'gap', return_size: true },
 *   },
 * )
 * // { speed: 300, gap: 20 }
 * ```
 */
export const convertSettings = (
  settings: RawSettings,
  spec: MappingSpec,
): ConvertedOptions => resolveMembers(compileMappingSpec(spec), settings, 'top')

/** Convert with an already compiled mapping */
export const convertCompiled = (
  settings: RawSettings,
  mapping: CompiledMapping,
): ConvertedOptions => resolveMembers(mapping, settings, 'top')

/**
 * Resolve a composite value mapping on its own: a bare string is a direct
 * lookup, an object resolves member by member with composite rules.
 *
 * @example
 * ```typescript
 * resolveValueMapping(
 *   { desktop: { value: 'gap' }, mobile: { value: 'gap_mobile', return_size: false } },
 *   { gap: { size: 20, unit: 'px' }, gap_mobile: { size: 10, unit: 'px' } },
 * )
 * // { desktop: 20, mobile: '10px' }
 * ```
 */
export const resolveValueMapping = (
  valueMapping: string | MappingSpec,
  settings: RawSettings,
): unknown => {
  if (is.string(valueMapping)) return read(settings, valueMapping)

  const node = compileMappingRule({ value: valueMapping })
  return node ? resolveNode(node, settings, 'top') : undefined
}
