/**
 * Live key extraction
 *
 * A live key is an upstream setting whose change must trigger a fresh
 * conversion: every bare key, every `condition` and every `value` key,
 * at any depth.
 */

import type { CompiledMapping, MappingNode, MappingSpec } from '../types'
import { compileMappingSpec } from './compile'

const collectNode = (node: MappingNode, keys: Set<string>): void => {
  switch (node.kind) {
    case 'direct':
    case 'scalar':
      keys.add(node.key)
      return
    case 'conditional':
      keys.add(node.condition)
      if (node.then) collectNode(node.then, keys)
      return
    case 'composite':
    case 'nested':
      collectLiveKeys(node.members, keys)
      return
  }
}

/** Collect the live keys of an already compiled mapping into `keys` */
export const collectLiveKeys = (
  mapping: CompiledMapping,
  keys: Set<string> = new Set(),
): Set<string> => {
  for (const node of Object.values(mapping)) {
    collectNode(node, keys)
  }
  return keys
}

/**
 * @example
 * ```typescript
 * extractLiveKeys({ a: 'k1', b: { condition: 'k2', value: 'k3' } })
 * // Set { 'k1', 'k2', 'k3' }
 * ```
 */
export const extractLiveKeys = (spec: MappingSpec): Set<string> =>
  collectLiveKeys(compileMappingSpec(spec))

/**
 * Array form of {@link extractLiveKeys} with extra keys appended.
 * Duplicates are removed; first occurrence wins the position.
 *
 * @example
 * ```typescript
 * getLiveSettings({ speed: 'autoplay_speed' }, ['autoplay_speed', 'loop'])
 * // ['autoplay_speed', 'loop']
 * ```
 */
export const getLiveSettings = (
  spec: MappingSpec = {},
  additionalSettings: readonly string[] = [],
): string[] => [...new Set([...extractLiveKeys(spec), ...additionalSettings])]
