import type { DeepPartial } from '../types'
import { is } from './is'

/**
 * Deep merge two objects, with source values overriding target values.
 * Plain objects merge recursively; arrays, dates and class instances are
 * replaced whole. `undefined` in the source keeps the target value.
 *
 * @example
 * ```typescript
 * deepMerge({ debug: { log: false }, eventName: 'a' }, { debug: { log: true } })
 * // { debug: { log: true }, eventName: 'a' }
 * ```
 */
export const deepMerge = <T extends object>(
  target: T,
  source?: DeepPartial<T>,
): T => {
  if (!source) return target

  const result = { ...target }

  // DeepPartial<T> carries the keys of T; index both through the same key type.
  const src = source as { [K in keyof T]?: unknown }

  for (const key in src) {
    if (!Object.prototype.hasOwnProperty.call(src, key)) continue

    const k = key as Extract<keyof T, string>
    const sourceValue = src[k]
    const targetValue = target[k]

    if (is.undefined(sourceValue)) continue

    if (is.object(sourceValue) && is.object(targetValue)) {
      result[k] = deepMerge(
        targetValue,
        sourceValue as DeepPartial<typeof targetValue>,
      ) as T[typeof k]
    } else {
      result[k] = sourceValue as T[typeof k]
    }
  }

  return result
}

/**
 * Merge any number of plain objects left to right into a new object.
 * Later objects win; nested plain objects merge.
 *
 * @example
 * ```typescript
 * deepMergeAll({ a: 1 }, { b: { x: 1 } }, { b: { y: 2 } })
 * // { a: 1, b: { x: 1, y: 2 } }
 * ```
 */
export const deepMergeAll = (
  ...objects: Record<string, unknown>[]
): Record<string, unknown> =>
  objects.reduce<Record<string, unknown>>(
    (result, current) => deepMerge(result, current),
    {},
  )
