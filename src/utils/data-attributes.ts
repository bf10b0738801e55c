/**
 * Data attribute parsing
 *
 * Turns `data-*` attributes into a nested object by splitting attribute
 * names on a separator: `data-slider-speed="300"` → `{ slider: { speed: '300' } }`.
 */

import _setWith from 'lodash/setWith'

import { is } from './is'

export interface DataAttribute {
  name: string
  value: string
}

export interface DataAttributeOptions {
  /** Splits attribute names into a nested path (default: `-`) */
  separator?: string
  /** Tested against the name without `data-` (default: every attribute) */
  pattern?: RegExp
}

const DATA_PREFIX = 'data-'

/**
 * Write a single attribute into `result`, creating intermediate objects.
 * A stray `data` segment is skipped; primitive intermediates are replaced.
 */
export const parseAttribute = (
  attr: DataAttribute,
  result: Record<string, unknown>,
  separator: string,
): void => {
  const path = attr.name
    .slice(DATA_PREFIX.length)
    .split(separator)
    .filter((part) => part !== 'data')

  if (path.length === 0) return

  // Intermediates are always plain objects: numeric segments never become arrays
  _setWith(result, path, attr.value, (current: unknown) =>
    is.object(current) ? current : {},
  )
}

/** True for `data-*` attributes whose suffix matches `pattern` */
export const filterDataAttributes = (
  attr: DataAttribute,
  pattern?: RegExp,
): boolean => {
  if (!attr.name.startsWith(DATA_PREFIX)) return false
  if (!pattern) return true
  return pattern.test(attr.name.slice(DATA_PREFIX.length))
}

/**
 * @example
 * ```typescript
 * // <div data-slider-speed="300" data-slider-loop="true" data-id="7">
 * parseDataAttributes(el, { pattern: /^slider/ })
 * // { slider: { speed: '300', loop: 'true' } }
 * ```
 */
export const parseDataAttributes = (
  element: Element,
  options: DataAttributeOptions = {},
): Record<string, unknown> => {
  const separator = options.separator ?? '-'
  const pattern = options.pattern ?? /^/
  const result: Record<string, unknown> = {}

  for (const attr of Array.from(element.attributes)) {
    if (filterDataAttributes(attr, pattern)) {
      parseAttribute(attr, result, separator)
    }
  }

  return result
}
