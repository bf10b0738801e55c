/**
 * Dimension values
 *
 * Editors store sliders and dimension controls as `{ size, unit }`.
 * An empty slider typically arrives as `{ size: '', unit: 'px' }`, so a
 * "defined" size means not undefined, and the empty string still counts.
 */

import type { SizeUnitValue, SizeValue } from '../types'
import { is } from '../utils/is'

/**
 * Object with a defined numeric or string `size`. Checked structurally:
 * values posted from the editor frame carry that frame's `Object.prototype`.
 */
export const isSizeValue = (value: unknown): value is SizeValue =>
  is.record(value) && (is.number(value['size']) || is.string(value['size']))

/** Size value that also carries a string `unit` */
export const isSizeUnitValue = (value: unknown): value is SizeUnitValue =>
  isSizeValue(value) && is.string(value.unit)

/**
 * @example
 * ```typescript
 * formatSizeValue({ size: 20, unit: 'px' }) // '20px'
 * formatSizeValue({ size: 1.5 })            // '1.5'
 * ```
 */
export const formatSizeValue = (value: SizeValue): string =>
  `${String(value.size)}${value.unit ?? ''}`
