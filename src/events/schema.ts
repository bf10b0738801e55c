/**
 * Setting-changed payload validation
 *
 * The editor sends `{ settings, setting, value }` as the detail of a
 * CustomEvent. Anything that does not match is not applicable to the
 * handler and is reported as null rather than thrown.
 */

import { z } from 'zod'

import type { SettingChangedDetail } from '../types'
import { is } from '../utils/is'

export const settingChangedDetailSchema = z.object({
  settings: z.record(z.string(), z.unknown()),
  setting: z.string(),
  value: z.unknown().optional(),
})

/** DOM events (any realm) expose the payload under `detail` */
const isEventLike = (input: unknown): input is { detail: unknown } =>
  typeof input === 'object' &&
  input !== null &&
  !is.object(input) &&
  'detail' in input

/**
 * Accepts a CustomEvent or its bare detail.
 *
 * @example
 * ```typescript
 * parseSettingChangedDetail({ settings: { a: 1 }, setting: 'a', value: 1 })
 * // { settings: { a: 1 }, setting: 'a', value: 1 }
 * parseSettingChangedDetail(new CustomEvent('x', { detail: 'nope' }))
 * // null
 * ```
 */
export const parseSettingChangedDetail = (
  input: unknown,
): SettingChangedDetail | null => {
  const detail = isEventLike(input) ? input.detail : input
  const result = settingChangedDetailSchema.safeParse(detail)
  return result.success ? result.data : null
}
