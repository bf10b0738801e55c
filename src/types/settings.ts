/**
 * Upstream editor settings and the shapes derived from them
 */

/** Flat dictionary of current upstream setting values, as sent by the editor */
export type RawSettings = Record<string, unknown>

/** Converted, component-facing options */
export type ConvertedOptions = Record<string, unknown>

/** Dimension-like upstream value, e.g. `{ size: 20, unit: 'px' }` */
export interface SizeValue {
  size: number | string
  unit?: string
}

export interface SizeUnitValue extends SizeValue {
  unit: string
}

/** Payload of a single "setting changed" notification */
export interface SettingChangedDetail {
  /** All current upstream values */
  settings: RawSettings
  /** Key of the setting that just changed */
  setting: string
  /** New raw value of `setting` (not used for relevance) */
  value?: unknown
}
