/**
 * Live options store
 *
 * A valtio proxy holding a component's current options, kept in sync with
 * the editor by a settings change handler. Each relevant change replaces the
 * proxy's contents with the freshly converted options.
 */

import { proxy } from 'valtio'

import type { HandlerConfig, SettingsChangeCallback } from '../core/types'
import {
  createSettingsChangeHandler,
  type SettingsChangeHandler,
} from '../handler/settings-change-handler'
import { convertSettings } from '../mapping/convert'
import type { ConvertedOptions, MappingSpec, RawSettings } from '../types'

export interface LiveOptionsConfig extends HandlerConfig {
  /** Upstream values at render time, converted once to seed the store */
  initialSettings?: RawSettings
  /** Called after the store has been updated */
  onChange?: SettingsChangeCallback
}

export interface LiveOptionsStore {
  /** valtio proxy; read through `snapshot()` or `useLiveOptions` */
  options: ConvertedOptions
  handler: SettingsChangeHandler
  /** Register a consumer; the first one subscribes the handler */
  attach: () => void
  /** Release a consumer; the last one unsubscribes the handler */
  detach: () => void
  /** Consumers currently attached */
  consumerCount: () => number
}

const replaceContents = (
  target: ConvertedOptions,
  next: ConvertedOptions,
): void => {
  for (const key of Object.keys(target)) {
    if (!Object.prototype.hasOwnProperty.call(next, key)) {
      delete target[key]
    }
  }
  Object.assign(target, next)
}

/**
 * @example
 * ```typescript
 * const store = createLiveOptions(
 *   { color: 'bg_color', gap: { value: 'gap', return_size: true } },
 *   { initialSettings: { bg_color: '#fff', gap: { size: 8, unit: 'px' } } },
 * )
 * store.attach()
 * snapshot(store.options) // { color: '#fff', gap: 8 }
 * ```
 */
export const createLiveOptions = (
  spec: MappingSpec,
  config: LiveOptionsConfig = {},
): LiveOptionsStore => {
  const { initialSettings, onChange, ...handlerConfig } = config

  const options = proxy<ConvertedOptions>(
    initialSettings ? convertSettings(initialSettings, spec) : {},
  )

  const handler = createSettingsChangeHandler(
    spec,
    (next) => {
      replaceContents(options, next)
      return onChange?.(next)
    },
    handlerConfig,
  )

  // One store may back several mounted components
  let consumers = 0

  return {
    options,
    handler,
    attach: () => {
      consumers += 1
      if (consumers === 1) handler.attach()
    },
    detach: () => {
      if (consumers === 0) return
      consumers -= 1
      if (consumers === 0) handler.detach()
    },
    consumerCount: () => consumers,
  }
}
