/**
 * Settings Change Handler
 *
 * Bridges editor "setting changed" notifications to a component callback:
 *
 * 1. validate the payload (malformed → ignored)
 * 2. check the changed key against the mapping's live keys (irrelevant → ignored)
 * 3. convert the WHOLE mapping from the payload's settings
 * 4. await the callback
 *
 * At most one conversion is in flight. Events arriving meanwhile are dropped,
 * not queued: the first event of a burst wins.
 *
 * Uses factory pattern instead of classes for functional style.
 */

import { DEFAULT_HANDLER_CONFIG } from '../core/defaults'
import type {
  HandlerConfig,
  HandlerState,
  ResolvedHandlerConfig,
  SettingsChangeCallback,
} from '../core/types'
import { parseSettingChangedDetail } from '../events/schema'
import { createWindowSource } from '../events/source'
import { compileMappingSpec } from '../mapping/compile'
import { convertCompiled } from '../mapping/convert'
import { collectLiveKeys } from '../mapping/live-keys'
import type { MappingSpec, Unsubscribe } from '../types'
import { deepMerge } from '../utils/deep-merge'
import { createLogger } from '../utils/log'

export interface SettingsChangeHandler {
  /** Subscribe to the source. Calling it again while attached does nothing. */
  attach: () => void
  /** Unsubscribe. Safe to call when not attached. */
  detach: () => void
  /**
   * Process one raw notification (Event or bare detail) the way the
   * subscription does. Resolves true only when the callback ran and settled
   * successfully.
   */
  handleChange: (payload: unknown) => Promise<boolean>
  getState: () => HandlerState
  isAttached: () => boolean
  /** Upstream keys that trigger a conversion */
  getLiveKeys: () => ReadonlySet<string>
}

/**
 * @example
 * ```typescript
 * const handler = createSettingsChangeHandler(
 *   {
 *     autoplay: 'slider_autoplay',
 *     speed: { condition: 'slider_autoplay', value: 'autoplay_speed' },
 *     slides: { desktop: 'slides_to_show', mobile: 'slides_to_show_mobile' },
 *   },
 *   async (options) => {
 *     await slider.update(options)
 *   },
 * )
 *
 * handler.attach()
 * // on teardown
 * handler.detach()
 * ```
 */
export const createSettingsChangeHandler = (
  spec: MappingSpec,
  callback: SettingsChangeCallback,
  config: HandlerConfig = {},
): SettingsChangeHandler => {
  const { source: customSource, onError: customOnError, ...rest } = config
  const resolved = deepMerge<ResolvedHandlerConfig>(DEFAULT_HANDLER_CONFIG, rest)

  const log = createLogger({ enabled: resolved.debug.log, scope: 'handler' })
  const source = customSource ?? createWindowSource(resolved.eventName)
  const onError =
    customOnError ??
    ((error: unknown) => {
      log.error('settings change callback failed', error)
    })

  // The mapping is immutable after construction: compile and extract once
  const mapping = compileMappingSpec(spec)
  const liveKeys = collectLiveKeys(mapping)
  for (const key of resolved.additionalLiveKeys) liveKeys.add(key)

  let state: HandlerState = 'detached'
  let unsubscribe: Unsubscribe | null = null
  let inFlight = false

  const handleChange = async (payload: unknown): Promise<boolean> => {
    if (state !== 'idle') {
      log.debug(`event dropped while ${state}`)
      return false
    }

    const detail = parseSettingChangedDetail(payload)
    if (!detail) {
      log.debug('malformed event ignored', payload)
      return false
    }

    state = 'processing'
    inFlight = true

    try {
      if (!liveKeys.has(detail.setting)) {
        log.debug(`"${detail.setting}" is not a live key`)
        return false
      }

      const options = convertCompiled(detail.settings, mapping)
      log.debug(`"${detail.setting}" changed`, options)
      await callback(options)
      return true
    } catch (error) {
      onError(error)
      return false
    } finally {
      inFlight = false
      // A detach during processing wins over the return to idle
      if (state === 'processing') state = 'idle'
    }
  }

  const listener = (payload: unknown) => {
    handleChange(payload).catch((error: unknown) => {
      log.error('onError handler threw', error)
    })
  }

  return {
    attach: () => {
      if (unsubscribe) {
        log.debug('attach ignored: already attached')
        return
      }
      unsubscribe = source.subscribe(listener)
      state = inFlight ? 'processing' : 'idle'
    },

    detach: () => {
      if (!unsubscribe) return
      unsubscribe()
      unsubscribe = null
      state = 'detached'
    },

    handleChange,
    getState: () => state,
    isAttached: () => unsubscribe !== null,
    getLiveKeys: () => liveKeys,
  }
}
