/**
 * useSettingsChange Hook
 *
 * Creates a settings change handler on mount and detaches it on unmount.
 * Uses useLayoutEffect so the subscription exists before the browser paints.
 */

import { useLayoutEffect, useRef } from 'react'

import type { HandlerConfig, SettingsChangeCallback } from '../core/types'
import { createSettingsChangeHandler } from '../handler/settings-change-handler'
import type { MappingSpec } from '../types'

const NO_CONFIG: HandlerConfig = {}

/**
 * `spec` and `config` should be stable references (module constants or
 * memoized): a new identity re-creates the handler. The callback may change
 * freely; the latest one is always called.
 *
 * @example
 * ```tsx
 * const SPEC = { speed: { condition: 'autoplay', value: 'autoplay_speed' } }
 *
 * const Slider = () => {
 *   const [speed, setSpeed] = useState<unknown>(null)
 *   useSettingsChange(SPEC, (options) => setSpeed(options['speed']))
 *   return <div data-speed={String(speed)} />
 * }
 * ```
 */
export const useSettingsChange = (
  spec: MappingSpec,
  callback: SettingsChangeCallback,
  config: HandlerConfig = NO_CONFIG,
): void => {
  const callbackRef = useRef(callback)
  callbackRef.current = callback

  useLayoutEffect(() => {
    const handler = createSettingsChangeHandler(
      spec,
      (options) => callbackRef.current(options),
      config,
    )
    handler.attach()

    return () => {
      handler.detach()
    }
    // Re-create if spec or config change
  }, [spec, config])
}
