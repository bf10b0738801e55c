/**
 * Handler configuration and lifecycle types
 */

import type { SettingChangeSource } from '../events/source'
import type { ConvertedOptions, DeepRequired } from '../types'

export interface DebugConfig {
  /** Log dropped, irrelevant and processed events to the console */
  log?: boolean
}

export interface HandlerConfig {
  /** Event name used when no `source` is given (default: SETTING_CHANGED_EVENT) */
  eventName?: string
  /** Where notifications come from (default: `window` under `eventName`) */
  source?: SettingChangeSource
  /** Extra upstream keys that count as live besides those the mapping references */
  additionalLiveKeys?: string[]
  /** Receives callback failures (default: logged with console.error) */
  onError?: (error: unknown) => void
  /** Debug configuration for development tooling */
  debug?: DebugConfig
}

/** Plain-data part of the config, resolved against the defaults */
export type ResolvedHandlerConfig = DeepRequired<
  Omit<HandlerConfig, 'source' | 'onError'>
>

/**
 * - `detached`: not subscribed (initial)
 * - `idle`: subscribed, ready for the next event
 * - `processing`: a conversion and its callback are in flight
 */
export type HandlerState = 'detached' | 'idle' | 'processing'

/** Receives the converted options; may be async, the handler waits for it */
export type SettingsChangeCallback = (
  options: ConvertedOptions,
) => void | Promise<void>
