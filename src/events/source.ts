/**
 * Setting-changed sources
 *
 * The handler never touches a global. It subscribes to whatever
 * {@link SettingChangeSource} it is given; the adapters below cover DOM
 * event targets and the browser window.
 */

import type { Unsubscribe } from '../types'

/** Receives a raw notification: an Event or a bare detail object */
export type SettingChangeListener = (payload: unknown) => void

export interface SettingChangeSource {
  subscribe: (listener: SettingChangeListener) => Unsubscribe
}

/** Event name dispatched on `window` by the editor extension */
export const SETTING_CHANGED_EVENT =
  'arts/elementor_extension/editor/setting_changed'

/**
 * Adapt an EventTarget. Each subscription registers its own wrapper and the
 * returned unsubscribe removes exactly that wrapper.
 *
 * @example
 * ```typescript
 * const source = createEventTargetSource(document, 'my-editor:changed')
 * const unsubscribe = source.subscribe((event) => console.log(event))
 * unsubscribe()
 * ```
 */
export const createEventTargetSource = (
  target: EventTarget,
  eventName: string = SETTING_CHANGED_EVENT,
): SettingChangeSource => ({
  subscribe: (listener) => {
    const handleEvent = (event: Event) => {
      listener(event)
    }
    target.addEventListener(eventName, handleEvent)
    return () => {
      target.removeEventListener(eventName, handleEvent)
    }
  },
})

const noop = () => {
  // no-op
}

/** Never emits; stands in for `window` outside the browser */
export const NEVER_SOURCE: SettingChangeSource = {
  subscribe: () => noop,
}

/** `window` when it exists, otherwise {@link NEVER_SOURCE} */
export const createWindowSource = (
  eventName: string = SETTING_CHANGED_EVENT,
): SettingChangeSource =>
  typeof window === 'undefined'
    ? NEVER_SOURCE
    : createEventTargetSource(window, eventName)
