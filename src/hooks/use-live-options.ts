/**
 * useLiveOptions Hook
 *
 * Attaches a live options store for the lifetime of the component and
 * re-renders whenever the editor pushes new options. Components may share
 * one store: it stays subscribed until the last of them unmounts.
 */

import { useLayoutEffect } from 'react'
import { useSnapshot } from 'valtio'

import type { LiveOptionsStore } from '../store/live-options'
import type { ConvertedOptions } from '../types'

/**
 * @example
 * ```tsx
 * const store = createLiveOptions({ title: 'heading_text' })
 *
 * const Heading = () => {
 *   const options = useLiveOptions(store)
 *   return <h2>{String(options['title'] ?? '')}</h2>
 * }
 * ```
 */
export const useLiveOptions = (
  store: LiveOptionsStore,
): Readonly<ConvertedOptions> => {
  useLayoutEffect(() => {
    store.attach()
    return () => {
      store.detach()
    }
  }, [store])

  return useSnapshot(store.options)
}
