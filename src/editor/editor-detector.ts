/**
 * Editor detection
 *
 * Page builders expose a frontend object once their scripts have booted,
 * announced by an init event. Components ask "am I rendered inside the
 * editor preview?" before wiring live settings.
 */

import { is } from '../utils/is'

/** The part of the editor frontend this module relies on */
export interface EditorFrontend {
  /** Set once the frontend has finished booting */
  elementsHandler?: unknown
  isEditMode: () => boolean
}

export interface EditorDetectorOptions {
  /** Reads the frontend object; undefined until the editor scripts load */
  getFrontend: () => EditorFrontend | undefined
  /** Dispatches `initEvent`; null outside the browser */
  target: EventTarget | null
  initEvent?: string
}

export const EDITOR_INIT_EVENT = 'elementor/frontend/init'

const isReady = (
  frontend: EditorFrontend | undefined,
): frontend is EditorFrontend => is.not.nil(frontend?.elementsHandler)

/**
 * Returns a detector. Concurrent calls made before the init event share one
 * pending promise; after it fires the next call checks the frontend again.
 *
 * @example
 * ```typescript
 * const isEditor = createEditorDetector({
 *   getFrontend: () => myWindow.builderFrontend,
 *   target: myWindow,
 *   initEvent: 'builder/init',
 * })
 * if (await isEditor()) handler.attach()
 * ```
 */
export const createEditorDetector = (
  options: EditorDetectorOptions,
): (() => Promise<boolean>) => {
  const { getFrontend, target, initEvent = EDITOR_INIT_EVENT } = options
  let pending: Promise<boolean> | null = null

  return () => {
    const frontend = getFrontend()
    if (isReady(frontend)) return Promise.resolve(frontend.isEditMode())
    if (!target) return Promise.resolve(false)
    if (pending) return pending

    const eventTarget = target
    pending = new Promise<boolean>((resolve) => {
      const handleInit = () => {
        eventTarget.removeEventListener(initEvent, handleInit)
        pending = null
        const booted = getFrontend()
        resolve(isReady(booted) ? booted.isEditMode() : false)
      }
      eventTarget.addEventListener(initEvent, handleInit)
    })

    return pending
  }
}

interface EditorWindow extends Window {
  elementorFrontend?: EditorFrontend
}

const getWindow = (): EditorWindow | null =>
  typeof window === 'undefined' ? null : window

/** Detector bound to `window.elementorFrontend`; false outside the browser */
export const isEditorLoaded: () => Promise<boolean> = createEditorDetector({
  getFrontend: () => getWindow()?.elementorFrontend,
  target: getWindow(),
})
