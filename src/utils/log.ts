/**
 * Console logger
 *
 * `createLogger` returns a shared no-op object when logging is off, so call
 * sites never need to check a flag themselves. Errors are the exception:
 * `error` always writes, since it reports failures the caller did not handle.
 */

export interface Logger {
  debug: (message: string, data?: unknown) => void
  warn: (message: string, data?: unknown) => void
  error: (message: string, error?: unknown) => void
}

export interface LoggerOptions {
  /** Enable debug and warn output */
  enabled: boolean
  /** Appended to the library prefix, e.g. `handler` → `live-settings:handler` */
  scope?: string
}

export const PREFIX = 'live-settings'

const noop = () => {
  // no-op
}

const formatPrefix = (scope?: string): string =>
  scope ? `${PREFIX}:${scope}` : PREFIX

const writeError = (prefix: string) => (message: string, error?: unknown) => {
  if (error === undefined) {
    console.error(`[${prefix}] ${message}`)
  } else {
    console.error(`[${prefix}] ${message}`, error)
  }
}

/**
 * @example
 * ```typescript
 * const log = createLogger({ enabled: true, scope: 'handler' })
 * log.debug('event dropped', { setting: 'bg_color' })
 * // [live-settings:handler] event dropped { setting: 'bg_color' }
 * ```
 */
export const createLogger = (options: LoggerOptions): Logger => {
  const prefix = formatPrefix(options.scope)

  if (!options.enabled) {
    return { debug: noop, warn: noop, error: writeError(prefix) }
  }

  return {
    debug: (message, data) => {
      if (data === undefined) {
        console.debug(`[${prefix}] ${message}`)
      } else {
        console.debug(`[${prefix}] ${message}`, data)
      }
    },
    warn: (message, data) => {
      if (data === undefined) {
        console.warn(`[${prefix}] ${message}`)
      } else {
        console.warn(`[${prefix}] ${message}`, data)
      }
    },
    error: writeError(prefix),
  }
}
