export interface Debounced<Args extends unknown[]> {
  (...args: Args): void
  /** Drop the pending call, if any */
  cancel: () => void
  /** Whether a call is waiting for the timer */
  pending: () => boolean
}

/**
 * Delay `fn` until `wait` ms have passed without another call.
 * The last call's arguments win.
 *
 * @example
 * ```typescript
 * const relayout = debounce(() => grid.layout(), 250)
 * window.addEventListener('resize', relayout)
 * // on teardown
 * relayout.cancel()
 * ```
 */
export const debounce = <Args extends unknown[]>(
  fn: (...args: Args) => void,
  wait: number,
): Debounced<Args> => {
  if (!Number.isFinite(wait) || wait < 0) {
    throw new Error(
      `debounce wait must be a non-negative number of milliseconds. Got ${String(wait)}.`,
    )
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null

  const cancel = () => {
    if (timeoutId !== null) {
      clearTimeout(timeoutId)
      timeoutId = null
    }
  }

  const debounced = (...args: Args) => {
    cancel()
    timeoutId = setTimeout(() => {
      timeoutId = null
      fn(...args)
    }, wait)
  }

  return Object.assign(debounced, {
    cancel,
    pending: () => timeoutId !== null,
  })
}
