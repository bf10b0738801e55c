/**
 * Shared test helpers
 */

/** Let pending microtasks and zero-delay timers run */
export const flush = (): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, 0)
  })

export interface Deferred<T = void> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (reason: unknown) => void
}

/** A promise settled from the outside, for holding a callback in flight */
export const createDeferred = <T = void>(): Deferred<T> => {
  let resolve: (value: T) => void = () => {
    // replaced below
  }
  let reject: (reason: unknown) => void = () => {
    // replaced below
  }
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}
