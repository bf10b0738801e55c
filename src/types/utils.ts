/** Recursively requires every property; functions are kept as they are */
export type DeepRequired<T> = {
  [K in keyof T]-?: NonNullable<T[K]> extends (...args: never[]) => unknown
    ? NonNullable<T[K]>
    : NonNullable<T[K]> extends readonly unknown[]
      ? NonNullable<T[K]>
      : NonNullable<T[K]> extends object
        ? DeepRequired<NonNullable<T[K]>>
        : NonNullable<T[K]>
}

/**
 * Recursively optional. Distributes over unions so `null | undefined` pass
 * through; arrays are matched before objects.
 */
export type DeepPartial<T> = T extends (infer U)[]
  ? DeepPartial<U>[]
  : T extends readonly (infer U)[]
    ? readonly DeepPartial<U>[]
    : T extends (...args: never[]) => unknown
      ? T
      : T extends object
        ? { [K in keyof T]?: DeepPartial<T[K]> }
        : T

/** Removes a subscription */
export type Unsubscribe = () => void
