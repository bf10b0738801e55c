/**
 * Type checking utilities
 *
 * Narrowing predicates shared by the mapper, the event schema and the
 * DOM helpers.
 */

/** Check if value is null or undefined */
const isNil = (value: unknown): value is null | undefined => value == null

/** Check if value is undefined */
const isUndefined = (value: unknown): value is undefined => value === undefined

/** Plain object only: not null, arrays, dates or class instances */
const isObject = (value: unknown): value is Record<string, unknown> => {
  if (value == null || typeof value !== 'object' || Array.isArray(value))
    return false
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Any non-null, non-array object, whatever its prototype or realm.
 * Use for values that may come from another frame.
 */
const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/** Check if value is an array */
const isArray = (value: unknown): value is unknown[] => Array.isArray(value)

/** Check if value is a string */
const isString = (value: unknown): value is string => typeof value === 'string'

/** Check if value is a non-empty string */
const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.length > 0

/** Check if value is a finite number */
const isNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

/** Check if value is a boolean */
const isBoolean = (value: unknown): value is boolean =>
  typeof value === 'boolean'

/** Check if value is a function */
const isFunction = (value: unknown): value is (...args: unknown[]) => unknown =>
  typeof value === 'function'

/** Check if value is a RegExp */
const isRegExp = (value: unknown): value is RegExp => value instanceof RegExp

/** Check if value has at least one own key (plain objects only) */
const isEmptyObject = (value: Record<string, unknown>): boolean => {
  for (const key in value) {
    if (Object.prototype.hasOwnProperty.call(value, key)) return false
  }
  return true
}

const isNotNil = <T>(value: T | null | undefined): value is T => value != null

const isNotUndefined = <T>(value: T | undefined): value is T =>
  value !== undefined

const isNotObject = <T>(
  value: T,
): value is Exclude<T, Record<string, unknown>> => !isObject(value)

const isNotString = <T>(value: T): value is Exclude<T, string> =>
  typeof value !== 'string'

/**
 * Unified namespace for type checking
 *
 * @example
 * ```typescript
 * if (is.object(rule)) { ... }
 * if (is.not.undefined(value)) { ... }
 * ```
 */
export const is = {
  nil: isNil,
  undefined: isUndefined,
  object: isObject,
  record: isRecord,
  emptyObject: isEmptyObject,
  array: isArray,
  string: isString,
  nonEmptyString: isNonEmptyString,
  number: isNumber,
  boolean: isBoolean,
  function: isFunction,
  regexp: isRegExp,
  not: {
    nil: isNotNil,
    undefined: isNotUndefined,
    object: isNotObject,
    string: isNotString,
  },
}
