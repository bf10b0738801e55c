import { is } from './is'

/**
 * Rewrite relaxed object notation into strict JSON:
 * single quotes become double quotes and bare keys get quoted.
 *
 * @example
 * ```typescript
 * toStandardJSON("{speed: 300, effect: 'fade'}")
 * // '{"speed": 300, "effect": "fade"}'
 * ```
 */
export const toStandardJSON = (input: string): string => {
  if (!input) return '{}'

  return input
    .replace(/'/g, '"')
    .replace(/(?<=\{|,)(\s*)([a-zA-Z0-9_$]+)(\s*):/g, '$1"$2"$3:')
    .replace(/}"/g, '},"')
    .replace(/]"/g, '],"')
}

const tryParse = (input: string): unknown => {
  try {
    return JSON.parse(input) as unknown
  } catch {
    return undefined
  }
}

/**
 * Parse an options string (typically a `data-*` attribute) into an object.
 * Strict JSON is tried first, then the relaxed form. Anything that does not
 * yield a plain object gives `{}`.
 *
 * @example
 * ```typescript
 * parseOptions('{"loop": true}')       // { loop: true }
 * parseOptions("{loop: true, dir: 'x'}") // { loop: true, dir: 'x' }
 * parseOptions('not json')             // {}
 * ```
 */
export const parseOptions = (input: unknown): Record<string, unknown> => {
  if (!is.nonEmptyString(input)) return {}

  const strict = tryParse(input)
  if (is.object(strict)) return strict

  const relaxed = tryParse(toStandardJSON(input))
  return is.object(relaxed) ? relaxed : {}
}
