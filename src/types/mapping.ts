/**
 * Mapping types
 *
 * A mapping spec describes how a flat dictionary of upstream editor settings
 * maps onto a component's (possibly nested) options object.
 *
 * @example
 * ```typescript
 * const spec: MappingSpec = {
 *   color: 'background_color',
 *   speed: { condition: 'enable_autoplay', value: 'autoplay_speed' },
 *   gap: { value: 'items_gap', return_size: true },
 *   columns: {
 *     desktop: 'columns',
 *     tablet: 'columns_tablet',
 *   },
 * }
 * ```
 */

/**
 * Structured mapping entry. Which fields are present decides how the entry
 * resolves (see {@link MappingNode}).
 */
export interface MappingRule {
  /** Upstream key whose falsy value forces the option to `false` */
  condition?: string
  /** Upstream key, or a nested mapping resolved member by member */
  value?: string | MappingSpec
  /** Reduce `{ size, unit }` values: `true` → size, `false` → "size+unit" */
  return_size?: boolean
}

/** Upstream key, rule, or a nested map of further entries */
export type MappingEntry = string | MappingRule | MappingSpec

/** Local option name → upstream key or rule */
export interface MappingSpec {
  [optionName: string]: MappingEntry
}

// ---------------------------------------------------------------------------
// Compiled form
// ---------------------------------------------------------------------------

/** Bare upstream key, copied when defined */
export interface DirectKeyNode {
  kind: 'direct'
  key: string
}

/** Gate on an upstream key; `then` is null when the rule carries nothing else */
export interface ConditionalNode {
  kind: 'conditional'
  condition: string
  then: MappingNode | null
}

/** `{ value: 'key' }` with optional size reduction */
export interface ScalarValueNode {
  kind: 'scalar'
  key: string
  returnSize: boolean | undefined
}

/** `{ value: { ... } }`: members resolved one level down */
export interface CompositeValueNode {
  kind: 'composite'
  members: CompiledMapping
}

/** Plain nested map without `value` or `condition` */
export interface NestedMapNode {
  kind: 'nested'
  members: CompiledMapping
}

export type MappingNode =
  | DirectKeyNode
  | ConditionalNode
  | ScalarValueNode
  | CompositeValueNode
  | NestedMapNode

export type MappingNodeKind = MappingNode['kind']

export type CompiledMapping = Record<string, MappingNode>
