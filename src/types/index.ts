/**
 * Public type surface
 */

export type {
  CompiledMapping,
  CompositeValueNode,
  ConditionalNode,
  DirectKeyNode,
  MappingEntry,
  MappingNode,
  MappingNodeKind,
  MappingRule,
  MappingSpec,
  NestedMapNode,
  ScalarValueNode,
} from './mapping'
export type {
  ConvertedOptions,
  RawSettings,
  SettingChangedDetail,
  SizeUnitValue,
  SizeValue,
} from './settings'
export type { DeepPartial, DeepRequired, Unsubscribe } from './utils'
