/**
 * live-settings-bridge
 *
 * Live preview bridge between a page-builder editor and front-end components:
 * - Declarative mapping from flat editor settings to nested component options
 * - Live key extraction to skip irrelevant changes
 * - A settings change handler with attach/detach lifecycle and a single
 *   in-flight conversion
 * - React and valtio bindings
 * - Small DOM and data utilities
 */

// =============================================================================
// CORE PUBLIC API
// =============================================================================

export type {
  DebugConfig,
  HandlerConfig,
  HandlerState,
  ResolvedHandlerConfig,
  SettingsChangeCallback,
} from './core/types'
export { DEFAULT_HANDLER_CONFIG } from './core/defaults'
export {
  createSettingsChangeHandler,
  type SettingsChangeHandler,
} from './handler/settings-change-handler'

// Mapping
export {
  collectLiveKeys,
  compileMappingRule,
  compileMappingSpec,
  convertCompiled,
  convertSettings,
  extractLiveKeys,
  formatSizeValue,
  getLiveSettings,
  isSizeUnitValue,
  isSizeValue,
  resolveValueMapping,
} from './mapping'

// Event sources
export {
  createEventTargetSource,
  createWindowSource,
  NEVER_SOURCE,
  parseSettingChangedDetail,
  SETTING_CHANGED_EVENT,
  settingChangedDetailSchema,
  type SettingChangeListener,
  type SettingChangeSource,
} from './events'

// Editor detection
export {
  createEditorDetector,
  EDITOR_INIT_EVENT,
  isEditorLoaded,
  type EditorDetectorOptions,
  type EditorFrontend,
} from './editor/editor-detector'

// =============================================================================
// REACT / VALTIO BINDINGS
// =============================================================================

export {
  createLiveOptions,
  type LiveOptionsConfig,
  type LiveOptionsStore,
} from './store/live-options'
export { useLiveOptions } from './hooks/use-live-options'
export { useSettingsChange } from './hooks/use-settings-change'

// =============================================================================
// TYPES & UTILITIES
// =============================================================================

export type {
  CompiledMapping,
  CompositeValueNode,
  ConditionalNode,
  ConvertedOptions,
  DeepPartial,
  DeepRequired,
  DirectKeyNode,
  MappingEntry,
  MappingNode,
  MappingNodeKind,
  MappingRule,
  MappingSpec,
  NestedMapNode,
  RawSettings,
  ScalarValueNode,
  SettingChangedDetail,
  SizeUnitValue,
  SizeValue,
  Unsubscribe,
} from './types'
export * from './utils'
