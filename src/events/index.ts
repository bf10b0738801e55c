export {
  parseSettingChangedDetail,
  settingChangedDetailSchema,
} from './schema'
export {
  createEventTargetSource,
  createWindowSource,
  NEVER_SOURCE,
  SETTING_CHANGED_EVENT,
  type SettingChangeListener,
  type SettingChangeSource,
} from './source'
