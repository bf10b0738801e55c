import { SETTING_CHANGED_EVENT } from '../events/source'
import type { ResolvedHandlerConfig } from './types'

export const DEFAULT_HANDLER_CONFIG: ResolvedHandlerConfig = {
  eventName: SETTING_CHANGED_EVENT,
  additionalLiveKeys: [],
  debug: {
    log: false,
  },
}
