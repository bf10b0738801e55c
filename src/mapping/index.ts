export { compileMappingRule, compileMappingSpec } from './compile'
export { convertCompiled, convertSettings, resolveValueMapping } from './convert'
export { collectLiveKeys, extractLiveKeys, getLiveSettings } from './live-keys'
export { formatSizeValue, isSizeUnitValue, isSizeValue } from './size-value'
