/**
 * Utility functions
 *
 * Small DOM and data helpers shipped alongside the settings bridge.
 */

export {
  filterDataAttributes,
  parseAttribute,
  parseDataAttributes,
  type DataAttribute,
  type DataAttributeOptions,
} from './data-attributes'
export { debounce, type Debounced } from './debounce'
export { deepMerge, deepMergeAll } from './deep-merge'
export { is } from './is'
export { parseOptions, toStandardJSON } from './json'
export { createLogger, type Logger, type LoggerOptions } from './log'
export {
  detectMediaFromURL,
  getMediaType,
  type FileMediaType,
  type MediaType,
} from './media-type'
