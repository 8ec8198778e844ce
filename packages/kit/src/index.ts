export { tryUsePlugin, usePlugin } from './context'
export {
  ConfigError,
  DecodeError,
  DispatchError,
  EncodeError,
  GenerationError,
  isPluginError,
  LoadError,
  NotFoundError,
  PluginError,
  type PluginErrorCode,
  ResolutionError,
  toErrorMessage,
} from './errors'
// generator
export { defineGenerator } from './generator/define'

export { logger, useLogger } from './logger'
export { formatParameter, parseParameter } from './parameter/parse'
