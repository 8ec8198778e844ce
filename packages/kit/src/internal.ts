export { runWithPluginContext } from './context'
export { generateFiles, invokeGenerator, resolveTargets, validateOutputFiles } from './generator/invoke'
export { loadPluginConfig, type LoadPluginConfigOptions, resolvePluginOptions } from './loader/config'
export { resolveLogLevel } from './logger'
export { applyDirective, dispatchParameter } from './parameter/dispatch'
export { createOptionStore, isOptionName, OPTION_HANDLERS, type OptionStore } from './parameter/options'
export { createPlugin, type CreatePluginOptions, processRequest, runPlugin } from './plugin'
export { createRegistry } from './registry/registry'
export { buildResponse, encodeResponse, serializeResponse } from './transport/encode'
export { decodeRequest, parseRequest } from './transport/decode'
export { readAll, writeAll } from './transport/stream'
