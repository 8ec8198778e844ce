export { CONFIG_NAME, PluginConfigDefaults } from './config'

// 类型
export * from './types/directive'
export * from './types/generator'
export * from './types/hooks'
export * from './types/options'
export * from './types/plugin'
export * from './types/registry'
