import type { PluginOptions } from '../types/options'

export const PluginConfigDefaults: Readonly<PluginOptions> = Object.freeze({
  importPrefix: '',
  logToStderr: false,
  verbosity: 0,
  indent: 2,
})

export const CONFIG_NAME = 'protomanifest'
