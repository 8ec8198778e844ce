import type { PluginConfig, PluginOptions } from '@protomanifest/schema'
import process from 'node:process'
import { CONFIG_NAME, PluginConfigDefaults } from '@protomanifest/schema'
import { loadConfig } from 'c12'
import { defu } from 'defu'
import { ConfigError, toError } from '../errors'
import { INTEGER_RANGES } from '../parameter/options'

export interface LoadPluginConfigOptions {
  cwd?: string
  /** Config file name without extension, `false` skips the lookup. */
  configFile?: string | false
  /** Applied over the config file, e.g. command line flags. */
  overrides?: PluginConfig
}

export interface LoadedPluginConfig {
  options: PluginOptions
  configFile?: string
}

type OptionKind = 'string' | 'boolean' | 'integer'

const CONFIG_KINDS: Record<keyof PluginOptions, OptionKind> = {
  importPrefix: 'string',
  logToStderr: 'boolean',
  verbosity: 'integer',
  indent: 'integer',
}

function isOptionKey(key: string): key is keyof PluginOptions {
  return Object.hasOwn(CONFIG_KINDS, key)
}

function isRangedKey(key: keyof PluginOptions): key is keyof typeof INTEGER_RANGES {
  return Object.hasOwn(INTEGER_RANGES, key)
}

function matchesKind(value: unknown, kind: OptionKind): boolean {
  if (kind === 'integer') {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0
  }
  return typeof value === kind
}

/**
 * 校验合并后的配置，未知字段或类型不符都视为错误
 */
export function resolvePluginOptions(config: PluginConfig): PluginOptions {
  const options: PluginOptions = { ...PluginConfigDefaults }

  for (const [key, value] of Object.entries(config)) {
    if (key === 'extends' || key.startsWith('$') || key.startsWith('_') || value === undefined) {
      continue
    }
    if (!isOptionKey(key)) {
      throw new ConfigError(`unknown config key: ${key}`)
    }
    if (!matchesKind(value, CONFIG_KINDS[key])) {
      throw new ConfigError(`config key ${key} must be of type ${CONFIG_KINDS[key]}, received ${JSON.stringify(value)}`)
    }
    if (typeof value === 'number' && isRangedKey(key)) {
      const [min, max] = INTEGER_RANGES[key]
      if (value < min || value > max) {
        throw new ConfigError(`config key ${key} must be between ${min} and ${max}, received ${value}`)
      }
    }
  }

  const merged = defu(config, PluginConfigDefaults)
  options.importPrefix = String(merged.importPrefix)
  options.logToStderr = merged.logToStderr === true
  options.verbosity = Number(merged.verbosity)
  options.indent = Number(merged.indent)
  return options
}

export async function loadPluginConfig(options: LoadPluginConfigOptions = {}): Promise<LoadedPluginConfig> {
  const overrides = options.overrides ?? {}

  if (options.configFile === false) {
    return { options: resolvePluginOptions(overrides) }
  }

  let loaded: { config?: PluginConfig | null, configFile?: string }
  try {
    loaded = await loadConfig<PluginConfig>({
      cwd: options.cwd || process.cwd(),
      name: CONFIG_NAME,
      configFile: options.configFile || `${CONFIG_NAME}.config`,
      rcFile: false,
      globalRc: false,
      dotenv: false,
      packageJson: false,
      extend: { extendKey: ['extends'] },
    })
  }
  catch (error) {
    throw new ConfigError(`failed to load config: ${toError(error).message}`, error)
  }

  return {
    options: resolvePluginOptions(defu(overrides, loaded.config ?? {})),
    configFile: loaded.configFile,
  }
}
