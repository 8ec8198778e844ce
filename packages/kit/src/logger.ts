import type { PluginOptions } from '@protomanifest/schema'
import type { ConsolaInstance, ConsolaOptions, LogLevel } from 'consola'
import process from 'node:process'
import { createConsola, LogLevels } from 'consola'
import { tryUsePlugin } from './context'

// stdout 只用于写出响应，日志全部走 stderr
export const logger: ConsolaInstance = createConsola({
  level: LogLevels.warn,
  stdout: process.stderr,
  stderr: process.stderr,
})

export function resolveLogLevel(options: Pick<PluginOptions, 'logToStderr' | 'verbosity'>): LogLevel {
  if (options.verbosity >= 2) {
    return LogLevels.trace
  }
  if (options.verbosity >= 1) {
    return LogLevels.debug
  }
  return options.logToStderr ? LogLevels.info : LogLevels.warn
}

export function useLogger(tag?: string, options: Partial<ConsolaOptions> = {}): ConsolaInstance {
  const plugin = tryUsePlugin()
  if (plugin) {
    options.level = resolveLogLevel(plugin.options)
  }
  const instance = logger.create(options)
  return tag ? instance.withTag(tag) : instance
}
