import type { Hookable } from 'hookable'
import type { Readable, Writable } from 'node:stream'
import type { Generator, GenerationResult } from './generator'
import type { PluginHooks } from './hooks'
import type { PluginConfig, PluginOptions } from './options'
import type { SchemaRegistry } from './registry'

export interface ProtocPlugin {
  /** 名称 */
  __name: string
  /** 配置文件路径 */
  __configFile?: string

  /** 当前生效的选项 */
  options: PluginOptions
  registry: SchemaRegistry
  generator: Generator

  /** 钩子 */
  hooks: Hookable<PluginHooks>
  hook: ProtocPlugin['hooks']['hook']
  callHook: ProtocPlugin['hooks']['callHook']

  /** 基于上下文运行 */
  runWithContext: <T extends (...args: any[]) => any>(fn: T) => ReturnType<T>
}

export type PluginOutcome =
  | { kind: 'fatal', stage: 'decode' | 'encode', error: Error }
  | { kind: 'emitted', result: GenerationResult }

export interface ProcessRequestOptions {
  generator: Generator
  /** Working directory searched for the config file. */
  cwd?: string
  /** Config file name without extension, or `false` to skip loading one. */
  configFile?: string | false
  /** Overrides applied after the config file and before the protoc parameter. */
  overrides?: PluginConfig
  hooks?: Partial<PluginHooks>
}

export interface RunPluginOptions extends ProcessRequestOptions {
  input: Readable
  output: Writable
}
