import type { Directive } from './directive'
import type { OutputFile } from './generator'
import type { PluginOptions } from './options'
import type { ResolvedFile, SchemaRegistry } from './registry'

export type HookResult = Promise<void> | void

export interface PluginHooks {
  /**
   * protoc 参数分发完成
   * @param options 最终生效的选项
   * @param directives 按顺序应用的指令
   */
  'options:resolved': (options: Readonly<PluginOptions>, directives: Directive[]) => HookResult
  /**
   * 注册表加载完成
   */
  'registry:loaded': (registry: SchemaRegistry) => HookResult
  /**
   * 生成之前
   * @param targets 待生成的文件，顺序同 file_to_generate
   */
  'generate:before': (targets: ResolvedFile[]) => HookResult
  /**
   * 生成之后，可以直接修改 files
   */
  'generate:done': (files: OutputFile[]) => HookResult
}
