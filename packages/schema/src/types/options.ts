/** 插件运行选项，由默认值、配置文件、命令行和 protoc 参数依次覆盖 */
export interface PluginOptions {
  /** 拼接在每个文件 import path 前的前缀 */
  importPrefix: string
  /** 是否将 info 级别日志输出到 stderr */
  logToStderr: boolean
  /** 日志详细程度，>=1 debug，>=2 trace */
  verbosity: number
  /** 生成 JSON 的缩进 */
  indent: number
}

/** protoc 参数中可识别的选项名 */
export type OptionName = 'import_prefix' | 'logtostderr' | 'v' | 'indent'

/** 配置文件内容 */
export interface PluginConfig {
  importPrefix?: string
  logToStderr?: boolean
  verbosity?: number
  indent?: number
  extends?: string | string[]
  [key: string]: unknown
}
