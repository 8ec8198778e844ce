import type { CodeGeneratorRequest } from '@protobuf-ts/plugin-framework'
import type {
  Directive,
  GenerationResult,
  Generator,
  PluginHooks,
  PluginOptions,
  PluginOutcome,
  ProcessRequestOptions,
  ProtocPlugin,
  RunPluginOptions,
} from '@protomanifest/schema'
import { randomUUID } from 'node:crypto'
import { PluginConfigDefaults } from '@protomanifest/schema'
import { createHooks } from 'hookable'
import { runWithPluginContext } from './context'
import { toError, toErrorMessage } from './errors'
import { invokeGenerator } from './generator/invoke'
import { loadPluginConfig } from './loader/config'
import { useLogger } from './logger'
import { createOptionStore } from './parameter/options'
import { dispatchParameter } from './parameter/dispatch'
import { createRegistry } from './registry/registry'
import { buildResponse, encodeResponse } from './transport/encode'
import { decodeRequest } from './transport/decode'

export interface CreatePluginOptions {
  generator: Generator
  options?: Partial<PluginOptions>
  hooks?: Partial<PluginHooks>
}

export function createPlugin(opts: CreatePluginOptions): ProtocPlugin {
  const hooks = createHooks<PluginHooks>()
  if (opts.hooks) {
    hooks.addHooks(opts.hooks)
  }

  const plugin: ProtocPlugin = {
    __name: `protomanifest-${randomUUID()}`,
    options: { ...PluginConfigDefaults, ...opts.options },
    registry: createRegistry(),
    generator: opts.generator,
    hooks,
    hook: hooks.hook.bind(hooks),
    callHook: hooks.callHook.bind(hooks),
    runWithContext: fn => runWithPluginContext(plugin, fn),
  }

  // hook 执行时注入插件上下文
  const { callHook } = hooks
  hooks.callHook = (...args) => runWithPluginContext(plugin, () => callHook(...args))
  plugin.callHook = hooks.callHook.bind(hooks)

  return plugin
}

async function generate(plugin: ProtocPlugin, request: CodeGeneratorRequest, opts: ProcessRequestOptions): Promise<GenerationResult> {
  const logger = useLogger('protomanifest')

  // 1. 配置文件 + 命令行
  const config = await loadPluginConfig({
    cwd: opts.cwd,
    configFile: opts.configFile,
    overrides: opts.overrides,
  })
  plugin.__configFile = config.configFile

  // 2. protoc 参数
  const store = createOptionStore(config.options)
  let directives: Directive[]
  try {
    directives = dispatchParameter(request.parameter, store, plugin.registry)
  }
  finally {
    plugin.options = store.snapshot()
  }
  await plugin.callHook('options:resolved', plugin.options, directives)

  // 3. 加载注册表
  plugin.registry.setPrefix(plugin.options.importPrefix)
  plugin.registry.load(request)
  await plugin.callHook('registry:loaded', plugin.registry)

  // 4. 生成
  const files = await invokeGenerator(
    request,
    plugin.registry,
    plugin.generator,
    { options: plugin.options, registry: plugin.registry },
    plugin.callHook,
  )
  logger.debug('Processed code generator request')
  return { kind: 'files', files }
}

/**
 * 处理已解码的请求；领域错误转换为响应中的 error 字段，不向外抛出
 */
export async function processRequest(request: CodeGeneratorRequest, opts: ProcessRequestOptions): Promise<GenerationResult> {
  const plugin = createPlugin({ generator: opts.generator, hooks: opts.hooks })

  return plugin.runWithContext(async (): Promise<GenerationResult> => {
    try {
      return await generate(plugin, request, opts)
    }
    catch (error) {
      useLogger('protomanifest').error(toError(error))
      return { kind: 'error', message: toErrorMessage(error) }
    }
  })
}

export async function runPlugin(opts: RunPluginOptions): Promise<PluginOutcome> {
  const logger = useLogger('protomanifest')
  logger.debug('Processing code generator request')

  let request: CodeGeneratorRequest
  try {
    request = await decodeRequest(opts.input)
  }
  catch (error) {
    return { kind: 'fatal', stage: 'decode', error: toError(error) }
  }

  const result = await processRequest(request, opts)

  try {
    await encodeResponse(buildResponse(result), opts.output)
  }
  catch (error) {
    return { kind: 'fatal', stage: 'encode', error: toError(error) }
  }

  return { kind: 'emitted', result }
}
