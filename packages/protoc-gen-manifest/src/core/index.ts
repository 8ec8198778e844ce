import type { PluginConfig, PluginHooks, PluginOutcome } from '@protomanifest/schema'
import type { Readable, Writable } from 'node:stream'
import { createReadStream } from 'node:fs'
import process from 'node:process'
import { runPlugin } from '@protomanifest/kit/internal'
import { createManifestGenerator } from './manifest/generator'

export const STDIN_SOURCE = 'stdin'

export interface RunManifestPluginOptions {
  /** `stdin`, or a path to a serialized CodeGeneratorRequest. */
  file?: string
  importPrefix?: string
  cwd?: string
  configFile?: string | false
  output?: Writable
  hooks?: Partial<PluginHooks>
}

export function openInput(file: string = STDIN_SOURCE): Readable {
  return file === STDIN_SOURCE ? process.stdin : createReadStream(file)
}

export async function runManifestPlugin(opts: RunManifestPluginOptions = {}): Promise<PluginOutcome> {
  const overrides: PluginConfig = {}
  // 只有显式传入时才覆盖配置文件
  if (opts.importPrefix) {
    overrides.importPrefix = opts.importPrefix
  }

  return runPlugin({
    input: openInput(opts.file),
    output: opts.output ?? process.stdout,
    generator: createManifestGenerator(),
    cwd: opts.cwd,
    configFile: opts.configFile,
    overrides,
    hooks: opts.hooks,
  })
}
