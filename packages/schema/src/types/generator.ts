import type { PluginOptions } from './options'
import type { ResolvedFile, SchemaRegistry } from './registry'

type Awaitable<T> = T | Promise<T>

export interface OutputFile {
  /** Relative to the protoc output directory, `/`-separated. */
  name: string
  content: string
}

export interface GeneratorContext {
  options: Readonly<PluginOptions>
  registry: SchemaRegistry
}

export interface GeneratorDefinition {
  name: string
  generate: (targets: ResolvedFile[], ctx: GeneratorContext) => Awaitable<OutputFile[]>
}

export interface Generator {
  readonly name: string
  generate: (targets: ResolvedFile[], ctx: GeneratorContext) => Promise<OutputFile[]>
}

export type GenerationResult =
  | { kind: 'files', files: OutputFile[] }
  | { kind: 'error', message: string }
