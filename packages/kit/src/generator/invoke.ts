import type { CodeGeneratorRequest } from '@protobuf-ts/plugin-framework'
import type { Generator, GeneratorContext, OutputFile, ProtocPlugin, ResolvedFile, SchemaRegistry } from '@protomanifest/schema'
import { GenerationError, isPluginError, NotFoundError, ResolutionError, toError } from '../errors'
import { useLogger } from '../logger'

/** Targets in file_to_generate order. */
export function resolveTargets(request: CodeGeneratorRequest, registry: SchemaRegistry): ResolvedFile[] {
  return request.fileToGenerate.map((target) => {
    try {
      return registry.lookupFile(target)
    }
    catch (error) {
      if (error instanceof NotFoundError) {
        throw new ResolutionError(target, error)
      }
      throw error
    }
  })
}

function validateOutputName(name: string): string | undefined {
  if (!name) {
    return 'output file without a name'
  }
  if (name.startsWith('/') || /^[a-z]:/i.test(name)) {
    return `output file name must be relative: ${name}`
  }
  if (name.includes('\\')) {
    return `output file name must use "/" as separator: ${name}`
  }
  if (name.split('/').some(segment => segment === '.' || segment === '..' || segment === '')) {
    return `output file name contains an invalid segment: ${name}`
  }
  return undefined
}

export function validateOutputFiles(generator: string, files: OutputFile[]): void {
  const seen = new Set<string>()
  for (const file of files) {
    const problem = validateOutputName(file.name)
    if (problem) {
      throw new GenerationError(`[${generator}] ${problem}`)
    }
    if (seen.has(file.name)) {
      throw new GenerationError(`[${generator}] duplicate output file: ${file.name}`)
    }
    seen.add(file.name)
  }
}

export async function generateFiles(targets: ResolvedFile[], generator: Generator, ctx: GeneratorContext): Promise<OutputFile[]> {
  let files: OutputFile[]
  try {
    files = await generator.generate(targets, ctx)
  }
  catch (error) {
    if (isPluginError(error)) {
      throw error
    }
    throw new GenerationError(`[${generator.name}] ${toError(error).message}`, error)
  }
  validateOutputFiles(generator.name, files)
  return files
}

export async function invokeGenerator(
  request: CodeGeneratorRequest,
  registry: SchemaRegistry,
  generator: Generator,
  ctx: GeneratorContext,
  callHook?: ProtocPlugin['callHook'],
): Promise<OutputFile[]> {
  const logger = useLogger('protomanifest:generate')
  const targets = resolveTargets(request, registry)

  await callHook?.('generate:before', targets)
  logger.debug(`Generating ${targets.length} target(s) with ${generator.name}`)
  const files = await generateFiles(targets, generator, ctx)
  await callHook?.('generate:done', files)

  // hook 可能改动了 files，需要再次校验
  validateOutputFiles(generator.name, files)
  if (targets.length > 0 && files.length === 0) {
    throw new GenerationError(`[${generator.name}] no output for ${targets.length} target(s)`)
  }
  logger.debug(`Generated ${files.length} file(s)`)
  return files
}
