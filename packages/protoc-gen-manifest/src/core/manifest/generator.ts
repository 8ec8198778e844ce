import type { Generator, OutputFile } from '@protomanifest/schema'
import { defineGenerator, GenerationError, useLogger } from '@protomanifest/kit'
import { stripProtoExtension } from '@protomanifest/utils'
import { renderManifest } from './render'

export const MANIFEST_SUFFIX = '.manifest.json'

export function manifestFileName(protoFile: string): string {
  return `${stripProtoExtension(protoFile)}${MANIFEST_SUFFIX}`
}

export function createManifestGenerator(): Generator {
  return defineGenerator({
    name: 'manifest',
    generate(targets, { options }) {
      const logger = useLogger('protomanifest:manifest')
      const files: OutputFile[] = []
      const sources = new Map<string, string>()

      for (const target of targets) {
        const name = manifestFileName(target.name)
        const previous = sources.get(name)
        if (previous) {
          throw new GenerationError(`${previous} and ${target.name} both map to ${name}`)
        }
        sources.set(name, target.name)

        files.push({ name, content: renderManifest(target, options.indent) })
        logger.debug(`${target.name} -> ${name}`)
      }
      return files
    },
  })
}
