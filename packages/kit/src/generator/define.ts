import type { Generator, GeneratorDefinition } from '@protomanifest/schema'

export function defineGenerator(definition: GeneratorDefinition): Generator {
  const name = definition.name.trim()
  if (!name) {
    throw new TypeError('Generator name must be non-empty')
  }

  return {
    name,
    generate: async (targets, ctx) => definition.generate(targets, ctx),
  }
}
