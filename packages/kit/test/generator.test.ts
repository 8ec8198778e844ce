import type { GeneratorContext } from '@protomanifest/schema'
import { PluginConfigDefaults } from '@protomanifest/schema'
import { describe, expect, it, vi } from 'vitest'
import { defineGenerator, GenerationError, ResolutionError } from '../src'
import { createRegistry, invokeGenerator, resolveTargets } from '../src/internal'
import { commonFile, createRequest, userFile } from './helpers'

function setup(fileToGenerate: string[]) {
  const request = createRequest({ protoFile: [commonFile(), userFile()], fileToGenerate })
  const registry = createRegistry()
  registry.load(request)
  const ctx: GeneratorContext = { options: PluginConfigDefaults, registry }
  return { request, registry, ctx }
}

describe('defineGenerator', () => {
  it('requires a name', () => {
    expect(() => defineGenerator({ name: '  ', generate: () => [] })).toThrowError('Generator name must be non-empty')
  })

  it('always returns a promise', async () => {
    const generator = defineGenerator({ name: 'sync', generate: () => [{ name: 'a.txt', content: 'a' }] })
    const { ctx } = setup([])
    await expect(generator.generate([], ctx)).resolves.toEqual([{ name: 'a.txt', content: 'a' }])
  })
})

describe('invokeGenerator', () => {
  it('passes targets as one batch in request order', async () => {
    const { request, registry, ctx } = setup(['acme/v1/user.proto', 'acme/v1/common.proto'])
    const generate = vi.fn((targets: Array<{ name: string }>) => targets.map(target => ({ name: `${target.name}.txt`, content: '' })))
    const generator = defineGenerator({ name: 'echo', generate })

    const files = await invokeGenerator(request, registry, generator, ctx)

    expect(generate).toHaveBeenCalledTimes(1)
    expect(files.map(file => file.name)).toEqual(['acme/v1/user.proto.txt', 'acme/v1/common.proto.txt'])
  })

  it('fails resolution for targets missing from the request', () => {
    const { request, registry } = setup(['acme/v1/user.proto', 'acme/v1/order.proto'])
    expect(() => resolveTargets(request, registry)).toThrowError(ResolutionError)
    expect(() => resolveTargets(request, registry)).toThrowError(
      'cannot resolve file to generate "acme/v1/order.proto": no such file given: acme/v1/order.proto',
    )
  })

  it('does not call the generator when a target cannot be resolved', async () => {
    const { request, registry, ctx } = setup(['acme/v1/order.proto'])
    const generate = vi.fn(() => [])
    await expect(invokeGenerator(request, registry, defineGenerator({ name: 'never', generate }), ctx)).rejects.toBeInstanceOf(ResolutionError)
    expect(generate).not.toHaveBeenCalled()
  })

  it('wraps generator failures', async () => {
    const { request, registry, ctx } = setup(['acme/v1/user.proto'])
    const generator = defineGenerator({
      name: 'faulty',
      generate: () => {
        throw new Error('template missing')
      },
    })
    await expect(invokeGenerator(request, registry, generator, ctx)).rejects.toThrowError(GenerationError)
    await expect(invokeGenerator(request, registry, generator, ctx)).rejects.toThrowError('[faulty] template missing')
  })

  it.each([
    ['', 'output file without a name'],
    ['/abs/a.txt', 'output file name must be relative: /abs/a.txt'],
    ['a\\b.txt', 'output file name must use "/" as separator: a\\b.txt'],
    ['a/../b.txt', 'output file name contains an invalid segment: a/../b.txt'],
  ])('rejects the output name %j', async (name, message) => {
    const { request, registry, ctx } = setup(['acme/v1/user.proto'])
    const generator = defineGenerator({ name: 'bad', generate: () => [{ name, content: '' }] })
    await expect(invokeGenerator(request, registry, generator, ctx)).rejects.toThrowError(`[bad] ${message}`)
  })

  it('rejects duplicate output names', async () => {
    const { request, registry, ctx } = setup(['acme/v1/user.proto'])
    const generator = defineGenerator({
      name: 'dup',
      generate: () => [{ name: 'x.txt', content: '1' }, { name: 'x.txt', content: '2' }],
    })
    await expect(invokeGenerator(request, registry, generator, ctx)).rejects.toThrowError('[dup] duplicate output file: x.txt')
  })
})
