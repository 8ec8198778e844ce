import { LogLevels } from 'consola'
import { describe, expect, it } from 'vitest'
import * as kit from '../src'
import * as internal from '../src/internal'

describe('kit exports', () => {
  it('根入口暴露生成器 API', () => {
    expect(kit.defineGenerator).toBeTypeOf('function')
    expect(kit.useLogger).toBeTypeOf('function')
    expect(kit.usePlugin).toBeTypeOf('function')
    expect(kit.tryUsePlugin).toBeTypeOf('function')
    expect(kit.parseParameter).toBeTypeOf('function')

    expect('runPlugin' in kit).toBe(false)
    expect('createRegistry' in kit).toBe(false)
    expect('runWithPluginContext' in kit).toBe(false)
  })

  it('internal 子路径暴露内核 API', () => {
    expect(internal.runPlugin).toBeTypeOf('function')
    expect(internal.processRequest).toBeTypeOf('function')
    expect(internal.createRegistry).toBeTypeOf('function')
    expect(internal.runWithPluginContext).toBeTypeOf('function')
  })
})

describe('logger', () => {
  it('maps verbosity flags to log levels', () => {
    expect(internal.resolveLogLevel({ logToStderr: false, verbosity: 0 })).toBe(LogLevels.warn)
    expect(internal.resolveLogLevel({ logToStderr: true, verbosity: 0 })).toBe(LogLevels.info)
    expect(internal.resolveLogLevel({ logToStderr: false, verbosity: 1 })).toBe(LogLevels.debug)
    expect(internal.resolveLogLevel({ logToStderr: true, verbosity: 3 })).toBe(LogLevels.trace)
  })

  it('uses the active plugin options', () => {
    const plugin = internal.createPlugin({
      generator: kit.defineGenerator({ name: 'noop', generate: () => [] }),
      options: { verbosity: 1 },
    })
    expect(kit.useLogger('test').level).toBe(LogLevels.warn)
    expect(plugin.runWithContext(() => kit.useLogger('test').level)).toBe(LogLevels.debug)
  })
})

describe('plugin context', () => {
  it('is only available inside runWithContext', () => {
    const plugin = internal.createPlugin({ generator: kit.defineGenerator({ name: 'noop', generate: () => [] }) })
    expect(kit.tryUsePlugin()).toBeFalsy()
    expect(() => kit.usePlugin()).toThrowError('Plugin instance is unavailable!')
    expect(plugin.runWithContext(() => kit.usePlugin().__name)).toBe(plugin.__name)
  })
})
