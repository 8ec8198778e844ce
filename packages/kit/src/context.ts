import type { ProtocPlugin } from '@protomanifest/schema'
import { AsyncLocalStorage } from 'node:async_hooks'
import { createContext } from 'unctx'

// 异步本地存储上下文，保存当前运行的插件实例
const asyncPluginStorage = createContext<ProtocPlugin>({
  asyncContext: true,
  AsyncLocalStorage,
})

export function usePlugin(): ProtocPlugin {
  const instance = asyncPluginStorage.tryUse()
  if (!instance) {
    throw new Error('Plugin instance is unavailable!')
  }
  return instance
}

export function tryUsePlugin(): ProtocPlugin | null {
  return asyncPluginStorage.tryUse()
}

export function runWithPluginContext<T extends (...args: any[]) => any>(plugin: ProtocPlugin, fn: T): ReturnType<T> {
  return asyncPluginStorage.call(plugin, fn)
}
