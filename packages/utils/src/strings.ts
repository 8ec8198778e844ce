import { dirname, join } from 'pathe'

/**
 * protoc 的 json_name 规则：去掉下划线，下划线后的字符转大写
 */
export function toJsonName(fieldName: string): string {
  let out = ''
  let upperNext = false
  for (const char of fieldName) {
    if (char === '_') {
      upperNext = true
      continue
    }
    out += upperNext ? char.toUpperCase() : char
    upperNext = false
  }
  return out
}

export function stripProtoExtension(name: string): string {
  return name.endsWith('.proto') ? name.slice(0, -'.proto'.length) : name
}

export function normalizeSlashes(input: string): string {
  return input.replace(/\\/g, '/')
}

/** `.pkg.Outer` + `Inner` -> `.pkg.Outer.Inner` */
export function qualifyName(scope: string, name: string): string {
  return scope ? `${scope}.${name}` : `.${name}`
}

export function packageScope(pkg: string): string {
  return pkg ? `.${pkg}` : ''
}

/**
 * 计算文件的 import path：映射优先，否则取所在目录，最后拼接前缀
 */
export function resolveImportPath(fileName: string, mapped: string | undefined, prefix: string): string {
  const base = mapped ?? dirname(normalizeSlashes(fileName))
  return prefix ? join(prefix, base) : base
}
