import type { Directive } from '@protomanifest/schema'
import { PACKAGE_MAPPING_MARKER } from '@protomanifest/schema'
import { DispatchError } from '../errors'

const DIRECTIVE_SEPARATOR = ','
const VALUE_SEPARATOR = '='

/**
 * 解析 protoc 参数字符串，如 `import_prefix=foo,Mapi/a.proto=pkg.a,logtostderr`
 */
export function parseParameter(parameter: string | undefined): Directive[] {
  if (!parameter) {
    return []
  }

  return parameter.split(DIRECTIVE_SEPARATOR).map((token, index) => parseDirective(token, index))
}

function parseDirective(token: string, index: number): Directive {
  if (!token) {
    throw new DispatchError('INVALID_DIRECTIVE', `empty directive at position ${index}`)
  }

  const at = token.indexOf(VALUE_SEPARATOR)
  if (at < 0) {
    return { kind: 'option', name: token, value: '' }
  }

  const name = token.slice(0, at)
  const value = token.slice(at + 1)

  if (name.startsWith(PACKAGE_MAPPING_MARKER)) {
    const protoPath = name.slice(PACKAGE_MAPPING_MARKER.length)
    if (!protoPath) {
      throw new DispatchError('INVALID_DIRECTIVE', `package mapping without a proto path: ${token}`)
    }
    return { kind: 'package', protoPath, mappedPackage: value }
  }

  if (!name) {
    throw new DispatchError('INVALID_DIRECTIVE', `directive without a name: ${token}`)
  }
  return { kind: 'option', name, value }
}

export function formatDirective(directive: Directive): string {
  if (directive.kind === 'package') {
    return `${PACKAGE_MAPPING_MARKER}${directive.protoPath}${VALUE_SEPARATOR}${directive.mappedPackage}`
  }
  return directive.value ? `${directive.name}${VALUE_SEPARATOR}${directive.value}` : directive.name
}

export function formatParameter(directives: Directive[]): string {
  return directives.map(formatDirective).join(DIRECTIVE_SEPARATOR)
}
