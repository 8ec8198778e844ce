import type { Directive, SchemaRegistry } from '@protomanifest/schema'
import type { OptionStore } from './options'
import { useLogger } from '../logger'
import { parseParameter } from './parse'

export function applyDirective(directive: Directive, store: OptionStore, registry: SchemaRegistry): void {
  if (directive.kind === 'package') {
    registry.addPackageMapping(directive.protoPath, directive.mappedPackage)
    return
  }
  store.set(directive.name, directive.value)
}

/**
 * 顺序应用参数中的指令，遇到第一个无效指令即中止
 */
export function dispatchParameter(parameter: string | undefined, store: OptionStore, registry: SchemaRegistry): Directive[] {
  const logger = useLogger('protomanifest:parameter')
  const directives = parseParameter(parameter)

  for (const directive of directives) {
    applyDirective(directive, store, registry)
  }

  logger.debug(`Applied ${directives.length} parameter directive(s)`)
  return directives
}
