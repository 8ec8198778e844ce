import type { OptionName, PluginOptions } from '@protomanifest/schema'
import { PluginConfigDefaults } from '@protomanifest/schema'
import { DispatchError } from '../errors'

interface OptionHandler<K extends keyof PluginOptions> {
  key: K
  parse: (raw: string) => PluginOptions[K] | undefined
}

type AnyOptionHandler = { [K in keyof PluginOptions]: OptionHandler<K> }[keyof PluginOptions]

const TRUE_VALUES = new Set(['', '1', 't', 'T', 'TRUE', 'true', 'True'])
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False'])

function parseBoolean(raw: string): boolean | undefined {
  if (TRUE_VALUES.has(raw)) {
    return true
  }
  if (FALSE_VALUES.has(raw)) {
    return false
  }
  return undefined
}

function integerIn([min, max]: readonly [number, number]): (raw: string) => number | undefined {
  return (raw) => {
    if (!/^\d+$/.test(raw)) {
      return undefined
    }
    const value = Number.parseInt(raw, 10)
    return value >= min && value <= max ? value : undefined
  }
}

/** Inclusive bounds of the integer options. */
export const INTEGER_RANGES = {
  verbosity: [0, 9],
  indent: [0, 8],
} as const satisfies Partial<Record<keyof PluginOptions, readonly [number, number]>>

export const OPTION_HANDLERS: Readonly<Record<OptionName, AnyOptionHandler>> = {
  import_prefix: { key: 'importPrefix', parse: raw => raw },
  logtostderr: { key: 'logToStderr', parse: parseBoolean },
  v: { key: 'verbosity', parse: integerIn(INTEGER_RANGES.verbosity) },
  indent: { key: 'indent', parse: integerIn(INTEGER_RANGES.indent) },
}

export function isOptionName(name: string): name is OptionName {
  return Object.hasOwn(OPTION_HANDLERS, name)
}

function assign<K extends keyof PluginOptions>(target: PluginOptions, handler: OptionHandler<K>, name: string, raw: string): void {
  const value = handler.parse(raw)
  if (value === undefined) {
    throw new DispatchError('INVALID_OPTION_VALUE', `invalid value "${raw}" for option ${name}`)
  }
  target[handler.key] = value
}

export interface OptionStore {
  /** Last write wins. */
  set: (name: string, value: string) => void
  get: <K extends keyof PluginOptions>(key: K) => PluginOptions[K]
  snapshot: () => PluginOptions
}

export function createOptionStore(initial: Partial<PluginOptions> = {}): OptionStore {
  const options: PluginOptions = { ...PluginConfigDefaults, ...initial }

  return {
    set(name, value) {
      if (!isOptionName(name)) {
        throw new DispatchError('UNKNOWN_OPTION', `unknown option: ${name}`)
      }
      assign(options, OPTION_HANDLERS[name], name, value)
    },
    get: key => options[key],
    snapshot: () => ({ ...options }),
  }
}
