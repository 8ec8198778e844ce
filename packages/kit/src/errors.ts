export const PLUGIN_ERROR_CODES = [
  // transport, fatal
  'DECODE_FAILED',
  'ENCODE_FAILED',
  // domain, reported in the response
  'CONFIG_INVALID',
  'UNKNOWN_OPTION',
  'INVALID_OPTION_VALUE',
  'INVALID_DIRECTIVE',
  'LOAD_FAILED',
  'FILE_NOT_FOUND',
  'RESOLUTION_FAILED',
  'GENERATION_FAILED',
] as const

export type PluginErrorCode = (typeof PLUGIN_ERROR_CODES)[number]

export class PluginError extends Error {
  readonly code: PluginErrorCode
  /** No response can be written when this is set. */
  readonly fatal: boolean

  constructor(code: PluginErrorCode, message: string, options: { fatal?: boolean, cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.code = code
    this.fatal = options.fatal ?? false
  }
}

export class DecodeError extends PluginError {
  constructor(message: string, cause?: unknown) {
    super('DECODE_FAILED', message, { fatal: true, cause })
  }
}

export class EncodeError extends PluginError {
  constructor(message: string, cause?: unknown) {
    super('ENCODE_FAILED', message, { fatal: true, cause })
  }
}

export class ConfigError extends PluginError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG_INVALID', message, { cause })
  }
}

export class DispatchError extends PluginError {
  constructor(code: 'UNKNOWN_OPTION' | 'INVALID_OPTION_VALUE' | 'INVALID_DIRECTIVE', message: string) {
    super(code, message)
  }
}

export class LoadError extends PluginError {
  constructor(message: string) {
    super('LOAD_FAILED', message)
  }
}

export class NotFoundError extends PluginError {
  constructor(message: string) {
    super('FILE_NOT_FOUND', message)
  }
}

export class ResolutionError extends PluginError {
  constructor(target: string, cause: NotFoundError) {
    super('RESOLUTION_FAILED', `cannot resolve file to generate "${target}": ${cause.message}`, { cause })
  }
}

export class GenerationError extends PluginError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_FAILED', message, { cause })
  }
}

export function isPluginError(error: unknown): error is PluginError {
  return error instanceof PluginError
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/** Text placed in the response's error field. */
export function toErrorMessage(error: unknown): string {
  const message = toError(error).message
  return message || 'unknown error'
}
