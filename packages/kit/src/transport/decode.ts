import type { Readable } from 'node:stream'
import { CodeGeneratorRequest } from '@protobuf-ts/plugin-framework'
import { DecodeError, toError } from '../errors'
import { useLogger } from '../logger'
import { readAll } from './stream'

export function parseRequest(input: Uint8Array): CodeGeneratorRequest {
  try {
    return CodeGeneratorRequest.fromBinary(input)
  }
  catch (error) {
    throw new DecodeError(`failed to unmarshal code generator request: ${toError(error).message}`, error)
  }
}

export async function decodeRequest(stream: Readable): Promise<CodeGeneratorRequest> {
  const logger = useLogger('protomanifest:decode')
  logger.debug('Parsing code generator request')

  let input: Uint8Array
  try {
    input = await readAll(stream)
  }
  catch (error) {
    throw new DecodeError(`failed to read code generator request: ${toError(error).message}`, error)
  }

  const request = parseRequest(input)
  logger.debug(`Parsed code generator request (${input.byteLength} bytes, ${request.protoFile.length} files)`)
  return request
}
