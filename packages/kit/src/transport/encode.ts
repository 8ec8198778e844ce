import type { GenerationResult } from '@protomanifest/schema'
import type { Writable } from 'node:stream'
import { CodeGeneratorResponse } from '@protobuf-ts/plugin-framework'
import { EncodeError, toError } from '../errors'
import { writeAll } from './stream'

// CodeGeneratorResponse.Feature.FEATURE_PROTO3_OPTIONAL
const SUPPORTED_FEATURES = '1'

/** File list or error, never both. */
export function buildResponse(result: GenerationResult): CodeGeneratorResponse {
  if (result.kind === 'error') {
    return CodeGeneratorResponse.create({
      error: result.message,
      supportedFeatures: SUPPORTED_FEATURES,
    })
  }
  return CodeGeneratorResponse.create({
    supportedFeatures: SUPPORTED_FEATURES,
    file: result.files.map(file => ({ name: file.name, content: file.content })),
  })
}

export function serializeResponse(response: CodeGeneratorResponse): Uint8Array {
  try {
    return CodeGeneratorResponse.toBinary(response)
  }
  catch (error) {
    throw new EncodeError(`failed to marshal code generator response: ${toError(error).message}`, error)
  }
}

export async function encodeResponse(response: CodeGeneratorResponse, stream: Writable): Promise<void> {
  const buf = serializeResponse(response)
  try {
    await writeAll(stream, buf)
  }
  catch (error) {
    throw new EncodeError(`failed to write code generator response: ${toError(error).message}`, error)
  }
}
