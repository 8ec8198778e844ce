import type { Readable, Writable } from 'node:stream'
import { Buffer } from 'node:buffer'

/** Reads until end-of-stream; the message is the whole stream. */
export async function readAll(stream: Readable): Promise<Uint8Array> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  }
  return new Uint8Array(Buffer.concat(chunks))
}

/** One write of the complete buffer, resolved once the stream has accepted it. */
export function writeAll(stream: Writable, data: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    // a failed write is also emitted as 'error' after the callback
    stream.once('error', reject)
    stream.write(data, (error) => {
      if (error) {
        reject(error)
        return
      }
      stream.off('error', reject)
      resolve()
    })
  })
}
