import type { PartialMessage } from '@protobuf-ts/runtime'
import { Buffer } from 'node:buffer'
import { Readable, Writable } from 'node:stream'
import { CodeGeneratorRequest, FileDescriptorProto } from '@protobuf-ts/plugin-framework'

export function createRequest(input: PartialMessage<CodeGeneratorRequest>): CodeGeneratorRequest {
  return CodeGeneratorRequest.create(input)
}

export function encodeRequest(input: PartialMessage<CodeGeneratorRequest>): Uint8Array {
  return CodeGeneratorRequest.toBinary(createRequest(input))
}

export function toReadable(bytes: Uint8Array): Readable {
  return Readable.from([Buffer.from(bytes)])
}

export interface MemoryWritable {
  stream: Writable
  writes: Buffer[]
  bytes: () => Uint8Array
}

export function createMemoryWritable(): MemoryWritable {
  const writes: Buffer[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      writes.push(chunk)
      callback()
    },
  })
  return {
    stream,
    writes,
    bytes: () => new Uint8Array(Buffer.concat(writes)),
  }
}

export function createFailingWritable(message: string): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback(new Error(message))
    },
  })
}

/**
 * acme/v1/common.proto: enum Status, message Money
 * acme/v1/user.proto: message User { Status, Money, nested Address }, service UserService
 */
export function commonFile(): FileDescriptorProto {
  return FileDescriptorProto.create({
    name: 'acme/v1/common.proto',
    package: 'acme.v1',
    syntax: 'proto3',
    enumType: [
      { name: 'Status', value: [{ name: 'STATUS_UNSPECIFIED', number: 0 }, { name: 'STATUS_ACTIVE', number: 1 }] },
    ],
    messageType: [
      {
        name: 'Money',
        field: [
          { name: 'currency_code', number: 1, label: 1, type: 9, jsonName: 'currencyCode' },
          { name: 'units', number: 2, label: 1, type: 3, jsonName: 'units' },
        ],
      },
    ],
  })
}

export function userFile(): FileDescriptorProto {
  return FileDescriptorProto.create({
    name: 'acme/v1/user.proto',
    package: 'acme.v1',
    syntax: 'proto3',
    dependency: ['acme/v1/common.proto'],
    messageType: [
      {
        name: 'User',
        field: [
          { name: 'user_id', number: 1, label: 1, type: 9 },
          { name: 'status', number: 2, label: 1, type: 14, typeName: '.acme.v1.Status', jsonName: 'status' },
          { name: 'balance', number: 3, label: 1, type: 11, typeName: '.acme.v1.Money', jsonName: 'balance' },
          { name: 'addresses', number: 4, label: 3, type: 11, typeName: '.acme.v1.User.Address', jsonName: 'addresses' },
          { name: 'email', number: 5, label: 1, type: 9, jsonName: 'email', oneofIndex: 0 },
          { name: 'phone', number: 6, label: 1, type: 9, jsonName: 'phone', oneofIndex: 0 },
        ],
        oneofDecl: [{ name: 'contact' }],
        nestedType: [
          {
            name: 'Address',
            field: [{ name: 'street_line', number: 1, label: 1, type: 9, jsonName: 'streetLine' }],
          },
        ],
      },
      { name: 'GetUserRequest', field: [{ name: 'user_id', number: 1, label: 1, type: 9, jsonName: 'userId' }] },
    ],
    service: [
      {
        name: 'UserService',
        method: [
          { name: 'GetUser', inputType: '.acme.v1.GetUserRequest', outputType: '.acme.v1.User' },
          { name: 'WatchUsers', inputType: '.acme.v1.GetUserRequest', outputType: '.acme.v1.User', serverStreaming: true },
        ],
      },
    ],
  })
}
