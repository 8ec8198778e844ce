import type { CodeGeneratorRequest, FileDescriptorProto } from '@protobuf-ts/plugin-framework'

export type FieldLabel = 'optional' | 'required' | 'repeated'

export type FieldType =
  | 'double'
  | 'float'
  | 'int64'
  | 'uint64'
  | 'int32'
  | 'fixed64'
  | 'fixed32'
  | 'bool'
  | 'string'
  | 'group'
  | 'message'
  | 'bytes'
  | 'uint32'
  | 'enum'
  | 'sfixed32'
  | 'sfixed64'
  | 'sint32'
  | 'sint64'

export interface ResolvedField {
  name: string
  number: number
  label: FieldLabel
  type: FieldType
  /** Fully-qualified name of the message or enum, for message/enum/group fields. */
  typeName?: string
  jsonName: string
  oneof?: string
}

export interface ResolvedMessage {
  name: string
  /** Fully-qualified, with leading dot: `.pkg.Outer.Inner` */
  fullName: string
  file: string
  fields: ResolvedField[]
}

export interface ResolvedEnumValue {
  name: string
  number: number
}

export interface ResolvedEnum {
  name: string
  fullName: string
  file: string
  values: ResolvedEnumValue[]
}

export interface ResolvedMethod {
  name: string
  inputType: string
  outputType: string
  clientStreaming: boolean
  serverStreaming: boolean
}

export interface ResolvedService {
  name: string
  fullName: string
  file: string
  methods: ResolvedMethod[]
}

export interface ResolvedFile {
  name: string
  package: string
  syntax: string
  /** Import path after package mapping and prefix are applied. */
  importPath: string
  dependencies: string[]
  messages: ResolvedMessage[]
  enums: ResolvedEnum[]
  services: ResolvedService[]
  descriptor: FileDescriptorProto
}

export interface SchemaRegistry {
  load: (request: CodeGeneratorRequest) => void
  addPackageMapping: (protoPath: string, mappedPackage: string) => void
  packageMappings: () => ReadonlyMap<string, string>
  setPrefix: (prefix: string) => void
  lookupFile: (name: string) => ResolvedFile
  lookupMessage: (fullName: string) => ResolvedMessage | undefined
  lookupEnum: (fullName: string) => ResolvedEnum | undefined
  files: () => ResolvedFile[]
}
