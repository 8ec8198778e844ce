import type {
  CodeGeneratorRequest,
  DescriptorProto,
  EnumDescriptorProto,
  FieldDescriptorProto,
  FileDescriptorProto,
  ServiceDescriptorProto,
} from '@protobuf-ts/plugin-framework'
import type {
  FieldLabel,
  FieldType,
  ResolvedEnum,
  ResolvedField,
  ResolvedFile,
  ResolvedMessage,
  ResolvedService,
  SchemaRegistry,
} from '@protomanifest/schema'
import { packageScope, qualifyName, resolveImportPath, toJsonName } from '@protomanifest/utils'
import { LoadError, NotFoundError } from '../errors'

// google.protobuf.FieldDescriptorProto.Type
const FIELD_TYPES: Record<number, FieldType> = {
  1: 'double',
  2: 'float',
  3: 'int64',
  4: 'uint64',
  5: 'int32',
  6: 'fixed64',
  7: 'fixed32',
  8: 'bool',
  9: 'string',
  10: 'group',
  11: 'message',
  12: 'bytes',
  13: 'uint32',
  14: 'enum',
  15: 'sfixed32',
  16: 'sfixed64',
  17: 'sint32',
  18: 'sint64',
}

// google.protobuf.FieldDescriptorProto.Label
const FIELD_LABELS: Record<number, FieldLabel> = {
  1: 'optional',
  2: 'required',
  3: 'repeated',
}

interface RegistryState {
  files: Map<string, ResolvedFile>
  messages: Map<string, ResolvedMessage>
  enums: Map<string, ResolvedEnum>
  packageMap: Map<string, string>
  prefix: string
}

function collectEnum(state: RegistryState, file: string, scope: string, descriptor: EnumDescriptorProto): ResolvedEnum {
  const name = descriptor.name ?? ''
  const resolved: ResolvedEnum = {
    name,
    fullName: qualifyName(scope, name),
    file,
    values: descriptor.value.map(value => ({ name: value.name ?? '', number: value.number ?? 0 })),
  }
  state.enums.set(resolved.fullName, resolved)
  return resolved
}

function toField(message: string, descriptor: DescriptorProto, field: FieldDescriptorProto): ResolvedField {
  const name = field.name ?? ''
  const type = field.type === undefined ? undefined : FIELD_TYPES[field.type]
  if (!type) {
    throw new LoadError(`field ${message}.${name} has unknown type ${String(field.type)}`)
  }

  const resolved: ResolvedField = {
    name,
    number: field.number ?? 0,
    label: (field.label === undefined ? undefined : FIELD_LABELS[field.label]) ?? 'optional',
    type,
    jsonName: field.jsonName || toJsonName(name),
  }
  if (field.typeName) {
    resolved.typeName = field.typeName
  }
  if (field.oneofIndex !== undefined && !field.proto3Optional) {
    resolved.oneof = descriptor.oneofDecl[field.oneofIndex]?.name
  }
  return resolved
}

/** Nested types are flattened in declaration order, outer before inner. */
function collectMessages(
  state: RegistryState,
  file: string,
  scope: string,
  descriptors: DescriptorProto[],
  messages: ResolvedMessage[],
  enums: ResolvedEnum[],
): void {
  for (const descriptor of descriptors) {
    const name = descriptor.name ?? ''
    const fullName = qualifyName(scope, name)
    const resolved: ResolvedMessage = {
      name,
      fullName,
      file,
      fields: descriptor.field.map(field => toField(fullName, descriptor, field)),
    }
    state.messages.set(fullName, resolved)
    messages.push(resolved)

    for (const nested of descriptor.enumType) {
      enums.push(collectEnum(state, file, fullName, nested))
    }
    collectMessages(state, file, fullName, descriptor.nestedType, messages, enums)
  }
}

function toService(file: string, scope: string, descriptor: ServiceDescriptorProto): ResolvedService {
  const name = descriptor.name ?? ''
  return {
    name,
    fullName: qualifyName(scope, name),
    file,
    methods: descriptor.method.map(method => ({
      name: method.name ?? '',
      inputType: method.inputType ?? '',
      outputType: method.outputType ?? '',
      clientStreaming: method.clientStreaming ?? false,
      serverStreaming: method.serverStreaming ?? false,
    })),
  }
}

function loadFile(state: RegistryState, descriptor: FileDescriptorProto): ResolvedFile {
  const name = descriptor.name
  if (!name) {
    throw new LoadError('file descriptor without a name')
  }
  if (state.files.has(name)) {
    throw new LoadError(`duplicate file descriptor: ${name}`)
  }
  for (const dependency of descriptor.dependency) {
    if (!state.files.has(dependency)) {
      throw new LoadError(`${name} imports ${dependency}, which is not part of the request`)
    }
  }

  const pkg = descriptor.package ?? ''
  const scope = packageScope(pkg)
  const messages: ResolvedMessage[] = []
  const enums: ResolvedEnum[] = descriptor.enumType.map(item => collectEnum(state, name, scope, item))
  collectMessages(state, name, scope, descriptor.messageType, messages, enums)

  const file: ResolvedFile = {
    name,
    package: pkg,
    syntax: descriptor.syntax || 'proto2',
    importPath: resolveImportPath(name, state.packageMap.get(name), state.prefix),
    dependencies: [...descriptor.dependency],
    messages,
    enums,
    services: descriptor.service.map(service => toService(name, scope, service)),
    descriptor,
  }
  state.files.set(name, file)
  return file
}

function verifyReferences(state: RegistryState, file: ResolvedFile): void {
  for (const message of file.messages) {
    for (const field of message.fields) {
      if (!field.typeName) {
        continue
      }
      const known = field.type === 'enum' ? state.enums.has(field.typeName) : state.messages.has(field.typeName)
      if (!known) {
        throw new LoadError(`no ${field.type} found: ${field.typeName} (field ${message.fullName}.${field.name})`)
      }
    }
  }
  for (const service of file.services) {
    for (const method of service.methods) {
      for (const type of [method.inputType, method.outputType]) {
        if (!state.messages.has(type)) {
          throw new LoadError(`no message found: ${type} (method ${service.fullName}.${method.name})`)
        }
      }
    }
  }
}

export function createRegistry(): SchemaRegistry {
  const state: RegistryState = {
    files: new Map(),
    messages: new Map(),
    enums: new Map(),
    packageMap: new Map(),
    prefix: '',
  }

  return {
    load(request: CodeGeneratorRequest) {
      const loaded = request.protoFile.map(descriptor => loadFile(state, descriptor))
      for (const file of loaded) {
        verifyReferences(state, file)
      }
    },
    addPackageMapping(protoPath, mappedPackage) {
      state.packageMap.set(protoPath, mappedPackage)
    },
    packageMappings: () => state.packageMap,
    setPrefix(prefix) {
      state.prefix = prefix
    },
    lookupFile(name) {
      const file = state.files.get(name)
      if (!file) {
        throw new NotFoundError(`no such file given: ${name}`)
      }
      return file
    },
    lookupMessage: fullName => state.messages.get(fullName),
    lookupEnum: fullName => state.enums.get(fullName),
    files: () => [...state.files.values()],
  }
}
