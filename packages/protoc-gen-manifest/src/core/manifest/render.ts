import type { ResolvedEnum, ResolvedFile, ResolvedMessage, ResolvedService } from '@protomanifest/schema'

export interface FieldManifest {
  name: string
  number: number
  label: string
  type: string
  typeName?: string
  jsonName: string
  oneof?: string
}

export interface MessageManifest {
  name: string
  fullName: string
  fields: FieldManifest[]
}

export interface EnumManifest {
  name: string
  fullName: string
  values: Array<{ name: string, number: number }>
}

export interface ServiceManifest {
  name: string
  fullName: string
  methods: Array<{
    name: string
    inputType: string
    outputType: string
    clientStreaming: boolean
    serverStreaming: boolean
  }>
}

export interface FileManifest {
  file: string
  package: string
  syntax: string
  importPath: string
  dependencies: string[]
  messages: MessageManifest[]
  enums: EnumManifest[]
  services: ServiceManifest[]
}

function toMessageManifest(message: ResolvedMessage): MessageManifest {
  return {
    name: message.name,
    fullName: message.fullName,
    fields: message.fields.map(field => ({
      name: field.name,
      number: field.number,
      label: field.label,
      type: field.type,
      ...(field.typeName ? { typeName: field.typeName } : {}),
      jsonName: field.jsonName,
      ...(field.oneof ? { oneof: field.oneof } : {}),
    })),
  }
}

function toEnumManifest(item: ResolvedEnum): EnumManifest {
  return {
    name: item.name,
    fullName: item.fullName,
    values: item.values.map(value => ({ name: value.name, number: value.number })),
  }
}

function toServiceManifest(service: ResolvedService): ServiceManifest {
  return {
    name: service.name,
    fullName: service.fullName,
    methods: service.methods.map(method => ({ ...method })),
  }
}

export function toFileManifest(file: ResolvedFile): FileManifest {
  return {
    file: file.name,
    package: file.package,
    syntax: file.syntax,
    importPath: file.importPath,
    dependencies: [...file.dependencies],
    messages: file.messages.map(toMessageManifest),
    enums: file.enums.map(toEnumManifest),
    services: file.services.map(toServiceManifest),
  }
}

export function renderManifest(file: ResolvedFile, indent: number): string {
  return `${JSON.stringify(toFileManifest(file), null, indent)}\n`
}
