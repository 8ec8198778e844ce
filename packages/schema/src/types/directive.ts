/** Reserved first character of a parameter name that marks a package mapping. */
export const PACKAGE_MAPPING_MARKER = 'M'

export interface OptionAssignment {
  kind: 'option'
  name: string
  /** Empty for presence-only flags. */
  value: string
}

export interface PackageMapping {
  kind: 'package'
  protoPath: string
  mappedPackage: string
}

export type Directive = OptionAssignment | PackageMapping
