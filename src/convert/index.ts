// Descriptors and attribute schemas
export type {
  SourceDescriptor,
  RecordDescriptor,
  VariantSetDescriptor,
  AliasDescriptor,
  UnionDescriptor,
  SourceMember,
  SourceVariant,
  GenericParam,
  MemberShape,
  MemberResolver,
  MemberAttributes,
  ContainerAttributes,
  VariantAttributes,
} from "./types"
export { MemberAttributesSchema, ContainerAttributesSchema, VariantAttributesSchema } from "./types"

// Naming policies
export { RENAME_POLICIES, RenamePolicySchema, parseRenamePolicy, toSnakeCase, applyRenamePolicy, effectiveName, type RenamePolicy } from "./naming"

// Template patterns
export { parsePattern, type ParsedPattern } from "./pattern"

// Conversion
export { convert, convertDescriptor, convertObjectMembers, convertTupleMembers, patternToTypeDef, taggingOf, type ConvertOptions, type Tagging } from "./converter"
