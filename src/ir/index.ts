// Types
export type {
  TypeDef,
  TypeDefKind,
  PrimitiveKind,
  LiteralValue,
  Field,
  TypeParam,
  PrimitiveType,
  ArrayType,
  TupleType,
  ObjectType,
  UnionType,
  IntersectionType,
  RecordType,
  NamedType,
  RefType,
  LiteralType,
  FunctionType,
  GenericType,
  TemplateLiteralType,
  IndexedAccessType,
} from "./types"
export { PRIMITIVE_KINDS, assertNever } from "./types"

// Builders
export { t, field, named, qualifiedName, type NamedOptions } from "./builders"

// Rendering
export { render, renderDeclaration, declarationHead } from "./render"

// Traversal
export { childrenOf, referencedNames, resolveName, collectNamed, substitute } from "./walk"
