/**
 * Keywords rendered verbatim
 */
export type PrimitiveKind = "string" | "number" | "boolean" | "null" | "undefined" | "void" | "never" | "any" | "unknown" | "bigint"

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = ["string", "number", "boolean", "null", "undefined", "void", "never", "any", "unknown", "bigint"]

export type LiteralValue = string | number | boolean

/**
 * A property of an object type or a parameter of a function type
 */
export interface Field {
  name: string
  type: TypeDef
  optional: boolean
  readonly: boolean
}

/**
 * A type parameter of a generic declaration: `T extends Constraint = Default`
 */
export interface TypeParam {
  name: string
  constraint?: TypeDef
  default?: TypeDef
}

export interface PrimitiveType {
  kind: "primitive"
  primitive: PrimitiveKind
}

export interface ArrayType {
  kind: "array"
  element: TypeDef
}

export interface TupleType {
  kind: "tuple"
  elements: TypeDef[]
}

export interface ObjectType {
  kind: "object"
  fields: Field[]
}

export interface UnionType {
  kind: "union"
  members: TypeDef[]
}

export interface IntersectionType {
  kind: "intersection"
  members: TypeDef[]
}

export interface RecordType {
  kind: "record"
  key: TypeDef
  value: TypeDef
}

/**
 * A declared type. Registries deduplicate these by qualified name.
 */
export interface NamedType {
  kind: "named"
  /** Enclosing namespace path, outermost first */
  namespace: string[]
  name: string
  def: TypeDef
  /** Present on generic declarations whose placeholders were not substituted */
  typeParams?: TypeParam[]
  /** Path of the source module the type came from, used to partition output */
  originModule?: string
  /** Generic utility the body is wrapped in, e.g. `Prettify` */
  wrapper?: string
  /** Rendered as a JSDoc block above the declaration */
  description?: string
}

/**
 * By-name pointer to a Named type. Never an ownership edge; may dangle.
 */
export interface RefType {
  kind: "ref"
  name: string
}

export interface LiteralType {
  kind: "literal"
  value: LiteralValue
}

export interface FunctionType {
  kind: "function"
  params: Field[]
  returns: TypeDef
}

export interface GenericType {
  kind: "generic"
  base: string
  args: TypeDef[]
}

/**
 * `strings.length === types.length + 1` always holds
 */
export interface TemplateLiteralType {
  kind: "templateLiteral"
  strings: string[]
  types: TypeDef[]
}

export interface IndexedAccessType {
  kind: "indexedAccess"
  base: TypeDef
  key: string
}

/**
 * The intermediate representation every source type system is converted into
 */
export type TypeDef =
  | PrimitiveType
  | ArrayType
  | TupleType
  | ObjectType
  | UnionType
  | IntersectionType
  | RecordType
  | NamedType
  | RefType
  | LiteralType
  | FunctionType
  | GenericType
  | TemplateLiteralType
  | IndexedAccessType

export type TypeDefKind = TypeDef["kind"]

/**
 * Exhaustiveness guard for switches over `TypeDef["kind"]`
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled type definition: ${JSON.stringify(value)}`)
}
