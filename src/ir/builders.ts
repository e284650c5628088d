import type { Field, LiteralValue, NamedType, PrimitiveKind, TypeDef, TypeParam } from "@/ir/types"

const primitive = (kind: PrimitiveKind): TypeDef => ({ kind: "primitive", primitive: kind })

/**
 * Shorthand constructors for TypeDef nodes.
 *
 * @example
 * ```ts
 * import { t, named, field } from 'typeweave/ir'
 *
 * const User = named("User", t.object([field("id", t.string), field("email", t.nullable(t.string))]))
 * ```
 */
export const t = {
  string: primitive("string"),
  number: primitive("number"),
  boolean: primitive("boolean"),
  null: primitive("null"),
  undefined: primitive("undefined"),
  void: primitive("void"),
  never: primitive("never"),
  any: primitive("any"),
  unknown: primitive("unknown"),
  bigint: primitive("bigint"),

  primitive,
  array: (element: TypeDef): TypeDef => ({ kind: "array", element }),
  tuple: (elements: TypeDef[]): TypeDef => ({ kind: "tuple", elements }),
  object: (fields: Field[]): TypeDef => ({ kind: "object", fields }),
  union: (members: TypeDef[]): TypeDef => ({ kind: "union", members }),
  intersection: (members: TypeDef[]): TypeDef => ({ kind: "intersection", members }),
  record: (key: TypeDef, value: TypeDef): TypeDef => ({ kind: "record", key, value }),
  ref: (name: string): TypeDef => ({ kind: "ref", name }),
  literal: (value: LiteralValue): TypeDef => ({ kind: "literal", value }),
  fn: (params: Field[], returns: TypeDef): TypeDef => ({ kind: "function", params, returns }),
  generic: (base: string, args: TypeDef[]): TypeDef => ({ kind: "generic", base, args }),
  template: (strings: string[], types: TypeDef[]): TypeDef => {
    if (strings.length !== types.length + 1) {
      throw new RangeError(`Template literal needs ${types.length + 1} strings, got ${strings.length}`)
    }
    return { kind: "templateLiteral", strings, types }
  },
  indexed: (base: TypeDef, key: string): TypeDef => ({ kind: "indexedAccess", base, key }),

  /** `T | null`, the shape a host-language "maybe" wrapper converts to */
  nullable: (inner: TypeDef): TypeDef => ({ kind: "union", members: [inner, primitive("null")] }),
}

/**
 * Create an object field; required and mutable unless told otherwise
 */
export function field(name: string, type: TypeDef, options: { optional?: boolean; readonly?: boolean } = {}): Field {
  return { name, type, optional: options.optional ?? false, readonly: options.readonly ?? false }
}

export interface NamedOptions {
  namespace?: string[]
  typeParams?: TypeParam[]
  originModule?: string
  wrapper?: string
  description?: string
}

/**
 * Create a Named declaration. Unset optional properties are left off the node.
 */
export function named(name: string, def: TypeDef, options: NamedOptions = {}): NamedType {
  const node: NamedType = { kind: "named", namespace: options.namespace ?? [], name, def }
  if (options.typeParams && options.typeParams.length > 0) node.typeParams = options.typeParams
  if (options.originModule) node.originModule = options.originModule
  if (options.wrapper) node.wrapper = options.wrapper
  if (options.description) node.description = options.description
  return node
}

/**
 * Registry key of a Named type: its namespace path and name joined with dots
 */
export const qualifiedName = (node: Pick<NamedType, "namespace" | "name">): string => [...node.namespace, node.name].join(".")
