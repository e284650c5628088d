import * as z from "zod"
import { ConversionError } from "@/errors"
import type { TypeDef } from "@/ir/types"
import { t } from "@/ir/builders"
import { convert, convertObjectMembers, convertTupleMembers } from "@/convert/converter"
import type { SourceDescriptor, SourceMember, SourceVariant } from "@/convert/types"
import { containerAttributes, getAttributes, getOwnAttributes, memberAttributes } from "@/schema/meta"

type Schema = z.core.$ZodType

/**
 * Strip the optional and default layers of an object field; their only effect is the `?`
 */
function fieldLayer(schema: Schema): { type: Schema; optional: boolean } {
  let current = schema
  let optional = false
  while (current instanceof z.ZodOptional || current instanceof z.ZodDefault) {
    optional = true
    current = current instanceof z.ZodOptional ? current.unwrap() : current.def.innerType
  }
  return { type: current, optional }
}

/**
 * Describe a field of an object schema
 */
function describeField(key: string, schema: Schema): SourceMember<Schema> {
  const { type, optional } = fieldLayer(schema)
  const attributes = memberAttributes(getAttributes(schema))
  if (optional && attributes.default === undefined && attributes.optional === undefined) {
    attributes.default = true
  }
  return { name: key, type, attributes }
}

function describeElement(schema: Schema): SourceMember<Schema> {
  return { type: schema, attributes: memberAttributes(getAttributes(schema)) }
}

/**
 * Build a source descriptor from a declared schema, one carrying `.ts({ name })`.
 *
 * Objects become records, tuples tuple-shaped records and enums variant sets;
 * anything else becomes an alias whose target is the schema itself.
 */
export function describeSchema(schema: Schema): SourceDescriptor<Schema> {
  const attributes = getOwnAttributes(schema)
  if (attributes.name === undefined) {
    throw new ConversionError("invalid-attributes", `schema has no name; declare it with .ts({ name })`)
  }

  const base = {
    name: attributes.name,
    namespace: attributes.namespace,
    module: attributes.module,
    attributes: {
      ...containerAttributes(attributes),
      description: attributes.description ?? z.globalRegistry.get(schema)?.description,
    },
  }

  if (schema instanceof z.ZodObject) {
    const members = Object.entries(schema.shape).map(([key, value]) => describeField(key, value))
    return { ...base, kind: "record", shape: "named", members }
  }

  if (schema instanceof z.ZodTuple) {
    return { ...base, kind: "record", shape: "tuple", members: schema.def.items.map(describeElement) }
  }

  if (schema instanceof z.ZodEnum) {
    const variants = schema.options.map(
      (option): SourceVariant<Schema> => ({
        name: String(option),
        shape: "unit",
        members: [],
        attributes: attributes.variants?.[String(option)],
      }),
    )
    return { ...base, kind: "variants", variants }
  }

  return { ...base, kind: "alias", target: schema }
}

function literal(value: unknown): TypeDef {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return t.literal(value)
  }
  if (value === null) return t.null
  if (typeof value === "bigint") return t.bigint
  return t.undefined
}

/**
 * Converts schemas to IR, sharing declarations across one traversal
 */
class SchemaConverter {
  private declared = new Map<string, TypeDef>()
  private inProgress = new Set<string>()
  private active = new Set<Schema>()

  /**
   * Convert a schema. Declared schemas become Named nodes; a declared schema reached again
   * while it is being converted becomes a reference to itself.
   */
  toTypeDef(schema: Schema): TypeDef {
    const { name, namespace } = getOwnAttributes(schema)
    if (name === undefined) {
      return this.body(schema)
    }

    const qualified = [...(namespace ?? []), name].join(".")
    const done = this.declared.get(qualified)
    if (done) return done
    if (this.inProgress.has(qualified)) return t.ref(qualified)

    this.inProgress.add(qualified)
    try {
      const descriptor = describeSchema(schema)
      const def = convert(descriptor, (member) => (member === schema ? this.body(member) : this.toTypeDef(member)))
      this.declared.set(qualified, def)
      return def
    } finally {
      this.inProgress.delete(qualified)
    }
  }

  /**
   * Structural conversion, ignoring the schema's own name
   */
  body(schema: Schema): TypeDef {
    if (this.active.has(schema)) {
      console.warn("[typeweave] Recursive schema without a name; declare it with .ts({ name }). Emitting unknown")
      return t.unknown
    }
    this.active.add(schema)
    try {
      return this.structure(schema)
    } finally {
      this.active.delete(schema)
    }
  }

  private structure(s: Schema): TypeDef {
    if (s instanceof z.ZodString) return t.string
    if (s instanceof z.ZodNumber) return t.number
    if (s instanceof z.ZodBoolean) return t.boolean
    if (s instanceof z.ZodBigInt) return t.bigint
    if (s instanceof z.ZodNull) return t.null
    if (s instanceof z.ZodUndefined) return t.undefined
    if (s instanceof z.ZodVoid) return t.void
    if (s instanceof z.ZodNever) return t.never
    if (s instanceof z.ZodAny) return t.any
    if (s instanceof z.ZodUnknown) return t.unknown
    if (s instanceof z.ZodDate) return t.ref("Date")

    if (s instanceof z.ZodLiteral) {
      const values = Array.from(s.values, literal)
      return values.length === 1 ? values[0] : t.union(values)
    }
    if (s instanceof z.ZodEnum) {
      return t.union(s.options.map(literal))
    }

    if (s instanceof z.ZodOptional) {
      return t.union([this.toTypeDef(s.unwrap()), t.undefined])
    }
    if (s instanceof z.ZodNullable) {
      return t.nullable(this.toTypeDef(s.unwrap()))
    }
    if (s instanceof z.ZodDefault || s instanceof z.ZodReadonly) {
      return this.toTypeDef(s.def.innerType)
    }
    if (s instanceof z.ZodLazy) {
      return this.toTypeDef(s.unwrap())
    }

    if (s instanceof z.ZodArray) {
      return t.array(this.toTypeDef(s.element))
    }
    if (s instanceof z.ZodTuple) {
      return t.tuple(convertTupleMembers(s.def.items.map(describeElement), (member) => this.toTypeDef(member)))
    }
    if (s instanceof z.ZodObject) {
      const members = Object.entries(s.shape).map(([key, value]) => describeField(key, value))
      return t.object(convertObjectMembers(members, (member) => this.toTypeDef(member)))
    }
    if (s instanceof z.ZodUnion) {
      return t.union(s.options.map((option) => this.toTypeDef(option)))
    }
    if (s instanceof z.ZodIntersection) {
      return t.intersection([this.toTypeDef(s.def.left), this.toTypeDef(s.def.right)])
    }
    if (s instanceof z.ZodRecord) {
      return t.record(this.toTypeDef(s.keyType), this.toTypeDef(s.valueType))
    }
    if (s instanceof z.ZodMap) {
      return t.generic("Map", [this.toTypeDef(s.keyType), this.toTypeDef(s.valueType)])
    }
    if (s instanceof z.ZodSet) {
      return t.generic("Set", [this.toTypeDef(s.def.valueType)])
    }

    console.warn(`[typeweave] Unsupported schema type "${s._zod.def.type}"; emitting unknown`)
    return t.unknown
  }
}

/**
 * Convert a zod schema to IR. Schemas declared with `.ts({ name })` become Named nodes,
 * so adding the result to a registry registers every declaration it reaches.
 *
 * @example
 * ```ts
 * const User = z.object({ id: z.string(), tags: z.array(z.string()).optional() }).ts({ name: "User" })
 * registry.add(schemaToTypeDef(User))
 * // export type User = { id: string; tags?: string[] };
 * ```
 */
export function schemaToTypeDef(schema: Schema): TypeDef {
  return new SchemaConverter().toTypeDef(schema)
}

/**
 * Convert several schemas in one traversal, sharing declarations between them
 */
export function schemasToTypeDefs(schemas: Schema[]): TypeDef[] {
  const converter = new SchemaConverter()
  return schemas.map((schema) => converter.toTypeDef(schema))
}
