import * as z from "zod"
import { ConversionError } from "@/errors"
import { ContainerAttributesSchema, MemberAttributesSchema, VariantAttributesSchema, type ContainerAttributes, type MemberAttributes } from "@/convert/types"

/**
 * Conversion attributes attachable to any schema with `.ts()`.
 *
 * `name` makes the schema a declaration. Container keys apply when the schema is declared;
 * member keys apply when it is used as an object field or tuple element. `variants` holds
 * per-option attributes of an enum, keyed by option.
 */
export const SchemaAttributesSchema = z.strictObject({
  ...MemberAttributesSchema.shape,
  ...ContainerAttributesSchema.shape,
  name: z.string().min(1).optional(),
  variants: z.record(z.string(), VariantAttributesSchema).optional(),
})

export type SchemaAttributes = z.infer<typeof SchemaAttributesSchema>

/**
 * Key our attributes are stored under in zod's metadata
 */
const TYPEWEAVE_META_KEY = "__typeweave" as const

const MEMBER_KEYS = Object.keys(MemberAttributesSchema.shape)
const CONTAINER_KEYS = Object.keys(ContainerAttributesSchema.shape)

// Module augmentation to add ts() to all Zod types
declare module "zod" {
  interface ZodType<out Output, out Input, out Internals> {
    /**
     * Attach conversion attributes. Returns a new schema; attributes already present are
     * kept unless overridden.
     * @example
     * const User = z.object({ user_id: z.string() }).ts({ name: "User", renameAll: "camelCase" })
     */
    ts(attributes: SchemaAttributes): this
  }
}

function parseSchemaAttributes(value: unknown): SchemaAttributes {
  const result = SchemaAttributesSchema.safeParse(value)
  if (!result.success) {
    throw new ConversionError("invalid-attributes", `invalid schema attributes:\n${z.prettifyError(result.error)}`, undefined, result.error)
  }
  return result.data
}

/**
 * Attributes attached to this exact schema instance (no wrapper layers)
 */
export function getOwnAttributes(schema: z.core.$ZodType): SchemaAttributes {
  const raw = z.globalRegistry.get(schema)?.[TYPEWEAVE_META_KEY]
  return raw === undefined ? {} : parseSchemaAttributes(raw)
}

/**
 * Create a new schema with merged attributes
 */
function withAttributes<T extends z.ZodType>(schema: T, attributes: SchemaAttributes): T {
  const update = parseSchemaAttributes(attributes)
  const existingMeta = schema.meta() ?? {}
  return schema.meta({
    ...existingMeta,
    [TYPEWEAVE_META_KEY]: { ...getOwnAttributes(schema), ...update },
  })
}

// Add the method to Zod's prototype
const ZodTypeProto = z.ZodType.prototype as z.ZodType

ZodTypeProto.ts = function (attributes: SchemaAttributes) {
  return withAttributes(this, attributes)
}

/**
 * The schema a wrapper layer wraps, for the layers attributes are read through
 */
export function innerLayer(schema: z.core.$ZodType): z.core.$ZodType | undefined {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return schema.unwrap()
  }
  if (schema instanceof z.ZodDefault) {
    return schema.def.innerType
  }
  return undefined
}

/**
 * Attributes from all wrapper layers of a schema.
 * This handles cases like z.string().ts({ rename: "x" }).optional()
 * where the attributes are on an inner layer. Outer layers win.
 */
export function getAttributes(schema: z.core.$ZodType): SchemaAttributes {
  const inner = innerLayer(schema)
  const own = getOwnAttributes(schema)
  return inner ? { ...getAttributes(inner), ...own } : own
}

function pick<T extends object>(attributes: SchemaAttributes, keys: string[], schema: z.ZodType<T>): T {
  const picked = Object.fromEntries(Object.entries(attributes).filter(([key]) => keys.includes(key)))
  return schema.parse(picked)
}

/**
 * Field-level subset of a schema's attributes
 */
export function memberAttributes(attributes: SchemaAttributes): MemberAttributes {
  return pick(attributes, MEMBER_KEYS, MemberAttributesSchema)
}

/**
 * Declaration-level subset of a schema's attributes. `rename` is left out: a declared
 * schema's emitted name is its `name`, and `rename` renames the fields it is used in.
 */
export function containerAttributes(attributes: SchemaAttributes): ContainerAttributes {
  const { rename: _rename, ...rest } = pick(attributes, CONTAINER_KEYS, ContainerAttributesSchema)
  return rest
}

// Re-export z with our extensions applied
export { z }
