import * as z from "zod"
import { ConversionError } from "@/errors"
import { PRIMITIVE_KINDS, type Field, type PrimitiveKind, type TypeDef } from "@/ir/types"
import { field, named, t } from "@/ir/builders"
import { substitute } from "@/ir/walk"
import { effectiveName, parseRenamePolicy, type RenamePolicy } from "@/convert/naming"
import { parsePattern } from "@/convert/pattern"
import {
  ContainerAttributesSchema,
  MemberAttributesSchema,
  VariantAttributesSchema,
  type ContainerAttributes,
  type MemberAttributes,
  type MemberResolver,
  type RecordDescriptor,
  type SourceDescriptor,
  type SourceMember,
  type SourceVariant,
} from "@/convert/types"

export interface ConvertOptions {
  /**
   * Concrete arguments for a generic descriptor's parameters, in order.
   * Without them a generic descriptor converts to a generic declaration.
   */
  typeArguments?: TypeDef[]
}

/**
 * How a variant set encodes which variant a value holds
 */
export type Tagging = { style: "internal"; tag: string } | { style: "adjacent"; tag: string; content: string } | { style: "untagged" }

interface Context<M> {
  resolve: MemberResolver<M>
  container: ContainerAttributes
  policy?: RenamePolicy
}

function parseAttributes<T>(schema: z.ZodType<T>, value: unknown, where: string): T {
  const result = schema.safeParse(value ?? {})
  if (!result.success) {
    throw new ConversionError("invalid-attributes", `invalid ${where} attributes:\n${z.prettifyError(result.error)}`, undefined, result.error)
  }
  return result.data
}

const isPrimitiveKind = (body: string): body is PrimitiveKind => PRIMITIVE_KINDS.some((k) => k === body)

/**
 * Build a template literal type from a `${...}` pattern. Keyword placeholders become
 * primitives; anything else is kept as a raw reference.
 */
export function patternToTypeDef(pattern: string): TypeDef {
  const { strings, types } = parsePattern(pattern)
  return t.template(
    strings,
    types.map((body) => (isPrimitiveKind(body) ? t.primitive(body) : t.ref(body))),
  )
}

/**
 * Strip the `null` / `undefined` arms a "maybe" wrapper converts to
 */
function unwrapMaybe(type: TypeDef): TypeDef {
  if (type.kind !== "union") return type
  const rest = type.members.filter((m) => !(m.kind === "primitive" && (m.primitive === "null" || m.primitive === "undefined")))
  if (rest.length === 0 || rest.length === type.members.length) return type
  return rest.length === 1 ? rest[0] : t.union(rest)
}

/**
 * Type of a member after the override, indexed-access and pattern modifiers
 */
function memberType<M>(member: SourceMember<M>, attrs: MemberAttributes, ctx: Context<M>): TypeDef {
  if ((attrs.index === undefined) !== (attrs.key === undefined)) {
    throw new ConversionError("unpaired-index", `"index" and "key" must be used together (member "${member.name ?? "?"}")`)
  }
  if (attrs.type !== undefined) return t.ref(attrs.type)
  if (attrs.index !== undefined && attrs.key !== undefined) return t.indexed(t.ref(attrs.index), attrs.key)
  if (attrs.pattern !== undefined) return patternToTypeDef(attrs.pattern)
  return ctx.resolve(member.type)
}

const inlined = (type: TypeDef, attrs: MemberAttributes): TypeDef => (attrs.inline && type.kind === "named" ? type.def : type)

/**
 * Fields of an object type, looking through one Named wrapper
 */
function flattenFields(type: TypeDef, member: string): Field[] {
  const body = type.kind === "named" ? type.def : type
  if (body.kind !== "object") {
    throw new ConversionError("invalid-flatten", `cannot flatten member "${member}": its type is ${body.kind}, not an object`)
  }
  return body.fields
}

/**
 * Apply the field modifiers in order: skip, flatten, type override, index/key, pattern,
 * default/optional, inline
 */
function convertFields<M>(members: SourceMember<M>[], policy: RenamePolicy | undefined, ctx: Context<M>): Field[] {
  const fields: Field[] = []

  members.forEach((member, index) => {
    const original = member.name ?? String(index)
    const attrs = parseAttributes(MemberAttributesSchema, member.attributes, `member "${original}"`)

    if (attrs.skip) return

    if (attrs.flatten) {
      fields.push(...flattenFields(ctx.resolve(member.type), original))
      return
    }

    let type = memberType(member, attrs, ctx)
    if (attrs.optional) type = unwrapMaybe(type)
    type = inlined(type, attrs)

    fields.push(
      field(effectiveName(original, attrs.rename, policy), type, {
        optional: attrs.optional === true || attrs.default === true,
        readonly: attrs.readonly,
      }),
    )
  })

  return fields
}

/**
 * Types of tuple elements; naming and optionality do not apply
 */
function convertElements<M>(members: SourceMember<M>[], ctx: Context<M>): TypeDef[] {
  const elements: TypeDef[] = []
  members.forEach((member, index) => {
    const attrs = parseAttributes(MemberAttributesSchema, member.attributes, `element ${index}`)
    if (attrs.skip) return
    elements.push(inlined(memberType(member, attrs, ctx), attrs))
  })
  return elements
}

/**
 * Convert the members of an anonymous object type, one with no declaration of its own.
 * Member attributes apply as they do in a declared record; there is no rename policy.
 */
export function convertObjectMembers<M>(members: SourceMember<M>[], resolve: MemberResolver<M>): Field[] {
  return convertFields(members, undefined, { resolve, container: {} })
}

/**
 * Convert the elements of an anonymous tuple type
 */
export function convertTupleMembers<M>(members: SourceMember<M>[], resolve: MemberResolver<M>): TypeDef[] {
  return convertElements(members, { resolve, container: {} })
}

function convertRecord<M>(descriptor: RecordDescriptor<M>, ctx: Context<M>): TypeDef {
  switch (descriptor.shape) {
    case "unit":
      return t.null
    case "tuple": {
      const elements = convertElements(descriptor.members, ctx)
      return elements.length === 1 ? elements[0] : t.tuple(elements)
    }
    case "named":
      return t.object(convertFields(descriptor.members, ctx.policy, ctx))
  }
}

/**
 * Pick the variant encoding from container attributes; internal tagging on `"type"` by default
 */
export function taggingOf(container: ContainerAttributes): Tagging {
  if (container.content !== undefined && container.tag === undefined) {
    throw new ConversionError("invalid-tagging", `"content" requires "tag"`)
  }
  if (container.untagged) {
    if (container.tag !== undefined) {
      throw new ConversionError("invalid-tagging", `"untagged" cannot be combined with "tag"`)
    }
    return { style: "untagged" }
  }
  if (container.tag !== undefined && container.content !== undefined) {
    return { style: "adjacent", tag: container.tag, content: container.content }
  }
  return { style: "internal", tag: container.tag ?? "type" }
}

function encodeVariant<M>(variant: SourceVariant<M>, name: string, fieldPolicy: RenamePolicy | undefined, tagging: Tagging, ctx: Context<M>): TypeDef {
  const discriminant = (tag: string) => field(tag, t.literal(name))

  switch (variant.shape) {
    case "unit":
      return tagging.style === "untagged" ? t.literal(name) : t.object([discriminant(tagging.tag)])

    case "tuple": {
      const elements = convertElements(variant.members, ctx)
      const payload = elements.length === 1 ? elements[0] : t.tuple(elements)
      switch (tagging.style) {
        case "internal":
          return t.object([discriminant(tagging.tag), field("value", payload)])
        case "adjacent":
          return t.object([discriminant(tagging.tag), field(tagging.content, payload)])
        case "untagged":
          return payload
      }
    }

    case "named": {
      const fields = convertFields(variant.members, fieldPolicy, ctx)
      switch (tagging.style) {
        case "internal":
          return t.object([discriminant(tagging.tag), ...fields])
        case "adjacent":
          return t.object([discriminant(tagging.tag), field(tagging.content, t.object(fields))])
        case "untagged":
          return t.object(fields)
      }
    }
  }
}

function convertVariants<M>(variants: SourceVariant<M>[], ctx: Context<M>): TypeDef {
  const active = variants
    .map((variant) => ({ variant, attrs: parseAttributes(VariantAttributesSchema, variant.attributes, `variant "${variant.name}"`) }))
    .filter(({ attrs }) => !attrs.skip)

  if (active.length === 0) {
    throw new ConversionError("empty-variants", "variant set has no variants")
  }

  const names = active.map(({ variant, attrs }) => effectiveName(variant.name, attrs.rename, ctx.policy))

  // All-unit sets collapse to a string-literal union whatever the tagging policy
  if (active.every(({ variant }) => variant.shape === "unit")) {
    return t.union(names.map((n) => t.literal(n)))
  }

  const tagging = taggingOf(ctx.container)
  return t.union(
    active.map(({ variant, attrs }, i) => {
      const fieldPolicy = attrs.renameAll !== undefined ? parseRenamePolicy(attrs.renameAll) : undefined
      return encodeVariant(variant, names[i], fieldPolicy, tagging, ctx)
    }),
  )
}

function convertUnchecked<M>(descriptor: SourceDescriptor<M>, recurse: MemberResolver<M>, options: ConvertOptions): TypeDef {
  if (descriptor.kind === "union") {
    throw new ConversionError("unsupported-union", "untagged unions are not supported; use a variant set instead")
  }

  const container = parseAttributes(ContainerAttributesSchema, descriptor.attributes, "container")
  const policy = container.renameAll !== undefined ? parseRenamePolicy(container.renameAll) : undefined
  const generics = descriptor.generics ?? []

  const bindings = new Map<string, TypeDef>()
  if (options.typeArguments) {
    if (options.typeArguments.length !== generics.length) {
      throw new ConversionError("type-arguments", `expected ${generics.length} type argument(s), got ${options.typeArguments.length}`)
    }
    generics.forEach((param, i) => bindings.set(param.name, options.typeArguments?.[i] ?? t.unknown))
  }

  const ctx: Context<M> = { resolve: (type) => substitute(recurse(type), bindings), container, policy }

  if (container.transparent) {
    const members = descriptor.kind === "record" ? convertElements(descriptor.members, ctx) : []
    if (members.length !== 1) {
      throw new ConversionError("invalid-transparent", "transparent requires a record with exactly one member")
    }
    return members[0]
  }

  let def: TypeDef
  switch (descriptor.kind) {
    case "record":
      def = convertRecord(descriptor, ctx)
      break
    case "variants":
      def = convertVariants(descriptor.variants, ctx)
      break
    case "alias":
      def = ctx.resolve(descriptor.target)
      break
  }

  const bases = container.extends ?? []
  if (bases.length > 0) {
    def = t.intersection([...bases.map((b) => t.ref(b)), def])
  }

  return named(container.rename ?? descriptor.name, def, {
    namespace: container.namespace ?? descriptor.namespace,
    typeParams: options.typeArguments
      ? undefined
      : generics.map((param) => ({
          name: param.name,
          constraint: param.constraint === undefined ? undefined : ctx.resolve(param.constraint),
          default: param.default === undefined ? undefined : ctx.resolve(param.default),
        })),
    originModule: container.module ?? descriptor.module,
    wrapper: container.wrapper,
    description: container.description,
  })
}

/**
 * Convert one source descriptor into IR.
 *
 * Records and variant sets become a Named declaration; a transparent record becomes its
 * member's type. Nested member types are resolved through `recurse`. Throws
 * `ConversionError` without side effects on failure.
 */
export function convert<M>(descriptor: SourceDescriptor<M>, recurse: MemberResolver<M>, options: ConvertOptions = {}): TypeDef {
  try {
    return convertUnchecked(descriptor, recurse, options)
  } catch (err) {
    throw ConversionError.within(err, descriptor.name)
  }
}

/**
 * Convert a descriptor whose member types are already IR (the builder API)
 */
export function convertDescriptor(descriptor: SourceDescriptor<TypeDef>, options: ConvertOptions = {}): TypeDef {
  return convert(descriptor, (type) => type, options)
}
