import * as z from "zod"
import type { TypeDef } from "@/ir/types"

const name = z.string().min(1)

/**
 * Attributes a reflection adapter may attach to a record field or tuple element
 */
export const MemberAttributesSchema = z.strictObject({
  /** Emit under this name instead */
  rename: name.optional(),
  /** Drop the member entirely */
  skip: z.boolean().optional(),
  /** Splice the fields of the member's object type in place of the member */
  flatten: z.boolean().optional(),
  /** Raw type reference that replaces the converted type */
  type: name.optional(),
  /** Base type of an indexed access; requires `key` */
  index: name.optional(),
  /** Property key of an indexed access; requires `index` */
  key: name.optional(),
  /** Template such as `vm-${string}`, emitted as a template literal type */
  pattern: z.string().optional(),
  /** Mark the field optional */
  default: z.boolean().optional(),
  /** Mark the field optional and strip `null` / `undefined` from its type */
  optional: z.boolean().optional(),
  readonly: z.boolean().optional(),
  /** Replace a named type with its definition */
  inline: z.boolean().optional(),
})

/**
 * Attributes that apply to a whole record, variant set or alias
 */
export const ContainerAttributesSchema = z.strictObject({
  rename: name.optional(),
  /** Case policy token applied to field and variant names */
  renameAll: z.string().optional(),
  /** Discriminant field name for variant sets (default `"type"`) */
  tag: name.optional(),
  /** Payload field name for adjacent tagging; requires `tag` */
  content: name.optional(),
  untagged: z.boolean().optional(),
  /** Emit a single-member record as its member's type, without a declaration */
  transparent: z.boolean().optional(),
  namespace: z.array(name).optional(),
  module: z.string().optional(),
  /** Base types intersected with the converted body */
  extends: z.array(name).optional(),
  /** Generic utility the declared body is wrapped in */
  wrapper: name.optional(),
  description: z.string().optional(),
})

export const VariantAttributesSchema = z.strictObject({
  rename: name.optional(),
  skip: z.boolean().optional(),
  /** Case policy token applied to the variant's own fields */
  renameAll: z.string().optional(),
})

export type MemberAttributes = z.infer<typeof MemberAttributesSchema>
export type ContainerAttributes = z.infer<typeof ContainerAttributesSchema>
export type VariantAttributes = z.infer<typeof VariantAttributesSchema>

/**
 * A field of a record or an element of a tuple-shaped record or variant.
 * `M` is whatever the reflection adapter uses to denote a member type.
 */
export interface SourceMember<M> {
  /** Absent for tuple elements */
  name?: string
  type: M
  attributes?: MemberAttributes
}

export type MemberShape = "named" | "tuple" | "unit"

export interface SourceVariant<M> {
  name: string
  shape: MemberShape
  members: SourceMember<M>[]
  attributes?: VariantAttributes
}

export interface GenericParam<M> {
  name: string
  constraint?: M
  default?: M
}

interface DescriptorBase<M> {
  name: string
  namespace?: string[]
  /** Source module path, e.g. `app::models::user` */
  module?: string
  generics?: GenericParam<M>[]
  attributes?: ContainerAttributes
}

export interface RecordDescriptor<M> extends DescriptorBase<M> {
  kind: "record"
  shape: MemberShape
  members: SourceMember<M>[]
}

export interface VariantSetDescriptor<M> extends DescriptorBase<M> {
  kind: "variants"
  variants: SourceVariant<M>[]
}

export interface AliasDescriptor<M> extends DescriptorBase<M> {
  kind: "alias"
  target: M
}

/**
 * An untagged host-language union. Always rejected: the target syntax has no
 * way to express overlapping storage.
 */
export interface UnionDescriptor<M> extends DescriptorBase<M> {
  kind: "union"
  members: SourceMember<M>[]
}

/**
 * One declared type as seen by a reflection adapter
 */
export type SourceDescriptor<M> = RecordDescriptor<M> | VariantSetDescriptor<M> | AliasDescriptor<M> | UnionDescriptor<M>

/**
 * Resolves a member type to IR. Generic placeholders must resolve to `Ref(placeholder)`.
 */
export type MemberResolver<M> = (type: M) => TypeDef
