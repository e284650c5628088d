/**
 * typeweave/convert
 *
 * Source descriptors and the attribute-driven converter.
 * Reflection adapters describe declared types as descriptors; the converter turns them into IR.
 *
 * @example
 * ```ts
 * import { convertDescriptor } from 'typeweave/convert'
 * import { t } from 'typeweave/ir'
 *
 * const Message = convertDescriptor({
 *   kind: "variants",
 *   name: "Message",
 *   variants: [
 *     { name: "Ping", shape: "unit", members: [] },
 *     { name: "Text", shape: "tuple", members: [{ type: t.string }] },
 *   ],
 * })
 * // Message = { type: "Ping" } | { type: "Text"; value: string }
 * ```
 */

export * from "@/convert"
