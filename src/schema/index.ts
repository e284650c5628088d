/**
 * Schema module - re-exports Zod with the `.ts()` extension
 *
 * This module lets zod schemas act as type declarations:
 * - `.ts({ name })` - Declare the schema as a named type
 * - `.ts({ rename, skip, flatten, ... })` - Field attributes when used inside an object
 * - `.ts({ renameAll, tag, content, untagged, ... })` - Declaration attributes
 *
 * @example
 * ```ts
 * import { z, schemaToTypeDef } from 'typeweave/schema'
 *
 * const Status = z.enum(["Active", "Inactive"]).ts({ name: "Status", renameAll: "SCREAMING_SNAKE_CASE" })
 * const User = z.object({
 *   user_id: z.string(),
 *   status: Status,
 * }).ts({ name: "User", renameAll: "camelCase" })
 *
 * registry.add(schemaToTypeDef(User))
 * ```
 */

// Import meta.ts to apply prototype extensions and re-export z
export { z } from "@/schema/meta"

// Attribute types and helpers
export { SchemaAttributesSchema, getAttributes, getOwnAttributes, memberAttributes, containerAttributes } from "@/schema/meta"
export type { SchemaAttributes } from "@/schema/meta"

// Conversion
export { describeSchema, schemaToTypeDef, schemasToTypeDefs } from "@/schema/convert"
