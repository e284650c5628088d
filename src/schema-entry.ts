/**
 * typeweave/schema
 *
 * Zod adapter: declare types as zod schemas and convert them to IR.
 * Importing this entry point installs `.ts()` on every zod schema.
 *
 * @example
 * ```ts
 * import { z, schemaToTypeDef } from 'typeweave/schema'
 * import { TypeRegistry } from 'typeweave/describe'
 *
 * const Point = z.tuple([z.number(), z.number()]).ts({ name: "Point" })
 *
 * new TypeRegistry().add(schemaToTypeDef(Point)).renderAll()
 * // export type Point = [number, number];
 * ```
 */

export * from "@/schema"
