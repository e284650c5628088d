/**
 * typeweave
 *
 * Turns type declarations from several sources (hand-built descriptors, zod schemas,
 * TypeScript source) into one IR, then emits deduplicated, dependency-ordered
 * TypeScript type declarations.
 *
 * @example
 * ```ts
 * import { z, schemaToTypeDef, TypeRegistry } from 'typeweave'
 *
 * const Status = z.enum(["Active", "Inactive"]).ts({ name: "Status" })
 * const User = z.object({ id: z.string(), status: Status }).ts({ name: "User" })
 *
 * const registry = new TypeRegistry().add(schemaToTypeDef(User))
 * registry.renderAll()
 * // export type Status = "Active" | "Inactive";
 * //
 * // export type User = { id: string; status: Status };
 * ```
 */

// Errors
export { TypeweaveError, ConversionError, RegistryError, ConfigError, ImportError, type ConversionErrorCode } from "./errors"

// IR
export * from "./ir"

// Converter
export * from "./convert"

// Registry and output
export * from "./describe/index"

// Zod adapter
export * from "./schema"

// TypeScript importer
export * from "./importer"
