/**
 * typeweave/importer
 *
 * Read type declarations from TypeScript source text.
 *
 * @example
 * ```ts
 * import { importTypeScript } from 'typeweave/importer'
 * import { TypeRegistry } from 'typeweave/describe'
 *
 * const registry = new TypeRegistry()
 * for (const type of importTypeScript(source, { module: "app::models" })) {
 *   registry.add(type)
 * }
 * ```
 */

export * from "@/importer"
