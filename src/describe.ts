/**
 * typeweave/describe
 *
 * Type registry and TypeScript generation.
 * Use this entry point for build-time/dev-time tooling.
 *
 * @example
 * ```ts
 * import { TypeRegistry } from 'typeweave/describe'
 * import { t, named, field } from 'typeweave/ir'
 *
 * const registry = new TypeRegistry()
 * registry.add(named("User", t.object([field("name", t.string)])))
 *
 * const typescript = registry.renderAll({ exportStyle: "named" })
 * ```
 */

export * from "@/describe/index"
