/**
 * typeweave/ir
 *
 * The type IR: node types, builders, rendering and traversal.
 *
 * @example
 * ```ts
 * import { t, named, field, render } from 'typeweave/ir'
 *
 * render(t.array(t.union([t.string, t.number]))) // "(string | number)[]"
 * ```
 */

export * from "@/ir"
