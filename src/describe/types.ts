import * as z from "zod"
import { ConfigError } from "@/errors"

/**
 * How declarations are exported:
 * - `none`: `type Foo = ...`
 * - `named`: `export type Foo = ...`
 * - `grouped`: `type Foo = ...` plus one trailing `export { Foo, Bar }`
 */
export const ExportStyleSchema = z.enum(["none", "named", "grouped"])

export type ExportStyle = z.infer<typeof ExportStyleSchema>

/**
 * Options for rendering a registry to TypeScript
 */
export const GeneratorConfigSchema = z.strictObject({
  exportStyle: ExportStyleSchema.default("named"),
  /** Output is a `.d.ts` file: namespaces are `declare`d and module units use `.d.ts` paths */
  declarationOnly: z.boolean().default(false),
  /** Replaces the generated banner; each line becomes a `//` comment */
  header: z.string().optional(),
  /** Emit the `Prettify` helper before the declarations */
  includeUtilities: z.boolean().default(false),
  /** Append `.js` to relative import specifiers between module units */
  esmExtensions: z.boolean().default(false),
  /** What to do about references to names that are never registered */
  danglingRefs: z.enum(["ignore", "warn", "error"]).default("ignore"),
  /** Names known to exist outside the registry */
  external: z.array(z.string()).default([]),
})

export type GeneratorConfig = z.input<typeof GeneratorConfigSchema>
export type ResolvedConfig = z.output<typeof GeneratorConfigSchema>

/**
 * Validate generator options and fill in defaults
 */
export function resolveConfig(config: GeneratorConfig = {}): ResolvedConfig {
  const result = GeneratorConfigSchema.safeParse(config)
  if (!result.success) {
    throw ConfigError.fromZod(result.error)
  }
  return result.data
}

/**
 * Flattens intersections for readability; used as a declaration `wrapper`
 */
export const PRETTIFY_TYPE = "type Prettify<T> = { [K in keyof T]: T[K] } & {};"

/**
 * One output file of a module-partitioned render
 */
export interface RenderedUnit {
  /** Origin module path, or `undefined` for the default unit */
  module: string | undefined
  /** Relative file path, e.g. `models/user.ts` */
  path: string
  /** Qualified names declared in this unit, in dependency order */
  names: string[]
  content: string
}
