import type { TypeDef } from "@/ir/types"
import { TypeRegistry } from "@/describe/registry"

/**
 * A type to declare, or a function producing it. Factories run when the catalog is collected,
 * so a module can declare a type before the types it refers to have been built.
 */
export type CatalogEntry = TypeDef | (() => TypeDef)

/**
 * Append-only list of declared types, filled in by module initialization code and
 * read into a registry at program start.
 */
export class TypeCatalog {
  private _entries: CatalogEntry[] = []

  /**
   * Append a type to the catalog
   * @returns this for method chaining
   */
  declare(entry: CatalogEntry): this {
    this._entries.push(entry)
    return this
  }

  get size(): number {
    return this._entries.length
  }

  /**
   * Add every declared type to a registry, in declaration order
   * @param registry - Target registry; a fresh one when omitted
   */
  collect(registry: TypeRegistry = new TypeRegistry()): TypeRegistry {
    for (const entry of this._entries) {
      registry.add(typeof entry === "function" ? entry() : entry)
    }
    return registry
  }
}

/**
 * The process-wide catalog
 */
export const catalog = new TypeCatalog()

/**
 * Declare a type in the process-wide catalog
 */
export function declareType(entry: CatalogEntry): void {
  catalog.declare(entry)
}

/**
 * Read the process-wide catalog into a registry
 */
export function collectDeclaredTypes(registry?: TypeRegistry): TypeRegistry {
  return catalog.collect(registry)
}
