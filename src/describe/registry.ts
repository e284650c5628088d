import type { NamedType, TypeDef } from "@/ir/types"
import { qualifiedName } from "@/ir/builders"
import { collectNamed, referencedNames, resolveName } from "@/ir/walk"
import { buildDependencyGraph, collectTypeDependencies, topologicalOrder } from "@/describe/dependencies"
import { registryToModules, registryToTypescript } from "@/describe/typescript"
import type { GeneratorConfig, RenderedUnit } from "@/describe/types"

/**
 * Names every TypeScript program can refer to without a declaration
 */
export const GLOBAL_TYPE_NAMES: ReadonlySet<string> = new Set([
  "Array",
  "ReadonlyArray",
  "Record",
  "Partial",
  "Required",
  "Readonly",
  "Pick",
  "Omit",
  "Exclude",
  "Extract",
  "NonNullable",
  "ReturnType",
  "Parameters",
  "Awaited",
  "Promise",
  "Date",
  "RegExp",
  "Error",
  "Map",
  "Set",
  "Uint8Array",
  "Lowercase",
  "Uppercase",
  "Capitalize",
  "Uncapitalize",
  "Prettify",
  "object",
  "symbol",
])

/**
 * Leading identifier of a reference such as `Foo.Bar` or `Lowercase<string>`
 */
const rootIdentifier = (name: string) => name.split(/[.<[\s]/)[0]

/**
 * Accumulates named type declarations, deduplicated by qualified name and kept in
 * registration order. Rendering orders them so dependencies come first.
 *
 * A registry has a single writer: add everything, then render as often as needed.
 *
 * @example
 * ```ts
 * const registry = new TypeRegistry()
 * registry.add(named("User", t.object([field("id", t.string)])))
 * registry.renderAll({ exportStyle: "named" })
 * ```
 */
export class TypeRegistry {
  private _types: Map<string, NamedType> = new Map()

  /**
   * Register every Named node reachable from `def`. Names already registered are left as they are,
   * so adding the same tree twice is a no-op.
   * @returns this for method chaining
   */
  add(def: TypeDef): this {
    for (const node of collectNamed(def, (name) => this._types.has(name))) {
      this._types.set(qualifiedName(node), node)
    }
    return this
  }

  /**
   * Get a declaration by qualified name
   */
  get(name: string): NamedType | undefined {
    return this._types.get(name)
  }

  has(name: string): boolean {
    return this._types.has(name)
  }

  /**
   * Remove a declaration. Other declarations that refer to it are kept.
   * @returns true if the declaration was removed
   */
  remove(name: string): boolean {
    return this._types.delete(name)
  }

  clear(): void {
    this._types.clear()
  }

  /**
   * Number of registered declarations
   */
  get size(): number {
    return this._types.size
  }

  /**
   * Qualified names in registration order
   */
  names(): string[] {
    return Array.from(this._types.keys())
  }

  /**
   * Declarations in registration order
   */
  *values(): IterableIterator<NamedType> {
    yield* this._types.values()
  }

  /**
   * Registered names the declaration refers to directly, in registration order
   */
  dependencies(name: string): string[] {
    return buildDependencyGraph(this).dependencies.get(name) ?? []
  }

  /**
   * Names ordered so that each declaration follows everything it refers to.
   * Declarations on a cycle follow the rest in registration order.
   */
  sortedNames(): string[] {
    return topologicalOrder(buildDependencyGraph(this))
  }

  /**
   * Collect the given names and everything they depend on, transitively
   */
  collectDependencies(names: string[]): string[] {
    return collectTypeDependencies(names, this)
  }

  /**
   * Create a new registry holding only the given declarations and their dependencies.
   * Registration order is preserved.
   */
  subset(names: string[]): TypeRegistry {
    const keep = new Set(this.collectDependencies(names))
    const result = new TypeRegistry()

    for (const [name, node] of this._types) {
      if (keep.has(name)) {
        result._types.set(name, node)
      }
    }

    return result
  }

  /**
   * Referenced names that resolve to nothing: not registered (directly or through an
   * enclosing namespace), not a type parameter,
   * not a TypeScript global and not listed in `external`
   * @returns Names in first-seen order
   */
  danglingRefs(external: string[] = []): string[] {
    const known = new Set(external)
    const dangling = new Set<string>()

    for (const node of this._types.values()) {
      for (const name of referencedNames(node, { genericBases: false })) {
        if (known.has(name) || resolveName(name, node.namespace, (key) => this._types.has(key)) !== undefined) continue
        const root = rootIdentifier(name)
        if (GLOBAL_TYPE_NAMES.has(root) || known.has(root)) continue
        dangling.add(name)
      }
    }

    return Array.from(dangling)
  }

  /**
   * Render every declaration as one TypeScript source text
   */
  renderAll(config: GeneratorConfig = {}): string {
    return registryToTypescript(this, config)
  }

  /**
   * Render one source text per origin module
   */
  renderModules(config: GeneratorConfig = {}): RenderedUnit[] {
    return registryToModules(this, config)
  }
}
