import { posix } from "node:path"
import type { NamedType } from "@/ir/types"
import { qualifiedName } from "@/ir/builders"
import { renderDeclaration } from "@/ir/render"
import { RegistryError } from "@/errors"
import { PRETTIFY_TYPE, resolveConfig, type GeneratorConfig, type RenderedUnit, type ResolvedConfig } from "@/describe/types"
import type { TypeRegistry } from "@/describe/registry"
import { buildDependencyGraph, type DependencyGraph } from "@/describe/dependencies"

const DEFAULT_HEADER = ["// Generated by typeweave", "// Do not edit manually"]

const DEFAULT_UNIT = "types"

/**
 * Generate indentation spaces
 */
const space = (depth: number) => " ".repeat(depth)

/**
 * Header comment lines: the custom header, one `//` line per line, or the generated banner
 */
function formatHeader(header: string | undefined): string {
  if (header === undefined) return DEFAULT_HEADER.join("\n")
  return header
    .split("\n")
    .map((line) => (line.length > 0 ? `// ${line}` : "//"))
    .join("\n")
}

/**
 * Format a JSDoc comment from a declaration's description
 */
function formatJsDoc(description: string | undefined, depth: number): string {
  if (!description) {
    return ""
  }
  const indent = space(depth)
  const lines = description.split("\n").map((line) => `${indent} * ${line}`.trimEnd())
  return `${indent}/**\n${lines.join("\n")}\n${indent} */\n`
}

/**
 * `export type` for top-level declarations under the named style, plain `type` otherwise
 */
const typeKeyword = (config: ResolvedConfig) => (config.exportStyle === "named" ? "export type" : "type")

function formatUtilities(config: ResolvedConfig): string {
  return config.exportStyle === "named" ? `export ${PRETTIFY_TYPE}` : PRETTIFY_TYPE
}

/**
 * Split declarations into runs of consecutive entries sharing one namespace path
 */
function namespaceRuns(nodes: NamedType[]): NamedType[][] {
  const runs: NamedType[][] = []
  let current: NamedType[] = []
  let key: string | undefined

  for (const node of nodes) {
    const nodeKey = node.namespace.join(".")
    if (current.length > 0 && nodeKey !== key) {
      runs.push(current)
      current = []
    }
    key = nodeKey
    current.push(node)
  }
  if (current.length > 0) runs.push(current)

  return runs
}

/**
 * Render a run of declarations. Top-level runs produce one block per declaration;
 * namespaced runs produce a single `namespace A.B { ... }` block.
 */
function formatRun(run: NamedType[], config: ResolvedConfig): string[] {
  const namespace = run[0].namespace
  if (namespace.length === 0) {
    return run.map((node) => `${formatJsDoc(node.description, 0)}${typeKeyword(config)} ${renderDeclaration(node)};`)
  }

  const prefix = `${config.exportStyle === "named" ? "export " : ""}${config.declarationOnly ? "declare " : ""}`
  const body = run.map((node) => `${formatJsDoc(node.description, 2)}${space(2)}export type ${renderDeclaration(node)};`).join("\n")
  return [`${prefix}namespace ${namespace.join(".")} {\n${body}\n}`]
}

/**
 * Names listed by the grouped export statement: top-level declarations by name,
 * namespaced ones by their root namespace
 */
function exportedNames(nodes: NamedType[], config: ResolvedConfig): string[] {
  const names = new Set<string>()
  if (config.includeUtilities) names.add("Prettify")
  for (const node of nodes) {
    names.add(node.namespace.length > 0 ? node.namespace[0] : node.name)
  }
  return Array.from(names)
}

/**
 * Apply the configured dangling-reference policy
 */
function checkDanglingRefs(registry: TypeRegistry, config: ResolvedConfig) {
  if (config.danglingRefs === "ignore") return

  const dangling = registry.danglingRefs(config.external)
  if (dangling.length === 0) return

  const message = `Unresolved type references: ${dangling.join(", ")}`
  if (config.danglingRefs === "error") {
    throw new RegistryError(message, dangling)
  }
  console.warn(`[typeweave] ${message}`)
}

/**
 * Assemble one output text from its sections, separated by blank lines
 */
function assemble(nodes: NamedType[], config: ResolvedConfig, preamble: string[]): string {
  const parts = [formatHeader(config.header), ...preamble]

  if (config.includeUtilities) {
    parts.push(formatUtilities(config))
  }

  for (const run of namespaceRuns(nodes)) {
    parts.push(...formatRun(run, config))
  }

  if (config.exportStyle === "grouped" && nodes.length > 0) {
    parts.push(`export { ${exportedNames(nodes, config).join(", ")} };`)
  }

  return parts.join("\n\n") + "\n"
}

/**
 * Declarations of a registry in dependency order
 */
function sortedDeclarations(registry: TypeRegistry): NamedType[] {
  const nodes: NamedType[] = []
  for (const name of registry.sortedNames()) {
    const node = registry.get(name)
    if (node) nodes.push(node)
  }
  return nodes
}

/**
 * Convert all declarations in a registry to a single TypeScript source text.
 *
 * @param registry - The registry containing the declarations
 * @param config - Generator options; validated, unknown keys rejected
 * @returns TypeScript code ending in a newline
 */
export function registryToTypescript(registry: TypeRegistry, config: GeneratorConfig = {}): string {
  const resolved = resolveConfig(config)
  checkDanglingRefs(registry, resolved)
  return assemble(sortedDeclarations(registry), resolved, [])
}

/**
 * Relative output path of a module: `app::models::user` becomes `models/user`
 */
export function modulePath(module: string | undefined): string {
  if (module === undefined) return DEFAULT_UNIT
  const segments = module.split(/::|\//).filter((s) => s.length > 0)
  if (segments.length === 0) return DEFAULT_UNIT
  return (segments.length > 1 ? segments.slice(1) : segments).join("/")
}

/**
 * Import specifier of one unit as seen from another
 */
function relativeSpecifier(from: string, to: string, config: ResolvedConfig): string {
  let specifier = posix.relative(posix.dirname(from), to)
  if (!specifier.startsWith(".")) specifier = `./${specifier}`
  return config.esmExtensions ? `${specifier}.js` : specifier
}

interface Unit {
  module: string | undefined
  base: string
  nodes: NamedType[]
}

/**
 * Convert a registry to one TypeScript source text per origin module.
 * Units appear in the order their first declaration appears in dependency order;
 * declarations without an origin module share the `types` unit.
 */
export function registryToModules(registry: TypeRegistry, config: GeneratorConfig = {}): RenderedUnit[] {
  const resolved = resolveConfig(config)
  checkDanglingRefs(registry, resolved)

  const extension = resolved.declarationOnly ? ".d.ts" : ".ts"
  const graph = buildDependencyGraph(registry)
  const units = new Map<string, Unit>()
  const unitOf = new Map<string, string>()

  for (const node of sortedDeclarations(registry)) {
    const base = modulePath(node.originModule)
    let unit = units.get(base)
    if (!unit) {
      unit = { module: node.originModule, base, nodes: [] }
      units.set(base, unit)
    }
    unit.nodes.push(node)
    unitOf.set(qualifiedName(node), base)
  }

  return Array.from(units.values()).map((unit) => {
    const preamble: string[] = []
    if (unit.module !== undefined) {
      preamble.push(`// Module: ${unit.module}`)
    }

    const imports = resolved.exportStyle === "none" ? [] : formatImports(unit, registry, graph, unitOf, resolved)
    if (imports.length > 0) {
      preamble.push(imports.join("\n"))
    }

    return {
      module: unit.module,
      path: unit.base + extension,
      names: unit.nodes.map(qualifiedName),
      content: assemble(unit.nodes, resolved, preamble),
    }
  })
}

/**
 * `import type` lines for dependencies declared in other units, grouped by unit
 * in first-use order
 */
function formatImports(unit: Unit, registry: TypeRegistry, graph: DependencyGraph, unitOf: Map<string, string>, config: ResolvedConfig): string[] {
  const byUnit = new Map<string, Set<string>>()

  for (const node of unit.nodes) {
    for (const dep of graph.dependencies.get(qualifiedName(node)) ?? []) {
      const target = unitOf.get(dep)
      const depNode = registry.get(dep)
      if (target === undefined || target === unit.base || !depNode) continue

      let names = byUnit.get(target)
      if (!names) {
        names = new Set<string>()
        byUnit.set(target, names)
      }
      names.add(depNode.namespace.length > 0 ? depNode.namespace[0] : depNode.name)
    }
  }

  return Array.from(byUnit, ([target, names]) => `import type { ${Array.from(names).join(", ")} } from "${relativeSpecifier(unit.base, target, config)}";`)
}
