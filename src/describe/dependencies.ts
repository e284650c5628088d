import { referencedNames, resolveName } from "@/ir/walk"
import type { TypeRegistry } from "@/describe/registry"

/**
 * By-name dependency edges between registered declarations. Every list is in registration order.
 */
export interface DependencyGraph {
  /** All registered names in registration order */
  names: string[]
  /** name -> registered names its body refers to */
  dependencies: Map<string, string[]>
  /** name -> registered names whose bodies refer to it */
  dependents: Map<string, string[]>
}

/**
 * Build the dependency graph of a registry.
 * A reference made inside a namespace resolves against the enclosing namespaces first.
 * References to unregistered names are external and produce no edge; neither do self-references.
 */
export function buildDependencyGraph(registry: TypeRegistry): DependencyGraph {
  const names = registry.names()
  const position = new Map(names.map((name, i) => [name, i]))
  const dependencies = new Map<string, string[]>()
  const dependents = new Map<string, string[]>(names.map((name) => [name, []]))

  for (const name of names) {
    const node = registry.get(name)
    const resolved = new Set<string>()
    if (node) {
      for (const ref of referencedNames(node)) {
        const dep = resolveName(ref, node.namespace, (key) => position.has(key))
        if (dep !== undefined && dep !== name) resolved.add(dep)
      }
    }
    const deps = Array.from(resolved)
    deps.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0))
    dependencies.set(name, deps)

    // Iterating in registration order keeps each dependents list in registration order
    for (const dep of deps) {
      dependents.get(dep)?.push(name)
    }
  }

  return { names, dependencies, dependents }
}

/**
 * Order names so every dependency precedes its dependents (Kahn's algorithm).
 *
 * Ties are broken by registration order. Names caught in a cycle never reach in-degree zero;
 * they are appended afterwards in registration order, so nothing is dropped.
 */
export function topologicalOrder(graph: DependencyGraph): string[] {
  const inDegree = new Map<string, number>()
  for (const name of graph.names) {
    inDegree.set(name, graph.dependencies.get(name)?.length ?? 0)
  }

  const queue = graph.names.filter((name) => inDegree.get(name) === 0)
  const result: string[] = []
  let head = 0

  while (head < queue.length) {
    const current = queue[head++]
    result.push(current)

    for (const dependent of graph.dependents.get(current) ?? []) {
      const degree = (inDegree.get(dependent) ?? 0) - 1
      inDegree.set(dependent, degree)
      if (degree === 0) {
        queue.push(dependent)
      }
    }
  }

  if (result.length < graph.names.length) {
    const placed = new Set(result)
    for (const name of graph.names) {
      if (!placed.has(name)) result.push(name)
    }
  }

  return result
}

/**
 * Recursively collect the given names and everything they depend on
 * @param names - The names to start from; unregistered ones are ignored
 * @param registry - The registry containing the declarations
 * @param visited - Names already handled (for recursion)
 * @returns Registered names in discovery order
 */
export function collectTypeDependencies(names: string[], registry: TypeRegistry, visited: Set<string> = new Set<string>()): string[] {
  const graph = buildDependencyGraph(registry)
  const all: string[] = []

  function collect(name: string) {
    if (visited.has(name) || !registry.has(name)) return
    visited.add(name)
    all.push(name)

    for (const dep of graph.dependencies.get(name) ?? []) {
      collect(dep)
    }
  }

  for (const name of names) {
    collect(name)
  }

  return all
}
