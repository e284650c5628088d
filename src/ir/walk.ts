import { assertNever, type Field, type NamedType, type TypeDef } from "@/ir/types"
import { qualifiedName } from "@/ir/builders"

/**
 * Direct children of a node, in source order. A Named node's only child is its body.
 */
export function childrenOf(node: TypeDef): TypeDef[] {
  switch (node.kind) {
    case "primitive":
    case "ref":
    case "literal":
      return []
    case "array":
      return [node.element]
    case "tuple":
      return node.elements
    case "object":
      return node.fields.map((f) => f.type)
    case "union":
    case "intersection":
      return node.members
    case "record":
      return [node.key, node.value]
    case "named":
      return [node.def]
    case "function":
      return [...node.params.map((p) => p.type), node.returns]
    case "generic":
      return node.args
    case "templateLiteral":
      return node.types
    case "indexedAccess":
      return [node.base]
    default:
      return assertNever(node)
  }
}

/**
 * A named node's own body plus its type-parameter constraints and defaults
 */
function bodyOf(node: NamedType): TypeDef[] {
  const params = node.typeParams ?? []
  return [node.def, ...params.flatMap((p) => [p.constraint, p.default].filter((d): d is TypeDef => d !== undefined))]
}

/**
 * Names a declaration's body points at, in first-seen order.
 *
 * Collects every `Ref`, every nested Named (by name only: its body is not entered), and
 * unless told otherwise every generic base. Type parameters of the declaration itself are excluded.
 */
export function referencedNames(node: NamedType, options: { genericBases?: boolean } = {}): string[] {
  const genericBases = options.genericBases ?? true
  const found = new Set<string>()
  const params = new Set((node.typeParams ?? []).map((p) => p.name))

  const visit = (current: TypeDef) => {
    switch (current.kind) {
      case "ref":
        if (!params.has(current.name)) found.add(current.name)
        return
      case "named":
        found.add(qualifiedName(current))
        return
      case "generic":
        if (genericBases && !params.has(current.base)) found.add(current.base)
        break
    }
    for (const child of childrenOf(current)) visit(child)
  }

  for (const part of bodyOf(node)) visit(part)
  return Array.from(found)
}

/**
 * Registry key a name used inside `namespace` refers to. Enclosing namespaces are searched
 * innermost first, then the top level.
 * @returns The first candidate `isKnown` accepts, or undefined
 */
export function resolveName(name: string, namespace: readonly string[], isKnown: (key: string) => boolean): string | undefined {
  for (let depth = namespace.length; depth > 0; depth--) {
    const candidate = [...namespace.slice(0, depth), name].join(".")
    if (isKnown(candidate)) return candidate
  }
  return isKnown(name) ? name : undefined
}

/**
 * Every Named node reachable from `root`, root first, each body visited before its siblings.
 * A name seen once, or reported as already known, is not descended into again.
 */
export function collectNamed(root: TypeDef, isKnown: (name: string) => boolean = () => false): NamedType[] {
  const result: NamedType[] = []
  const seen = new Set<string>()

  const visit = (node: TypeDef) => {
    if (node.kind === "named") {
      const key = qualifiedName(node)
      if (seen.has(key) || isKnown(key)) return
      seen.add(key)
      result.push(node)
      for (const part of bodyOf(node)) visit(part)
      return
    }
    for (const child of childrenOf(node)) visit(child)
  }

  visit(root)
  return result
}

/**
 * Rebuild a tree with every `Ref` whose name is in `bindings` replaced.
 * Nested Named nodes are separate declarations with their own parameters and stay as they are.
 */
export function substitute(node: TypeDef, bindings: ReadonlyMap<string, TypeDef>): TypeDef {
  if (bindings.size === 0) return node

  const sub = (n: TypeDef) => substitute(n, bindings)
  const subField = (f: Field): Field => ({ ...f, type: sub(f.type) })

  switch (node.kind) {
    case "ref":
      return bindings.get(node.name) ?? node
    case "primitive":
    case "literal":
      return node
    case "array":
      return { kind: "array", element: sub(node.element) }
    case "tuple":
      return { kind: "tuple", elements: node.elements.map(sub) }
    case "object":
      return { kind: "object", fields: node.fields.map(subField) }
    case "union":
      return { kind: "union", members: node.members.map(sub) }
    case "intersection":
      return { kind: "intersection", members: node.members.map(sub) }
    case "record":
      return { kind: "record", key: sub(node.key), value: sub(node.value) }
    case "named":
      return node
    case "function":
      return { kind: "function", params: node.params.map(subField), returns: sub(node.returns) }
    case "generic":
      return { kind: "generic", base: node.base, args: node.args.map(sub) }
    case "templateLiteral":
      return { kind: "templateLiteral", strings: node.strings, types: node.types.map(sub) }
    case "indexedAccess":
      return { kind: "indexedAccess", base: sub(node.base), key: node.key }
    default:
      return assertNever(node)
  }
}
