import { assertNever, type Field, type LiteralValue, type NamedType, type TypeDef, type TypeParam } from "@/ir/types"
import { qualifiedName } from "@/ir/builders"

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

const LINE_TERMINATORS: Record<string, string> = {
  "\n": "\\n",
  "\r": "\\r",
  "\u2028": "\\u2028",
  "\u2029": "\\u2029",
}

/**
 * Escape a string for a double-quoted literal. Line terminators become escape sequences.
 */
const quote = (s: string) =>
  `"${s
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/[\n\r\u2028\u2029]/g, (c) => LINE_TERMINATORS[c] ?? c)}"`

/**
 * Property keys that are not identifiers must be quoted
 */
const propertyKey = (name: string) => (IDENTIFIER.test(name) ? name : quote(name))

/**
 * Escape the literal part of a template literal type
 */
const templateText = (s: string) => s.replace(/\\/g, "\\\\").replace(/`/g, "\\`").replace(/\$\{/g, "\\${")

function renderLiteral(value: LiteralValue): string {
  if (typeof value === "string") return quote(value)
  if (typeof value === "boolean") return String(value)
  // Integral values print without a fractional part; String() already does this for finite numbers
  if (!Number.isFinite(value)) return "number"
  return String(value)
}

function renderField(f: Field): string {
  return `${f.readonly ? "readonly " : ""}${propertyKey(f.name)}${f.optional ? "?" : ""}: ${render(f.type)}`
}

function renderParam(p: Field): string {
  return `${p.name}${p.optional ? "?" : ""}: ${render(p.type)}`
}

/**
 * Render a member of a union, wrapping function types whose arrows would otherwise swallow the rest
 */
function unionMember(node: TypeDef): string {
  return node.kind === "function" ? `(${render(node)})` : render(node)
}

/**
 * Render a member of an intersection; `&` binds tighter than `|`
 */
function intersectionMember(node: TypeDef): string {
  return node.kind === "union" || node.kind === "function" ? `(${render(node)})` : render(node)
}

/**
 * Render an array element; `[]` binds tighter than both `|` and `&`
 */
function arrayElement(node: TypeDef): string {
  return node.kind === "union" || node.kind === "intersection" || node.kind === "function" ? `(${render(node)})` : render(node)
}

/**
 * Render a TypeDef inline. Named types render as their qualified name.
 */
export function render(node: TypeDef): string {
  switch (node.kind) {
    case "primitive":
      return node.primitive
    case "array":
      return `${arrayElement(node.element)}[]`
    case "tuple":
      return `[${node.elements.map(render).join(", ")}]`
    case "object":
      return node.fields.length === 0 ? "{}" : `{ ${node.fields.map(renderField).join("; ")} }`
    case "union":
      return node.members.map(unionMember).join(" | ")
    case "intersection":
      return node.members.map(intersectionMember).join(" & ")
    case "record":
      return `Record<${render(node.key)}, ${render(node.value)}>`
    case "named":
      return qualifiedName(node)
    case "ref":
      return node.name
    case "literal":
      return renderLiteral(node.value)
    case "function":
      return `(${node.params.map(renderParam).join(", ")}) => ${render(node.returns)}`
    case "generic":
      return node.args.length === 0 ? node.base : `${node.base}<${node.args.map(render).join(", ")}>`
    case "templateLiteral": {
      let out = templateText(node.strings[0] ?? "")
      node.types.forEach((type, i) => {
        out += `\${${render(type)}}${templateText(node.strings[i + 1] ?? "")}`
      })
      return `\`${out}\``
    }
    case "indexedAccess":
      return `${arrayElement(node.base)}[${quote(node.key)}]`
    default:
      return assertNever(node)
  }
}

function renderTypeParam(p: TypeParam): string {
  let out = p.name
  if (p.constraint) out += ` extends ${render(p.constraint)}`
  if (p.default) out += ` = ${render(p.default)}`
  return out
}

/**
 * Render the declaration of a Named type: `Name<T> = body`.
 * The body is wrapped in the node's `wrapper` utility when one is set.
 */
export function renderDeclaration(node: TypeDef): string {
  if (node.kind !== "named") {
    throw new TypeError(`Only named types have declarations, got "${node.kind}"`)
  }
  return `${declarationHead(node)} = ${declarationBody(node)}`
}

/**
 * Unqualified name plus type parameter list
 */
export function declarationHead(node: NamedType): string {
  const params = node.typeParams ?? []
  return params.length === 0 ? node.name : `${node.name}<${params.map(renderTypeParam).join(", ")}>`
}

function declarationBody(node: NamedType): string {
  const body = render(node.def)
  return node.wrapper ? `${node.wrapper}<${body}>` : body
}
