import ts from "typescript"
import { ImportError } from "@/errors"
import type { Field, NamedType, TypeDef } from "@/ir/types"
import { field, named, t } from "@/ir/builders"
import { convert } from "@/convert/converter"
import type { GenericParam, MemberAttributes, SourceDescriptor, SourceMember } from "@/convert/types"

export interface ImportOptions {
  /** Origin module recorded on every imported declaration */
  module?: string
  /** Namespace path the source is nested in */
  namespace?: string[]
  /** File name used in diagnostics */
  fileName?: string
}

const anyKeyword = () => ts.factory.createKeywordTypeNode(ts.SyntaxKind.AnyKeyword)

/**
 * Convert TypeScript keyword type to IR
 */
function convertKeyword(kind: ts.SyntaxKind): TypeDef | undefined {
  switch (kind) {
    case ts.SyntaxKind.StringKeyword:
      return t.string
    case ts.SyntaxKind.NumberKeyword:
      return t.number
    case ts.SyntaxKind.BooleanKeyword:
      return t.boolean
    case ts.SyntaxKind.BigIntKeyword:
      return t.bigint
    case ts.SyntaxKind.UndefinedKeyword:
      return t.undefined
    case ts.SyntaxKind.VoidKeyword:
      return t.void
    case ts.SyntaxKind.NeverKeyword:
      return t.never
    case ts.SyntaxKind.AnyKeyword:
      return t.any
    case ts.SyntaxKind.UnknownKeyword:
      return t.unknown
    case ts.SyntaxKind.ObjectKeyword:
      return t.ref("object")
    case ts.SyntaxKind.SymbolKeyword:
      return t.ref("symbol")
    default:
      return undefined
  }
}

/**
 * `Foo` or `A.B.Foo`
 */
function entityName(name: ts.EntityName): string {
  return ts.isIdentifier(name) ? name.text : `${entityName(name.left)}.${name.right.text}`
}

function expressionName(expression: ts.Expression): string | undefined {
  if (ts.isIdentifier(expression)) return expression.text
  if (ts.isPropertyAccessExpression(expression)) {
    const left = expressionName(expression.expression)
    return left === undefined ? undefined : `${left}.${expression.name.text}`
  }
  return undefined
}

/**
 * Text of a property name; computed names have none
 */
function propertyName(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name) || ts.isPrivateIdentifier(name)) {
    return name.text
  }
  return undefined
}

const hasModifier = (node: ts.HasModifiers, kind: ts.SyntaxKind) => ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false

function convertLiteral(literal: ts.LiteralTypeNode["literal"]): TypeDef {
  switch (literal.kind) {
    case ts.SyntaxKind.NullKeyword:
      return t.null
    case ts.SyntaxKind.TrueKeyword:
      return t.literal(true)
    case ts.SyntaxKind.FalseKeyword:
      return t.literal(false)
  }
  if (ts.isStringLiteral(literal) || ts.isNoSubstitutionTemplateLiteral(literal)) {
    return t.literal(literal.text)
  }
  if (ts.isNumericLiteral(literal)) {
    return t.literal(Number(literal.text))
  }
  if (ts.isPrefixUnaryExpression(literal) && literal.operator === ts.SyntaxKind.MinusToken && ts.isNumericLiteral(literal.operand)) {
    return t.literal(-Number(literal.operand.text))
  }
  return t.any
}

/**
 * Convert function parameters; unnamed (destructured) parameters are numbered
 */
function convertParams(params: ts.NodeArray<ts.ParameterDeclaration>): Field[] {
  return params.map((param, i) =>
    field(ts.isIdentifier(param.name) ? param.name.text : `arg${i}`, param.type ? convertTypeNode(param.type) : t.any, {
      optional: param.questionToken !== undefined,
    }),
  )
}

/**
 * Convert the members of an interface body or type literal to fields.
 * Index signatures are dropped; call and construct signatures too.
 */
function convertMembers(members: ts.NodeArray<ts.TypeElement>): Field[] {
  const fields: Field[] = []
  for (const member of members) {
    const name = member.name ? propertyName(member.name) : undefined
    if (name === undefined) continue

    if (ts.isPropertySignature(member)) {
      fields.push(
        field(name, member.type ? convertTypeNode(member.type) : t.any, {
          optional: member.questionToken !== undefined,
          readonly: hasModifier(member, ts.SyntaxKind.ReadonlyKeyword),
        }),
      )
    } else if (ts.isMethodSignature(member)) {
      const method = t.fn(convertParams(member.parameters), member.type ? convertTypeNode(member.type) : t.any)
      fields.push(field(name, method, { optional: member.questionToken !== undefined }))
    }
  }
  return fields
}

/**
 * A type literal consisting of a single index signature, e.g. `{ [key: string]: number }`
 */
function indexSignatureOnly(members: ts.NodeArray<ts.TypeElement>): ts.IndexSignatureDeclaration | undefined {
  if (members.length !== 1) return undefined
  const [member] = members
  return ts.isIndexSignatureDeclaration(member) ? member : undefined
}

function convertIndexSignature(signature: ts.IndexSignatureDeclaration): TypeDef {
  const [param] = signature.parameters
  const key = param?.type ? convertTypeNode(param.type) : t.string
  return t.record(key, convertTypeNode(signature.type))
}

function convertTupleElement(element: ts.TypeNode): TypeDef {
  if (ts.isNamedTupleMember(element)) {
    const type = convertTypeNode(element.type)
    return element.questionToken ? t.union([type, t.undefined]) : type
  }
  if (ts.isOptionalTypeNode(element)) {
    return t.union([convertTypeNode(element.type), t.undefined])
  }
  return convertTypeNode(element)
}

const isRest = (element: ts.TypeNode) => ts.isRestTypeNode(element) || (ts.isNamedTupleMember(element) && element.dotDotDotToken !== undefined)

/**
 * Element type contributed by a rest member: `...T[]` contributes `T`
 */
function restElement(element: ts.TypeNode): TypeDef {
  const inner = ts.isRestTypeNode(element) ? element.type : ts.isNamedTupleMember(element) ? element.type : element
  const converted = convertTypeNode(inner)
  return converted.kind === "array" ? converted.element : converted
}

function convertTuple(node: ts.TupleTypeNode): TypeDef {
  if (!node.elements.some(isRest)) {
    return t.tuple(node.elements.map(convertTupleElement))
  }
  const members = node.elements.map((element) => (isRest(element) ? restElement(element) : convertTupleElement(element)))
  return t.array(members.length === 1 ? members[0] : t.union(members))
}

function convertReference(node: ts.TypeReferenceNode): TypeDef {
  const name = entityName(node.typeName)
  const args = (node.typeArguments ?? []).map(convertTypeNode)

  if ((name === "Array" || name === "ReadonlyArray") && args.length === 1) {
    return t.array(args[0])
  }
  if (name === "Record" && args.length === 2) {
    return t.record(args[0], args[1])
  }
  return args.length > 0 ? t.generic(name, args) : t.ref(name)
}

function convertTemplate(node: ts.TemplateLiteralTypeNode): TypeDef {
  const strings = [node.head.text, ...node.templateSpans.map((span) => span.literal.text)]
  return t.template(
    strings,
    node.templateSpans.map((span) => convertTypeNode(span.type)),
  )
}

/**
 * Convert a type node to IR. Constructs without an IR counterpart become `any`.
 */
export function convertTypeNode(node: ts.TypeNode): TypeDef {
  const keyword = convertKeyword(node.kind)
  if (keyword) return keyword

  if (ts.isParenthesizedTypeNode(node)) return convertTypeNode(node.type)
  if (ts.isArrayTypeNode(node)) return t.array(convertTypeNode(node.elementType))
  if (ts.isTupleTypeNode(node)) return convertTuple(node)
  if (ts.isUnionTypeNode(node)) return t.union(node.types.map(convertTypeNode))
  if (ts.isIntersectionTypeNode(node)) return t.intersection(node.types.map(convertTypeNode))
  if (ts.isTypeReferenceNode(node)) return convertReference(node)
  if (ts.isLiteralTypeNode(node)) return convertLiteral(node.literal)
  if (ts.isTemplateLiteralTypeNode(node)) return convertTemplate(node)

  if (ts.isTypeLiteralNode(node)) {
    const index = indexSignatureOnly(node.members)
    return index ? convertIndexSignature(index) : t.object(convertMembers(node.members))
  }

  if (ts.isFunctionTypeNode(node)) {
    return t.fn(convertParams(node.parameters), convertTypeNode(node.type))
  }

  if (ts.isIndexedAccessTypeNode(node)) {
    const index = node.indexType
    if (ts.isLiteralTypeNode(index) && ts.isStringLiteral(index.literal)) {
      return t.indexed(convertTypeNode(node.objectType), index.literal.text)
    }
    return t.any
  }

  if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword) {
    return convertTypeNode(node.type)
  }

  return t.any
}

function genericParams(params: ts.NodeArray<ts.TypeParameterDeclaration> | undefined): GenericParam<ts.TypeNode>[] {
  return (params ?? []).map((param) => ({ name: param.name.text, constraint: param.constraint, default: param.default }))
}

interface Scope {
  namespace: string[]
  module?: string
}

/**
 * Interface declarations are records; `extends` clauses are intersected in front of the body
 */
function importInterface(node: ts.InterfaceDeclaration, scope: Scope): NamedType | undefined {
  const generics = genericParams(node.typeParameters)
  const index = indexSignatureOnly(node.members)

  let descriptor: SourceDescriptor<ts.TypeNode>
  if (index) {
    descriptor = { kind: "alias", name: node.name.text, namespace: scope.namespace, module: scope.module, generics, target: ts.factory.createTypeLiteralNode(node.members) }
  } else {
    const members: SourceMember<ts.TypeNode>[] = []
    for (const member of node.members) {
      const name = member.name ? propertyName(member.name) : undefined
      if (name === undefined) continue

      if (ts.isPropertySignature(member)) {
        const attributes: MemberAttributes = {}
        if (member.questionToken) attributes.default = true
        if (hasModifier(member, ts.SyntaxKind.ReadonlyKeyword)) attributes.readonly = true
        members.push({ name, type: member.type ?? anyKeyword(), attributes })
      } else if (ts.isMethodSignature(member)) {
        const type = ts.factory.createFunctionTypeNode(member.typeParameters, member.parameters, member.type ?? anyKeyword())
        members.push({ name, type, attributes: member.questionToken ? { default: true } : {} })
      }
    }
    descriptor = { kind: "record", shape: "named", name: node.name.text, namespace: scope.namespace, module: scope.module, generics, members }
  }

  const result = convert(descriptor, convertTypeNode)
  if (result.kind !== "named") return undefined

  const bases: TypeDef[] = []
  for (const clause of node.heritageClauses ?? []) {
    for (const base of clause.types) {
      const name = expressionName(base.expression)
      if (name === undefined) continue
      const args = (base.typeArguments ?? []).map(convertTypeNode)
      bases.push(args.length > 0 ? t.generic(name, args) : t.ref(name))
    }
  }

  return bases.length > 0 ? { ...result, def: t.intersection([...bases, result.def]) } : result
}

function importAlias(node: ts.TypeAliasDeclaration, scope: Scope): NamedType | undefined {
  const result = convert(
    { kind: "alias", name: node.name.text, namespace: scope.namespace, module: scope.module, generics: genericParams(node.typeParameters), target: node.type },
    convertTypeNode,
  )
  return result.kind === "named" ? result : undefined
}

/**
 * Enums become literal unions: initializer values where given, member names otherwise
 */
function importEnum(node: ts.EnumDeclaration, scope: Scope): NamedType {
  const values = node.members.map((member): TypeDef => {
    const init = member.initializer
    if (init && (ts.isStringLiteral(init) || ts.isNoSubstitutionTemplateLiteral(init))) return t.literal(init.text)
    if (init && ts.isNumericLiteral(init)) return t.literal(Number(init.text))
    if (init && ts.isPrefixUnaryExpression(init) && init.operator === ts.SyntaxKind.MinusToken && ts.isNumericLiteral(init.operand)) {
      return t.literal(-Number(init.operand.text))
    }
    return t.literal(propertyName(member.name) ?? member.name.getText())
  })

  const def = values.length === 0 ? t.never : values.length === 1 ? values[0] : t.union(values)
  return named(node.name.text, def, { namespace: scope.namespace, originModule: scope.module })
}

function importStatements(statements: ts.NodeArray<ts.Statement>, scope: Scope, result: NamedType[]) {
  for (const statement of statements) {
    let imported: NamedType | undefined
    if (ts.isInterfaceDeclaration(statement)) {
      imported = importInterface(statement, scope)
    } else if (ts.isTypeAliasDeclaration(statement)) {
      imported = importAlias(statement, scope)
    } else if (ts.isEnumDeclaration(statement)) {
      imported = importEnum(statement, scope)
    } else if (ts.isModuleDeclaration(statement)) {
      importNamespace(statement, scope, result)
    }
    if (imported) result.push(imported)
  }
}

/**
 * `namespace A.B { ... }` parses as A containing B
 */
function importNamespace(node: ts.ModuleDeclaration, scope: Scope, result: NamedType[]) {
  if (!ts.isIdentifier(node.name)) return
  const inner: Scope = { ...scope, namespace: [...scope.namespace, node.name.text] }
  const body = node.body
  if (!body) return
  if (ts.isModuleBlock(body)) {
    importStatements(body.statements, inner, result)
  } else if (ts.isModuleDeclaration(body)) {
    importNamespace(body, inner, result)
  }
}

function formatDiagnostic(diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n")
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start)
    return `${diagnostic.file.fileName}:${line + 1}:${character + 1} ${message}`
  }
  return message
}

/**
 * Syntax errors in the source, formatted `file:line:column message`
 */
function syntaxDiagnostics(source: string, fileName: string): string[] {
  const output = ts.transpileModule(source, { fileName, reportDiagnostics: true, compilerOptions: { target: ts.ScriptTarget.ES2022 } })
  return (output.diagnostics ?? []).filter((d) => d.category === ts.DiagnosticCategory.Error).map(formatDiagnostic)
}

/**
 * Parse TypeScript source text and convert every interface, type alias and enum in it,
 * including those inside namespace blocks, in source order.
 *
 * Throws `ImportError` listing every syntax error before any declaration is converted.
 *
 * @example
 * ```ts
 * const types = importTypeScript("interface User { id: string; email?: string }")
 * // [named("User", t.object([field("id", t.string), field("email", t.string, { optional: true })]))]
 * ```
 */
export function importTypeScript(source: string, options: ImportOptions = {}): NamedType[] {
  const fileName = options.fileName ?? "input.ts"
  const diagnostics = syntaxDiagnostics(source, fileName)
  if (diagnostics.length > 0) {
    throw new ImportError(diagnostics)
  }

  const file = ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS)
  const result: NamedType[] = []
  importStatements(file.statements, { namespace: options.namespace ?? [], module: options.module }, result)
  return result
}
