import { describe, it, expect } from "vitest"
import { importTypeScript } from "@/importer"
import { named, renderDeclaration, t } from "@/ir"
import { TypeRegistry } from "@/describe/registry"
import { ImportError } from "@/errors"

/**
 * Import a single declaration and render it
 */
function declaration(source: string): string {
  const [node] = importTypeScript(source)
  return renderDeclaration(node)
}

describe("importTypeScript()", () => {
  describe("interfaces", () => {
    it("should import fields and methods", () => {
      expect(declaration("interface User { id: string; readonly email?: string; tags: string[]; greet(name: string): void }")).toBe(
        "User = { id: string; readonly email?: string; tags: string[]; greet: (name: string) => void }",
      )
    })

    it("should import type parameters and intersect base interfaces", () => {
      expect(declaration("interface Page<T extends object = {}> extends Base { items: T[]; total: number }")).toBe(
        "Page<T extends object = {}> = Base & { items: T[]; total: number }",
      )
    })

    it("should import an index-only interface as a record", () => {
      expect(declaration("interface Scores { [player: string]: number }")).toBe("Scores = Record<string, number>")
    })
  })

  describe("type aliases", () => {
    it.each([
      ["type Pair = [string, number?]", "Pair = [string, number | undefined]"],
      ["type Items = [string, ...number[]]", "Items = (string | number)[]"],
      ["type Index = Record<string, User[]>", "Index = Record<string, User[]>"],
      ["type Pending = Promise<User>", "Pending = Promise<User>"],
      ["type List = ReadonlyArray<User>", "List = User[]"],
      ["type Where = geo.Point", "Where = geo.Point"],
      ["type Counts = { [key: string]: number }", "Counts = Record<string, number>"],
      ["type Vm = `vm-${string}`", "Vm = `vm-${string}`"],
      ["type UserId = User['id']", 'UserId = User["id"]'],
      ["type Maybe = string | null | undefined", "Maybe = string | null | undefined"],
      ["type Flags = readonly boolean[]", "Flags = boolean[]"],
      ["type Handler = (event: Event, retry?: boolean) => Promise<void>", "Handler = (event: Event, retry?: boolean) => Promise<void>"],
      ["type Keys = keyof User", "Keys = any"],
    ])("%s", (source, expected) => {
      expect(declaration(source)).toBe(expected)
    })
  })

  describe("enums", () => {
    it("should use string initializers", () => {
      expect(declaration('enum Color { Red = "red", Green = "green" }')).toBe('Color = "red" | "green"')
    })

    it("should fall back to member names", () => {
      expect(declaration("enum Direction { Up, Down }")).toBe('Direction = "Up" | "Down"')
    })

    it("should keep numeric initializers", () => {
      expect(declaration("enum Code { Ok = 1, Bad = -2 }")).toBe("Code = 1 | -2")
    })
  })

  it("should import declarations inside namespaces", () => {
    const nodes = importTypeScript("namespace geo { export interface Point { x: number; y: number } }\nnamespace a.b { type X = string }")

    expect(nodes.map((n) => [n.namespace, n.name])).toEqual([
      [["geo"], "Point"],
      [["a", "b"], "X"],
    ])
  })

  it("should resolve sibling references inside a namespace", () => {
    const registry = new TypeRegistry()
    for (const node of importTypeScript("namespace geo { export interface Point { x: number } export interface Line { a: Point; b: Point } }")) {
      registry.add(node)
    }

    expect(registry.danglingRefs()).toEqual([])
    expect(registry.dependencies("geo.Line")).toEqual(["geo.Point"])
    expect(registry.renderAll({ danglingRefs: "error" })).toBe(
      [
        "// Generated by typeweave",
        "// Do not edit manually",
        "",
        "export namespace geo {",
        "  export type Point = { x: number };",
        "  export type Line = { a: Point; b: Point };",
        "}",
        "",
      ].join("\n"),
    )
  })

  it("should record the origin module and enclosing namespace", () => {
    expect(importTypeScript("type Id = string", { module: "app::ids", namespace: ["core"] })).toEqual([
      named("Id", t.string, { namespace: ["core"], originModule: "app::ids" }),
    ])
  })

  it("should skip statements that declare no types", () => {
    expect(importTypeScript("const answer = 42\nfunction noop() {}")).toEqual([])
  })

  it("should reject source with syntax errors", () => {
    expect(() => importTypeScript("interface User { id: string")).toThrow(ImportError)

    try {
      importTypeScript("interface User { id: string", { fileName: "user.ts" })
    } catch (err) {
      expect(err).toBeInstanceOf(ImportError)
      if (err instanceof ImportError) {
        expect(err.code).toBe("parse-error")
        expect(err.diagnostics[0]).toMatch(/^user\.ts:1:\d+ '}' expected\.$/)
      }
    }
  })

  it("should feed a registry that orders the imported declarations", () => {
    const registry = new TypeRegistry()
    for (const node of importTypeScript("interface User { address: Address }\ninterface Address { city: string }")) {
      registry.add(node)
    }

    expect(registry.sortedNames()).toEqual(["Address", "User"])
    expect(registry.renderAll({ danglingRefs: "error" })).toBe(
      ["// Generated by typeweave", "// Do not edit manually", "", "export type Address = { city: string };", "", "export type User = { address: Address };", ""].join(
        "\n",
      ),
    )
  })
})
