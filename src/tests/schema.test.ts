import { describe, it, expect, afterEach, vi } from "vitest"
import { z, schemaToTypeDef, schemasToTypeDefs, describeSchema, getAttributes, getOwnAttributes } from "@/schema"
import { render, renderDeclaration, t } from "@/ir"
import { TypeRegistry } from "@/describe/registry"
import { ConversionError } from "@/errors"

describe(".ts()", () => {
  it("should return a new schema carrying the attributes", () => {
    const base = z.string()
    const renamed = base.ts({ rename: "label" })

    expect(renamed).not.toBe(base)
    expect(getOwnAttributes(base)).toEqual({})
    expect(getOwnAttributes(renamed)).toEqual({ rename: "label" })
  })

  it("should merge attributes across calls", () => {
    const schema = z.string().ts({ rename: "label" }).ts({ readonly: true })

    expect(getOwnAttributes(schema)).toEqual({ rename: "label", readonly: true })
  })

  it("should read attributes through optional and nullable layers", () => {
    const schema = z.string().ts({ rename: "label" }).nullable().optional()

    expect(getAttributes(schema)).toEqual({ rename: "label" })
  })

  it("should let outer layers win", () => {
    const schema = z.string().ts({ rename: "inner" }).optional().ts({ rename: "outer" })

    expect(getAttributes(schema).rename).toBe("outer")
  })

  it("should reject invalid attributes", () => {
    expect(() => z.string().ts({ rename: "" })).toThrow(ConversionError)
  })
})

describe("schemaToTypeDef()", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  const Status = z.enum(["Pending", "Active"]).ts({ name: "Status" })

  it("should declare enums as string unions", () => {
    expect(renderDeclaration(schemaToTypeDef(Status))).toBe('Status = "Pending" | "Active"')
  })

  it("should apply enum policies and per-option attributes", () => {
    const Level = z.enum(["Low", "High"]).ts({ name: "Level", renameAll: "SCREAMING_SNAKE_CASE", variants: { High: { rename: "MAX" } } })

    expect(renderDeclaration(schemaToTypeDef(Level))).toBe('Level = "LOW" | "MAX"')
  })

  it("should declare objects with renamed and optional fields", () => {
    const User = z
      .object({
        user_id: z.string(),
        display_name: z.string().optional(),
        status: Status,
      })
      .ts({ name: "User", renameAll: "camelCase" })

    const registry = new TypeRegistry().add(schemaToTypeDef(User))

    expect(registry.names()).toEqual(["User", "Status"])
    expect(registry.sortedNames()).toEqual(["Status", "User"])
    expect(renderDeclaration(schemaToTypeDef(User))).toBe("User = { userId: string; displayName?: string; status: Status }")
  })

  it("should apply field attributes", () => {
    const Profile = z
      .object({
        id: z.string(),
        secret: z.string().ts({ skip: true }),
        nick: z.string().nullable().ts({ optional: true }),
        label: z.string().ts({ rename: "title" }),
        retries: z.number().default(3),
      })
      .ts({ name: "Profile" })

    expect(renderDeclaration(schemaToTypeDef(Profile))).toBe("Profile = { id: string; nick?: string; title: string; retries?: number }")
  })

  it("should convert nested structure", () => {
    const Event = z
      .object({
        at: z.date(),
        tags: z.set(z.string()),
        scores: z.record(z.string(), z.number()),
        kind: z.literal("event"),
        note: z.string().nullable(),
        either: z.union([z.string(), z.array(z.number())]),
        lookup: z.map(z.string(), z.boolean()),
      })
      .ts({ name: "Event" })

    expect(renderDeclaration(schemaToTypeDef(Event))).toBe(
      'Event = { at: Date; tags: Set<string>; scores: Record<string, number>; kind: "event"; note: string | null; either: string | number[]; lookup: Map<string, boolean> }',
    )
  })

  it("should apply member attributes inside anonymous objects and tuples", () => {
    const Outer = z
      .object({
        inner: z.object({
          secret: z.string().ts({ skip: true }),
          user_id: z.string().ts({ rename: "userId" }),
          note: z.string().optional(),
        }),
        pair: z.tuple([z.string(), z.number().ts({ skip: true })]),
      })
      .ts({ name: "Outer" })

    expect(renderDeclaration(schemaToTypeDef(Outer))).toBe("Outer = { inner: { userId: string; note?: string }; pair: [string] }")
  })

  it("should declare tuples and aliases", () => {
    const Point = z.tuple([z.number(), z.number()]).ts({ name: "Point" })
    const Id = z.union([z.string(), z.number()]).ts({ name: "Id" })

    expect(renderDeclaration(schemaToTypeDef(Point))).toBe("Point = [number, number]")
    expect(renderDeclaration(schemaToTypeDef(Id))).toBe("Id = string | number")
  })

  it("should carry namespace, module and description", () => {
    const Token = z.string().describe("Session token").ts({ name: "Token", namespace: ["auth"], module: "app::auth" })

    expect(schemaToTypeDef(Token)).toEqual({
      kind: "named",
      name: "Token",
      namespace: ["auth"],
      def: t.string,
      originModule: "app::auth",
      description: "Session token",
    })
  })

  it("should resolve recursive schemas to a reference", () => {
    const Tree: z.ZodType = z
      .object({
        value: z.number(),
        children: z.array(z.lazy(() => Tree)),
      })
      .ts({ name: "Tree" })

    expect(renderDeclaration(schemaToTypeDef(Tree))).toBe("Tree = { value: number; children: Tree[] }")
  })

  it("should convert unnamed schemas structurally", () => {
    expect(render(schemaToTypeDef(z.array(z.union([z.string(), z.null()]))))).toBe("(string | null)[]")
    expect(render(schemaToTypeDef(Status.optional()))).toBe("Status | undefined")
  })

  it("should share declarations across schemas converted together", () => {
    const [a, b] = schemasToTypeDefs([z.object({ s: Status }).ts({ name: "A" }), z.object({ s: Status }).ts({ name: "B" })])
    const registry = new TypeRegistry().add(a).add(b)

    expect(registry.names()).toEqual(["A", "Status", "B"])
  })

  it("should warn and emit unknown for unsupported schemas", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})

    expect(schemaToTypeDef(z.string().transform((s) => s.length))).toEqual(t.unknown)
    expect(warn).toHaveBeenCalledWith('[typeweave] Unsupported schema type "pipe"; emitting unknown')
  })
})

describe("describeSchema()", () => {
  it("should describe objects as records", () => {
    const descriptor = describeSchema(z.object({ id: z.string(), note: z.string().optional() }).ts({ name: "Row", renameAll: "PascalCase" }))

    expect(descriptor).toMatchObject({ kind: "record", shape: "named", name: "Row", attributes: { renameAll: "PascalCase" } })
    expect(descriptor.kind === "record" && descriptor.members.map((m) => [m.name, m.attributes])).toEqual([
      ["id", {}],
      ["note", { default: true }],
    ])
  })

  it("should require a name", () => {
    expect(() => describeSchema(z.object({}))).toThrow("schema has no name")
  })
})
