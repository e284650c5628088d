import { describe, it, expect } from "vitest"
import { t, field, named, render, renderDeclaration, referencedNames, collectNamed, substitute, qualifiedName } from "@/ir"

describe("render()", () => {
  describe("precedence", () => {
    it("should parenthesize a union inside an array", () => {
      expect(render(t.array(t.union([t.ref("A"), t.ref("B")])))).toBe("(A | B)[]")
    })

    it("should not parenthesize an array inside a union", () => {
      expect(render(t.union([t.ref("A"), t.array(t.ref("B"))]))).toBe("A | B[]")
    })

    it("should parenthesize intersections and functions inside arrays", () => {
      expect(render(t.array(t.intersection([t.ref("A"), t.ref("B")])))).toBe("(A & B)[]")
      expect(render(t.array(t.fn([], t.void)))).toBe("(() => void)[]")
    })

    it("should parenthesize a union inside an intersection", () => {
      expect(render(t.intersection([t.ref("A"), t.union([t.ref("B"), t.ref("C")])]))).toBe("A & (B | C)")
    })

    it("should parenthesize a function inside a union", () => {
      expect(render(t.nullable(t.fn([], t.void)))).toBe("(() => void) | null")
    })

    it("should add no parens at the top level", () => {
      expect(render(t.union([t.string, t.number, t.null]))).toBe("string | number | null")
      expect(render(t.intersection([t.ref("A"), t.ref("B")]))).toBe("A & B")
    })
  })

  describe("objects", () => {
    it("should render fields with optional and readonly markers", () => {
      const node = t.object([
        field("id", t.string),
        field("name", t.string, { optional: true }),
        field("tags", t.array(t.string), { readonly: true }),
      ])

      expect(render(node)).toBe("{ id: string; name?: string; readonly tags: string[] }")
    })

    it("should render an empty object as {}", () => {
      expect(render(t.object([]))).toBe("{}")
    })

    it("should quote keys that are not identifiers", () => {
      expect(render(t.object([field("content-type", t.string), field("$ok", t.number)]))).toBe('{ "content-type": string; $ok: number }')
    })
  })

  describe("literals", () => {
    it("should escape quotes and backslashes in strings", () => {
      expect(render(t.literal('say "hi"\\'))).toBe('"say \\"hi\\"\\\\"')
    })

    it("should escape line terminators", () => {
      expect(render(t.literal("a\rb\u2028c\u2029d\ne"))).toBe('"a\\rb\\u2028c\\u2029d\\ne"')
      expect(render(t.object([field("line\r\nbreak", t.string)]))).toBe('{ "line\\r\\nbreak": string }')
    })

    it("should render integral numbers without a fractional part", () => {
      expect(render(t.literal(42))).toBe("42")
      expect(render(t.literal(-3))).toBe("-3")
      expect(render(t.literal(1.5))).toBe("1.5")
    })

    it("should render non-finite numbers as number", () => {
      expect(render(t.literal(Number.POSITIVE_INFINITY))).toBe("number")
      expect(render(t.literal(Number.NaN))).toBe("number")
    })

    it("should render booleans", () => {
      expect(render(t.literal(true))).toBe("true")
    })
  })

  it("should render records", () => {
    expect(render(t.record(t.string, t.number))).toBe("Record<string, number>")
  })

  it("should render function signatures", () => {
    const node = t.fn([field("a", t.string), field("b", t.number, { optional: true })], t.boolean)
    expect(render(node)).toBe("(a: string, b?: number) => boolean")
  })

  it("should render generic instantiations", () => {
    expect(render(t.generic("Map", [t.string, t.ref("User")]))).toBe("Map<string, User>")
    expect(render(t.generic("Map", []))).toBe("Map")
  })

  it("should render template literals", () => {
    expect(render(t.template(["vm-", ""], [t.string]))).toBe("`vm-${string}`")
    expect(render(t.template(["v", ".", ""], [t.number, t.number]))).toBe("`v${number}.${number}`")
  })

  it("should escape backticks and placeholders in template text", () => {
    expect(render(t.template(["a`b${", ""], [t.number]))).toBe("`a\\`b\\${${number}`")
  })

  it("should render indexed access", () => {
    expect(render(t.indexed(t.ref("User"), "id"))).toBe('User["id"]')
  })

  it("should render named types by qualified name", () => {
    const point = named("Point", t.tuple([t.number, t.number]), { namespace: ["geo"] })
    expect(render(point)).toBe("geo.Point")
    expect(render(t.array(point))).toBe("geo.Point[]")
  })
})

describe("renderDeclaration()", () => {
  it("should render name and body", () => {
    const point = named("Point", t.tuple([t.number, t.number]), { namespace: ["geo"] })
    expect(renderDeclaration(point)).toBe("Point = [number, number]")
  })

  it("should render type parameters with constraints and defaults", () => {
    const page = named("Page", t.object([field("items", t.array(t.ref("T")))]), {
      typeParams: [{ name: "T", constraint: t.ref("Item"), default: t.unknown }, { name: "M" }],
    })
    expect(renderDeclaration(page)).toBe("Page<T extends Item = unknown, M> = { items: T[] }")
  })

  it("should wrap the body in the wrapper utility", () => {
    const user = named("User", t.intersection([t.ref("Base"), t.object([field("id", t.string)])]), { wrapper: "Prettify" })
    expect(renderDeclaration(user)).toBe("User = Prettify<Base & { id: string }>")
  })

  it("should throw for anything but a named type", () => {
    expect(() => renderDeclaration(t.string)).toThrow(TypeError)
  })
})

describe("builders", () => {
  it("should reject template literals with mismatched parts", () => {
    expect(() => t.template(["a"], [t.string])).toThrow(RangeError)
  })

  it("should leave unset options off named nodes", () => {
    expect(named("A", t.string)).toEqual({ kind: "named", namespace: [], name: "A", def: t.string })
  })

  it("should join namespace and name", () => {
    expect(qualifiedName(named("Point", t.string, { namespace: ["geo", "flat"] }))).toBe("geo.flat.Point")
  })
})

describe("walk", () => {
  it("should collect refs and nested named types without entering their bodies", () => {
    const node = named(
      "Order",
      t.object([field("customer", t.ref("Customer")), field("item", named("Item", t.object([field("sku", t.ref("Sku"))])))]),
    )
    expect(referencedNames(node)).toEqual(["Customer", "Item"])
  })

  it("should exclude the declaration's own type parameters", () => {
    const node = named("Box", t.object([field("value", t.ref("T")), field("meta", t.ref("Meta"))]), { typeParams: [{ name: "T" }] })
    expect(referencedNames(node)).toEqual(["Meta"])
  })

  it("should include generic bases unless told otherwise", () => {
    const node = named("Users", t.generic("Page", [t.ref("User")]))
    expect(referencedNames(node)).toEqual(["Page", "User"])
    expect(referencedNames(node, { genericBases: false })).toEqual(["User"])
  })

  it("should collect named nodes root first", () => {
    const item = named("Item", t.string)
    const order = named("Order", t.object([field("first", item), field("rest", t.array(item)), field("note", named("Note", t.string))]))

    expect(collectNamed(order).map((n) => n.name)).toEqual(["Order", "Item", "Note"])
    expect(collectNamed(order, (name) => name === "Item").map((n) => n.name)).toEqual(["Order", "Note"])
  })

  it("should leave nested named declarations alone when substituting", () => {
    const box = named("Box", t.object([field("value", t.ref("T"))]), { typeParams: [{ name: "T" }] })
    const node = t.object([field("box", box), field("item", t.ref("T"))])
    const result = substitute(node, new Map([["T", t.ref("User")]]))

    expect(render(result)).toBe("{ box: Box; item: User }")
    expect(result.kind === "object" && result.fields[0].type).toBe(box)
  })

  it("should substitute bound refs", () => {
    const node = t.object([field("items", t.array(t.ref("T"))), field("next", t.ref("Cursor"))])
    const result = substitute(node, new Map([["T", t.ref("User")]]))
    expect(render(result)).toBe("{ items: User[]; next: Cursor }")
  })
})
