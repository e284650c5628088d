import { ConversionError } from "@/errors"

/**
 * A template split into literal runs and the placeholder bodies between them
 */
export interface ParsedPattern {
  /** Always one longer than `types`; leading and trailing runs may be empty */
  strings: string[]
  types: string[]
}

/**
 * Split a `${...}` template into literal strings and placeholder type expressions.
 * Braces inside a placeholder nest, so `${Record<string, { a: number }>}` is one placeholder.
 *
 * @example
 * parsePattern("v${number}.${number}")
 * // { strings: ["v", ".", ""], types: ["number", "number"] }
 */
export function parsePattern(pattern: string): ParsedPattern {
  const strings: string[] = []
  const types: string[] = []
  let literal = ""
  let i = 0

  while (i < pattern.length) {
    if (pattern[i] !== "$" || pattern[i + 1] !== "{") {
      literal += pattern[i]
      i++
      continue
    }

    strings.push(literal)
    literal = ""
    i += 2

    let depth = 1
    let body = ""
    while (i < pattern.length) {
      const char = pattern[i]
      if (char === "{") depth++
      if (char === "}") depth--
      if (depth === 0) break
      body += char
      i++
    }

    if (depth !== 0) {
      throw new ConversionError("unterminated-placeholder", `unterminated placeholder in pattern "${pattern}"`)
    }
    if (body.trim() === "") {
      throw new ConversionError("empty-placeholder", `empty placeholder in pattern "${pattern}"`)
    }

    types.push(body.trim())
    // Skip the closing brace
    i++
  }

  strings.push(literal)
  return { strings, types }
}
