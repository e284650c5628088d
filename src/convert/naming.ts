import * as z from "zod"
import { ConversionError } from "@/errors"

export const RENAME_POLICIES = ["camelCase", "PascalCase", "snake_case", "SCREAMING_SNAKE_CASE", "kebab-case", "SCREAMING-KEBAB-CASE"] as const

export type RenamePolicy = (typeof RENAME_POLICIES)[number]

export const RenamePolicySchema = z.enum(RENAME_POLICIES)

/**
 * Words of an identifier: runs split at underscores, dashes, lower-to-upper transitions
 * and the end of an acronym (`HTTPServer` -> `HTTP`, `Server`)
 */
const WORD = /[A-Z]+(?![a-z])|[A-Z]?[a-z0-9]+/g

/**
 * Resolve a rename-all token, failing on anything outside the supported set
 */
export function parseRenamePolicy(token: string): RenamePolicy {
  const result = RenamePolicySchema.safeParse(token)
  if (!result.success) {
    throw new ConversionError("unknown-rename-policy", `unknown rename-all policy "${token}", expected one of ${RENAME_POLICIES.join(", ")}`)
  }
  return result.data
}

/**
 * Normalize any identifier to snake_case. Every policy formats from this form.
 */
export function toSnakeCase(name: string): string {
  return (name.match(WORD) ?? []).map((w) => w.toLowerCase()).join("_")
}

const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1)

/**
 * Apply a case policy to an identifier
 */
export function applyRenamePolicy(name: string, policy: RenamePolicy): string {
  const words = toSnakeCase(name).split("_").filter(Boolean)
  switch (policy) {
    case "camelCase":
      return words.map((w, i) => (i === 0 ? w : capitalize(w))).join("")
    case "PascalCase":
      return words.map(capitalize).join("")
    case "snake_case":
      return words.join("_")
    case "SCREAMING_SNAKE_CASE":
      return words.join("_").toUpperCase()
    case "kebab-case":
      return words.join("-")
    case "SCREAMING-KEBAB-CASE":
      return words.join("-").toUpperCase()
  }
}

/**
 * Explicit rename wins, then the container policy, then the name as written
 */
export function effectiveName(original: string, rename?: string, policy?: RenamePolicy): string {
  if (rename !== undefined) return rename
  if (policy !== undefined) return applyRenamePolicy(original, policy)
  return original
}
