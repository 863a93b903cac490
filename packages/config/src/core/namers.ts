import type { Namer } from "../ports/loader"

export const namerNames = ["snake_case", "camel_case", "pascal_case", "kebab_case"] as const
export type NamerName = (typeof namerNames)[number]

/**
 * Splits a scope name into lowercase words on separators and case changes:
 * `"featureFlags"`, `"feature_flags"` and `"Feature-Flags"` all give
 * `["feature", "flags"]`.
 */
export function words(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .split(/[\s_\-.]+/)
    .filter((w) => w !== "")
    .map((w) => w.toLowerCase())
}

const capitalize = (w: string): string => w.charAt(0).toUpperCase() + w.slice(1)

const cases: Record<NamerName, (parts: string[]) => string> = {
  snake_case: (parts) => parts.join("_"),
  kebab_case: (parts) => parts.join("-"),
  camel_case: (parts) => parts.map((w, i) => (i === 0 ? w : capitalize(w))).join(""),
  pascal_case: (parts) => parts.map(capitalize).join(""),
}

export function createNamer(name: NamerName): Namer {
  const convert = cases[name]
  return (scope, ext) => `${convert(words(scope))}.${ext}`
}

export const defaultNamer: Namer = (scope, ext) => `${scope}.${ext}`
