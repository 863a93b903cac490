import type { Milliseconds } from "@snapcfg/clock"

const units: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
}

const pattern = /^(\d+(?:\.\d+)?)(ms|s|m|h)$/

/**
 * Parses a duration such as `"250ms"`, `"30s"`, `"1m30s"` or `"2h"` into
 * milliseconds. A bare number is taken as milliseconds. Returns `undefined`
 * for anything else.
 */
export function parseDuration(input: string): Milliseconds | undefined {
  const text = input.trim()
  if (text === "") return undefined
  if (/^\d+(?:\.\d+)?$/.test(text)) return Number(text)

  let total = 0
  for (const part of text.match(/\d+(?:\.\d+)?(?:ms|s|m|h)|./g) ?? []) {
    const match = pattern.exec(part)
    const factor = match?.[2] === undefined ? undefined : units[match[2]]
    if (!match || factor === undefined) return undefined

    total += Number(match[1]) * factor
  }

  return Math.round(total)
}
