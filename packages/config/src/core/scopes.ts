export const WILDCARD = "*"

/**
 * Normalized, immutable set of scope names.
 *
 * Either exactly `["*"]`, or sorted ascending with no duplicates and no empty
 * names. Build one with {@link Scopes.normalize}.
 */
export class Scopes {
  static readonly wildcard = new Scopes([WILDCARD])
  static readonly empty = new Scopes([])

  private constructor(private readonly items: readonly string[]) {
    Object.freeze(items)
  }

  static normalize(list: Iterable<string>): Scopes {
    const input = [...list]

    for (let i = input.length - 1; i >= 0; i--) {
      if (input[i] === WILDCARD) return Scopes.wildcard
    }

    const unique = [...new Set(input.filter((s) => s !== ""))].sort()
    if (unique.length === 0) return Scopes.empty

    return new Scopes(unique)
  }

  get values(): readonly string[] {
    return this.items
  }

  get length(): number {
    return this.items.length
  }

  get isEmpty(): boolean {
    return this.items.length === 0
  }

  get isWildcard(): boolean {
    return this.items.length === 1 && this.items[0] === WILDCARD
  }

  has(scope: string): boolean {
    if (this.isWildcard) return true

    let lo = 0
    let hi = this.items.length - 1
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1
      const item = this.items[mid]
      if (item === undefined) return false
      if (item === scope) return true
      if (item < scope) lo = mid + 1
      else hi = mid - 1
    }

    return false
  }

  [Symbol.iterator](): Iterator<string> {
    return this.items[Symbol.iterator]()
  }

  toString(): string {
    return this.items.join(",")
  }
}
