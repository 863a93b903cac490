import type { Decoder } from "./codec"

/**
 * Application-defined configuration object.
 *
 * The snapshot store creates a fresh hub for every load and only publishes it
 * once `parse` returns, so a hub may fill itself in place: a throwing `parse`
 * leaves the previous snapshot in service.
 *
 * @example
 * ```ts
 * class AppHub implements Hub {
 *   limits = { maxItems: 0 }
 *
 *   parse(data: Uint8Array, decode: Decoder): void {
 *     this.limits = limitsSchema.parse(decode(data))
 *   }
 * }
 * ```
 */
export interface Hub {
  parse(data: Uint8Array, decode: Decoder): void
}
