import { z } from "zod"
import type { Decoder } from "../../../ports/codec"
import type { Hub } from "../../../ports/hub"

const appConfigSchema = z.object({
  limits: z.object({ maxItems: z.number().int() }).optional(),
  flags: z.record(z.string(), z.boolean()).optional(),
})

export type AppConfig = z.infer<typeof appConfigSchema>

/** Sample hub: validates the decoded document and counts parse calls. */
export class AppHub implements Hub {
  data: AppConfig = {}

  constructor(private readonly onParse?: () => void) {}

  parse(data: Uint8Array, decode: Decoder): void {
    this.onParse?.()
    this.data = appConfigSchema.parse(decode(data))
  }
}
