/** Turns raw bytes into a plain value. Throws on malformed input. */
export type Decoder = (data: Uint8Array) => unknown

/** Turns a plain value into raw bytes. */
export type Encoder = (value: unknown) => Uint8Array

export type Codec = {
  /** Media type without parameters, e.g. "application/yaml". */
  mediaType: string
  /** File extension used for scope files, without the dot. */
  ext: string
  encode: Encoder
  decode: Decoder
}
