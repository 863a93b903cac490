/** A duration or instant expressed in milliseconds. */
export type Milliseconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = number
