/**
 * The framing requirement a coder is invoked under.
 *
 * - `NESTED`: the value is embedded in a larger encoding, so its bytes must be
 *   self-delimiting. A reader must find where the value ends even when more
 *   bytes follow.
 * - `OUTER`: the value is the whole content of the stream, so length framing
 *   may be omitted.
 */
export const Context = {
  NESTED: "nested",
  OUTER: "outer",
} as const

export type Context = (typeof Context)[keyof typeof Context]
