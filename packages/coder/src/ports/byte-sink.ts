/**
 * Destination for encoded bytes.
 *
 * A sink is owned by a single encode call for the duration of that call.
 * Implementations signal failures (closed stream, rejected write) with
 * `IOFailure`; coders never catch them.
 */
export interface ByteSink {
  write(bytes: Uint8Array): void

  /** Write the low 8 bits of `byte`. */
  writeByte(byte: number): void
}
