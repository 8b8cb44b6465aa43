export type LengthPrefixedCoderOptions = {
  /**
   * Largest length or element count accepted when decoding.
   * Defaults to 64 MiB.
   */
  maxLength?: number
}
