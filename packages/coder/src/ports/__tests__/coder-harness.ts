import type { Coder } from "../../core/coder"

export type CoderHarness<T> = {
  name: string
  make: () => Coder<T>
  /** Values the coder accepts, each distinct */
  values: () => T[]
}
