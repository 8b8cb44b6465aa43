import { errorMessages, toAppError } from "@coderkit/errors"
import { createNullLogger, type Logger } from "@coderkit/logger"
import type { Coder } from "./coder"
import { NondeterminismError } from "./errors"

export type CoderEntry = Readonly<{
  /** Where the coder is used, e.g. a pipeline step or key name */
  name: string
  coder: Coder<unknown>
}>

export type DeterminismFailure = Readonly<{
  name: string
  coder: string
  error: NondeterminismError
}>

export type DeterminismReport = Readonly<{
  checked: number
  failures: readonly DeterminismFailure[]
}>

export type DeterminismCheckerDeps = {
  logger?: Logger
}

/**
 * Validates that coders used for keying or grouping are deterministic,
 * before any data flows. Only calls `verifyDeterminism()`; never encodes.
 */
export class DeterminismChecker {
  private readonly logger: Logger

  constructor(deps: DeterminismCheckerDeps = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({
      operation: "verify-determinism",
    })
  }

  /**
   * Check every entry and report all failures.
   *
   * @throws AppError with code `determinism_check_failed` when a coder throws
   * anything other than `NondeterminismError`
   */
  check(entries: readonly CoderEntry[]): DeterminismReport {
    const failures: DeterminismFailure[] = []

    for (const { name, coder } of entries) {
      const description = String(coder)
      const log = this.logger.child({ step: name, coder: description })

      try {
        coder.verifyDeterminism()
        log.debug("coder is deterministic")
      } catch (err) {
        if (!(err instanceof NondeterminismError)) {
          log.error("determinism check crashed", { err })
          throw toAppError(err, {
            code: "determinism_check_failed",
            message: `verifyDeterminism of ${description} threw`,
            context: { step: name, coder: description },
          })
        }

        log.error("coder is not deterministic", { err, chain: errorMessages(err) })
        failures.push({ name, coder: description, error: err })
      }
    }

    return { checked: entries.length, failures }
  }

  /**
   * @throws NondeterminismError of the first failing entry
   */
  assertDeterministic(entries: readonly CoderEntry[]): void {
    const [first] = this.check(entries).failures

    if (first !== undefined) throw first.error
  }
}
