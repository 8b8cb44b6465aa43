import { BaseError, serializeError } from "@coderkit/errors"
import { VarIntCoder } from "../../adapters/coders/var-int-coder"
import { DecodingError, EncodingError, IOFailure, NondeterminismError } from "../errors"

describe("coder errors", () => {
  it("default their codes", () => {
    expect(new EncodingError("x").code).toBe("encoding_failed")
    expect(new DecodingError("x").code).toBe("decoding_failed")
    expect(new IOFailure("x").code).toBe("io_failure")
  })

  it("accept a specific code, context and cause", () => {
    const cause = new Error("disk full")
    const err = new IOFailure("write failed", {
      code: "sink_closed",
      context: { written: 3 },
      cause,
    })

    expect(err).toBeInstanceOf(BaseError)
    expect(err.name).toBe("IOFailure")
    expect(err.code).toBe("sink_closed")
    expect(err.context).toEqual({ written: 3 })
    expect(err.cause).toBe(cause)
  })

  describe("NondeterminismError", () => {
    it("describes a coder instance", () => {
      const err = new NondeterminismError(VarIntCoder.of(), "uses a random salt")

      expect(err.message).toBe("VarIntCoder is not deterministic: uses a random salt")
      expect(err.coder).toBe("VarIntCoder")
      expect(err.reasons).toEqual(["uses a random salt"])
    })

    it("joins several reasons", () => {
      const err = new NondeterminismError("MapCoder", ["key order", "value coder"])

      expect(err.message).toBe("MapCoder is not deterministic: key order; value coder")
    })

    it("serializes with coder and reasons in context", () => {
      const err = new NondeterminismError("MapCoder", "key order")

      expect(serializeError(err)).toMatchObject({
        name: "NondeterminismError",
        code: "nondeterministic_coder",
        context: { coder: "MapCoder", reasons: ["key order"] },
      })
    })
  })
})
