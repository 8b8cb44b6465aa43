import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"
import { serializeCoderError } from "../serialize-error"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { coder: "StringUtf8Coder" },
    )

    logger.info("hello", { context: "outer" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload).toMatchObject({
      msg: "hello",
      coder: "StringUtf8Coder",
      context: "outer",
    })
    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(30)
  })

  it("child() inherits the sink and level of its parent", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { operation: "validate" })
    const child = base.child({ coder: "ListCoder(VarIntCoder)" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      msg: "logged",
      operation: "validate",
      coder: "ListCoder(VarIntCoder)",
    })
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })

    logger.error("failed", { err: new Error("outer", { cause: new Error("root") }) })

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "outer",
      cause: { type: "Error", message: "root" },
    })
  })
})

describe("serializeCoderError", () => {
  it("keeps coder failure fields and drops bookkeeping", () => {
    const failure = Object.assign(new Error("ListCoder(PointCoder) is not deterministic: slow"), {
      code: "nondeterministic_coder",
      coder: "ListCoder(PointCoder)",
      reasons: ["slow"],
      context: { coder: "ListCoder(PointCoder)", reasons: ["slow"] },
      timestamp: "2024-01-15T10:30:00.000Z",
      isRetryable: false,
      isOperational: true,
    })

    const serialized = serializeCoderError(failure)

    expect(serialized).toEqual({
      type: "Error",
      message: "ListCoder(PointCoder) is not deterministic: slow",
      code: "nondeterministic_coder",
      coder: "ListCoder(PointCoder)",
      reasons: ["slow"],
      context: { coder: "ListCoder(PointCoder)", reasons: ["slow"] },
      stack: expect.any(String),
    })
  })

  it("applies the same projection to every cause", () => {
    const root = Object.assign(new Error("root"), { code: "end_of_stream", timestamp: "t" })

    expect(serializeCoderError(new Error("outer", { cause: root }))).toEqual({
      type: "Error",
      message: "outer",
      stack: expect.any(String),
      cause: { type: "Error", message: "root", code: "end_of_stream", stack: expect.any(String) },
    })
  })

  it("passes non-errors through", () => {
    expect(serializeCoderError("plain")).toBe("plain")
  })
})
