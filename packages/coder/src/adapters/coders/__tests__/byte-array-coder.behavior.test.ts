import { decodeFromBytes, encodeToBytes } from "../../../core/coder-utils"
import { EncodingError } from "../../../core/errors"
import { Context } from "../../../ports/context"
import { BufferSink } from "../../memory/buffer-sink"
import { BufferSource } from "../../memory/buffer-source"
import { ByteArrayCoder } from "../byte-array-coder"

describe("ByteArrayCoder", () => {
  const coder = ByteArrayCoder.of()

  it("prefixes the length only in the nested context", () => {
    const value = new Uint8Array([1, 2, 3])

    expect([...encodeToBytes(coder, value, Context.NESTED)]).toEqual([3, 1, 2, 3])
    expect([...encodeToBytes(coder, value, Context.OUTER)]).toEqual([1, 2, 3])
  })

  it("reads the outer form to the end of the stream", () => {
    const source = new BufferSource(new Uint8Array([4, 5, 6]))

    expect([...coder.decodeOuter(source)]).toEqual([4, 5, 6])
    expect(source.remaining()).toBe(0)
  })

  it("reads nested values back to back", () => {
    const source = new BufferSource(new Uint8Array([1, 9, 0, 2, 7, 8]))

    expect([...coder.decodeNested(source)]).toEqual([9])
    expect([...coder.decodeNested(source)]).toEqual([])
    expect([...coder.decodeNested(source)]).toEqual([7, 8])
  })

  it("rejects lengths above maxLength", () => {
    const small = ByteArrayCoder.of({ maxLength: 2 })

    expect(() => decodeFromBytes(small, new Uint8Array([3, 1, 2, 3]), Context.NESTED)).toThrow(
      expect.objectContaining({ code: "length_out_of_range", context: { length: 3, maxLength: 2 } }),
    )
  })

  it("refuses to write a nested length it would not read back", () => {
    const small = ByteArrayCoder.of({ maxLength: 2 })

    expect(() => encodeToBytes(small, new Uint8Array([1, 2, 3]), Context.NESTED)).toThrow(
      expect.objectContaining({
        code: "unsupported_value",
        context: { coder: "ByteArrayCoder", length: 3, maxLength: 2 },
      }),
    )
    expect([...encodeToBytes(small, new Uint8Array([1, 2, 3]), Context.OUTER)]).toEqual([1, 2, 3])
  })

  it("rejects negative lengths", () => {
    expect(() =>
      coder.decodeNested(new BufferSource(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x0f]))),
    ).toThrow(expect.objectContaining({ code: "length_out_of_range" }))
  })

  it("rejects values that are not byte arrays", () => {
    expect(() => Reflect.apply(coder.encode, coder, ["abc", new BufferSink()])).toThrow(
      EncodingError,
    )
    expect(() => Reflect.apply(coder.encodeOuter, coder, [[1, 2], new BufferSink()])).toThrow(
      expect.objectContaining({ code: "unsupported_value", context: { coder: "ByteArrayCoder", type: "object" } }),
    )
  })

  it("uses the hex of the outer encoding as structural value", () => {
    expect(coder.consistentWithEquals()).toBe(false)
    expect(coder.structuralValue(new Uint8Array([1, 255]))).toBe("01ff")
  })

  it("is deterministic", () => {
    expect(() => coder.verifyDeterminism()).not.toThrow()
  })
})
