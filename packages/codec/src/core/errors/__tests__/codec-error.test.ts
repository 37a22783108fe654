import { BaseError, serializeError } from "@bincanon/errors"
import { CodecError, describeValue } from "../codec-error"

describe("CodecError", () => {
  it("is a BaseError with a frozen context", () => {
    const err = CodecError.invalidBoolean({ offset: 3, byte: 7 })

    expect(err).toBeInstanceOf(BaseError)
    expect(err.name).toBe("CodecError")
    expect(err.message).toBe("Non-canonical boolean byte 0x07 at offset 3")
    expect(err.context).toEqual({ offset: 3, byte: 7 })
    expect(Object.isFrozen(err.context)).toBe(true)
    expect(err.isRetryable).toBe(false)
    expect(err.isOperational).toBe(true)
  })

  it("marks value and shape errors as programmer errors", () => {
    expect(CodecError.invalidValue({ shape: "u8", reason: "expected 0..255" }).isOperational).toBe(false)
    expect(CodecError.invalidShape({ shape: "S", reason: "bad" }).isOperational).toBe(false)
  })

  it("describes the received value without storing it", () => {
    const err = CodecError.invalidValue({ shape: "u8", reason: "expected 0..255", received: 256 })

    expect(err.message).toBe("Invalid value for u8: expected 0..255 (received 256)")
    expect(err.context).toEqual({ shape: "u8", reason: "expected 0..255" })
  })

  it("keeps the decoder failure as the cause of invalid_utf8", () => {
    const cause = new TypeError("bad byte")
    const err = CodecError.invalidUtf8({ offset: 4, cause })

    expect(err.cause).toBe(cause)
    expect(err.context).toEqual({ offset: 4 })
  })

  it("mentions where a length overflowed only when known", () => {
    expect(CodecError.lengthOverflow({ length: 9, max: 8 }).message).toBe("Length 9 exceeds the maximum of 8")
    expect(CodecError.lengthOverflow({ offset: 2, max: 8 }).message).toBe("Varint at offset 2 exceeds the maximum of 8")
  })

  it("names the offset and shape of a key that would not be kept", () => {
    const err = CodecError.nonCanonicalKey({ offset: 1, shape: "set<f64>" })

    expect(err.code).toBe("non_canonical_key")
    expect(err.message).toBe("Key at offset 1 of set<f64> would not be kept as decoded")
    expect(err.isOperational).toBe(true)
  })

  it("serializes for logs", () => {
    const serialized = serializeError(CodecError.trailingData({ offset: 1, remaining: 2 }))

    expect(serialized).toMatchObject({
      name: "CodecError",
      code: "trailing_data",
      message: "2 trailing byte(s) after the value ending at offset 1",
      context: { offset: 1, remaining: 2 },
      isRetryable: false,
      isOperational: true,
    })
  })
})

describe("describeValue", () => {
  it.each<[unknown, string]>([
    [null, "null"],
    [undefined, "undefined"],
    [[1, 2], "array of 2"],
    [new Uint8Array(3), "Uint8Array of 3"],
    [5n, "5n"],
    [1.5, "1.5"],
    [true, "true"],
    ["ab", '"ab"'],
    [{}, "object"],
  ])("describes %o as %s", (value, expected) => {
    expect(describeValue(value)).toBe(expected)
  })

  it("truncates long strings", () => {
    expect(describeValue("x".repeat(40))).toBe(`"${"x".repeat(32)}…"`)
  })
})
