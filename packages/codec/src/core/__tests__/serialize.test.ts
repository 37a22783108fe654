import { DEFAULT_CODEC_LIMITS } from "../../ports/limits"
import { catchCodecError } from "../../tests/utils/catch-codec-error"
import { decodePrefix, deserialize, resolveLimits, serialize } from "../serialize"
import { u8, u32 } from "../shapes/integers"
import { option } from "../shapes/option"

describe("resolveLimits", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveLimits()).toEqual(DEFAULT_CODEC_LIMITS)
  })

  it("overrides field by field", () => {
    expect(resolveLimits({ maxDepth: 8 })).toEqual({
      maxDepth: 8,
      maxSequenceLength: 2 ** 31 - 1,
      maxEncodedBytes: Number.POSITIVE_INFINITY,
    })
  })
})

describe("deserialize", () => {
  it("requires the whole input to be consumed", () => {
    const err = catchCodecError(() => deserialize(u8, new Uint8Array([1, 2])))

    expect(err.code).toBe("trailing_data")
    expect(err.context).toEqual({ offset: 1, remaining: 1 })
  })

  it("fails on empty input", () => {
    expect(catchCodecError(() => deserialize(u8, new Uint8Array([]))).code).toBe("unexpected_end_of_input")
  })
})

describe("decodePrefix", () => {
  const MaybeByte = option(u8)
  const concatenated = new Uint8Array([1, 7, 0, 0xff])

  it("decodes one value and reports where it ended", () => {
    expect(decodePrefix(MaybeByte, concatenated)).toEqual({ value: 7, offset: 2 })
    expect(decodePrefix(MaybeByte, concatenated, 2)).toEqual({ value: null, offset: 3 })
  })

  it("still validates the value it reads", () => {
    expect(catchCodecError(() => decodePrefix(MaybeByte, concatenated, 3)).code).toBe("invalid_option_tag")
  })

  it("rejects an offset past the end", () => {
    expect(catchCodecError(() => decodePrefix(MaybeByte, concatenated, 5)).code).toBe("unexpected_end_of_input")
  })
})

describe("serialize", () => {
  it("stops at maxEncodedBytes", () => {
    const err = catchCodecError(() => serialize(u32, 1, { limits: { maxEncodedBytes: 2 } }))

    expect(err.code).toBe("sink_exhausted")
    expect(err.context).toEqual({ maxBytes: 2, requested: 4 })
  })

  it("produces identical bytes for equal values", () => {
    expect(serialize(u32, 42)).toEqual(serialize(u32, 42))
  })
})
