import type { Shape } from "../../../ports/shape"
import { catchCodecError } from "../../../tests/utils/catch-codec-error"
import { Figure } from "../../../tests/utils/shapes"
import { deserialize, serialize } from "../../serialize"
import { u8 } from "../integers"
import { enumeration, variant } from "../sum"

describe("enumeration", () => {
  it.each<[Figure, number[]]>([
    [{ kind: "Circle", value: 1.5 }, [0x00, 0, 0, 0, 0, 0, 0, 0xf8, 0x3f]],
    [{ kind: "Rect", value: { w: 3, h: 4 } }, [0x01, 3, 0, 4, 0]],
    [{ kind: "Empty", value: null }, [0x02]],
    [{ kind: "Label", value: "hi" }, [0xac, 0x02, 2, 0x68, 0x69]],
  ])("encodes %o as its tag then its payload", (value, bytes) => {
    const encoded = serialize(Figure, value)

    expect(encoded).toEqual(new Uint8Array(bytes))
    expect(deserialize(Figure, encoded)).toEqual(value)
  })

  it("rejects an unknown tag on decode", () => {
    const err = catchCodecError(() => deserialize(Figure, new Uint8Array([0x05])))

    expect(err.code).toBe("unknown_variant_tag")
    expect(err.context).toEqual({ offset: 0, tag: 5, shape: "Figure" })
  })

  it("rejects a non-minimal tag", () => {
    expect(catchCodecError(() => deserialize(Figure, new Uint8Array([0x80, 0x00]))).code).toBe(
      "non_canonical_length",
    )
  })

  it.each(["Nope", "toString"])("rejects the unknown kind %s on encode", (kind) => {
    const loose: Shape<unknown> = Figure
    const err = catchCodecError(() => serialize(loose, { kind, value: null }))

    expect(err.code).toBe("invalid_value")
    expect(err.context).toEqual({ shape: "Figure", reason: "unknown variant kind" })
  })

  it("validates the payload against the active variant", () => {
    const loose: Shape<unknown> = Figure

    expect(catchCodecError(() => serialize(loose, { kind: "Empty", value: 1 })).context).toEqual({
      shape: "unit",
      reason: "expected null",
    })
  })

  it("names itself after its variants", () => {
    const Bit = enumeration({ Off: variant(0), On: variant(1, u8) })

    expect(Bit.name).toBe("enum{Off|On}")
    expect(Bit.kind).toBe("sum")
  })

  it("refuses duplicate tags", () => {
    const err = catchCodecError(() => enumeration({ A: variant(1), B: variant(1) }, "AB"))

    expect(err.code).toBe("invalid_shape")
    expect(err.context).toEqual({ shape: "AB", reason: '"B" reuses tag 1 of "A"' })
  })

  it.each([-1, 1.5, 2 ** 32])("refuses the tag %d", (tag) => {
    expect(catchCodecError(() => enumeration({ A: variant(tag) })).code).toBe("invalid_shape")
  })

  it("counts one level for the sum itself", () => {
    const Nested = enumeration({ Wrapped: variant(0, enumeration({ Leaf: variant(0) })) })
    const value = { kind: "Wrapped", value: { kind: "Leaf", value: null } } as const

    expect(serialize(Nested, value, { limits: { maxDepth: 2 } })).toEqual(new Uint8Array([0, 0]))
    expect(catchCodecError(() => serialize(Nested, value, { limits: { maxDepth: 1 } })).code).toBe(
      "recursion_limit_exceeded",
    )
  })
})
