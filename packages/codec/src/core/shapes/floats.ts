import type { Shape } from "../../ports/shape"
import { CodecError } from "../errors/codec-error"

/**
 * IEEE-754 binary32. Numbers that would round when narrowed are rejected, so
 * every accepted value decodes back to itself.
 *
 * Decoding widens the binary32 value to a JavaScript number. A signalling NaN
 * read from the input loses its payload bits on that conversion, so NaN bit
 * patterns survive a decode and re-encode only for f64.
 */
export const f32: Shape<number> = {
  kind: "primitive",
  name: "f32",
  width: 4,
  write(sink, value) {
    if (typeof value !== "number") {
      throw CodecError.invalidValue({ shape: "f32", reason: "expected a number", received: value })
    }
    if (!Object.is(Math.fround(value), value)) {
      throw CodecError.invalidValue({
        shape: "f32",
        reason: "not exactly representable as binary32",
        received: value,
      })
    }

    sink.writeF32(value)
  },
  read(source) {
    return source.readF32()
  },
}

export const f64: Shape<number> = {
  kind: "primitive",
  name: "f64",
  width: 8,
  write(sink, value) {
    if (typeof value !== "number") {
      throw CodecError.invalidValue({ shape: "f64", reason: "expected a number", received: value })
    }

    sink.writeF64(value)
  },
  read(source) {
    return source.readF64()
  },
}
