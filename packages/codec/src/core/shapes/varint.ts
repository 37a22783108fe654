import { MAX_U32 } from "../../ports/limits"
import type { Shape } from "../../ports/shape"
import { CodecError } from "../errors/codec-error"
import { readUleb128, writeUleb128 } from "../varint/uleb128"

/** An unsigned 32-bit integer in minimal ULEB128 form. */
export const uleb128: Shape<number> = {
  kind: "primitive",
  name: "uleb128",
  write(sink, value) {
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > MAX_U32) {
      throw CodecError.invalidValue({
        shape: "uleb128",
        reason: `expected an integer in 0..${MAX_U32}`,
        received: value,
      })
    }

    writeUleb128(sink, value)
  },
  read(source) {
    return readUleb128(source)
  },
}
