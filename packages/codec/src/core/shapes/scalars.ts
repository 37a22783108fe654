import type { Shape } from "../../ports/shape"
import { CodecError } from "../errors/codec-error"

export const bool: Shape<boolean> = {
  kind: "primitive",
  name: "bool",
  width: 1,
  write(sink, value) {
    if (typeof value !== "boolean") {
      throw CodecError.invalidValue({ shape: "bool", reason: "expected a boolean", received: value })
    }

    sink.writeU8(value ? 1 : 0)
  },
  read(source) {
    const offset = source.offset
    const byte = source.readU8()

    if (byte === 0) return false
    if (byte === 1) return true
    throw CodecError.invalidBoolean({ offset, byte })
  },
}

function isScalarValue(codePoint: number): boolean {
  return codePoint <= 0x10ffff && (codePoint < 0xd800 || codePoint > 0xdfff)
}

/**
 * A single Unicode scalar value, held as a one-character string and written as
 * its code point in four bytes.
 */
export const char: Shape<string> = {
  kind: "primitive",
  name: "char",
  width: 4,
  write(sink, value) {
    const codePoint = typeof value === "string" ? value.codePointAt(0) : undefined
    const width = codePoint !== undefined && codePoint > 0xffff ? 2 : 1

    if (codePoint === undefined || value.length !== width || !isScalarValue(codePoint)) {
      throw CodecError.invalidValue({
        shape: "char",
        reason: "expected exactly one Unicode scalar value",
        received: value,
      })
    }

    sink.writeU32(codePoint)
  },
  read(source) {
    const offset = source.offset
    const codePoint = source.readU32()

    if (!isScalarValue(codePoint)) throw CodecError.invalidChar({ offset, codePoint })
    return String.fromCodePoint(codePoint)
  },
}

/** The zero-sized type: no bytes, value `null`. */
export const unit: Shape<null> = {
  kind: "primitive",
  name: "unit",
  width: 0,
  nullable: true,
  write(_sink, value) {
    if (value !== null) {
      throw CodecError.invalidValue({ shape: "unit", reason: "expected null", received: value })
    }
  },
  read() {
    return null
  },
}
