import type { Shape } from "../../ports/shape"
import { CodecError } from "../errors/codec-error"
import { readLength, writeLength } from "../varint/uleb128"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

/** UTF-8 text behind a ULEB128 byte length. */
export const str: Shape<string> = {
  kind: "primitive",
  name: "string",
  write(sink, value) {
    if (typeof value !== "string") {
      throw CodecError.invalidValue({ shape: "string", reason: "expected a string", received: value })
    }
    if (LONE_SURROGATE.test(value)) {
      throw CodecError.invalidValue({ shape: "string", reason: "contains a lone surrogate", received: value })
    }

    const encoded = encoder.encode(value)
    writeLength(sink, encoded.length)
    sink.writeBytes(encoded)
  },
  read(source) {
    const offset = source.offset
    const view = source.readView(readLength(source))

    try {
      return decoder.decode(view)
    } catch (err) {
      throw CodecError.invalidUtf8({ offset, cause: err })
    }
  },
}

/** Raw bytes behind a ULEB128 length. Decoding copies them out of the input. */
export const bytes: Shape<Uint8Array> = {
  kind: "primitive",
  name: "bytes",
  write(sink, value) {
    if (!(value instanceof Uint8Array)) {
      throw CodecError.invalidValue({ shape: "bytes", reason: "expected a Uint8Array", received: value })
    }

    writeLength(sink, value.length)
    sink.writeBytes(value)
  },
  read(source) {
    return source.readBytes(readLength(source))
  },
}
