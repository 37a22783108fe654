import type { ByteSource } from "../../ports/cursor"
import { MAX_U32 } from "../../ports/limits"
import type { Shape } from "../../ports/shape"
import { descend } from "../depth"
import { CodecError } from "../errors/codec-error"
import { readLength, writeLength } from "../varint/uleb128"

/** Fails before allocating when `count` elements cannot fit in what is left of the input. */
function ensureRoom(source: ByteSource, element: Shape<unknown>, count: number): void {
  const width = element.width ?? 1
  if (width === 0) return

  const needed = count * width
  if (needed > source.remaining) {
    throw CodecError.unexpectedEndOfInput({ offset: source.offset, needed, remaining: source.remaining })
  }
}

/**
 * A variable-length sequence: ULEB128 element count, then each element.
 *
 * Elements must take at least one byte: `seq(unit)` and `seq(struct({}))`
 * are refused on first use.
 */
export function seq<T>(element: Shape<T>, name = `seq<${element.name}>`): Shape<T[]> {
  let checked = false
  const checkElement = (): void => {
    if (checked) return
    if (element.width === 0) {
      throw CodecError.invalidShape({ shape: name, reason: `"${element.name}" encodes to zero bytes` })
    }
    checked = true
  }

  return {
    kind: "container",
    name,
    write(sink, value, depth) {
      checkElement()
      if (!Array.isArray(value)) {
        throw CodecError.invalidValue({ shape: name, reason: "expected an array", received: value })
      }

      const inner = descend(depth, sink.limits)
      writeLength(sink, value.length)
      for (const item of value) element.write(sink, item, inner)
    },
    read(source, depth) {
      checkElement()
      const inner = descend(depth, source.limits, source.offset)
      const length = readLength(source)
      ensureRoom(source, element, length)

      const out: T[] = []
      for (let i = 0; i < length; i++) out.push(element.read(source, inner))
      return out
    },
  }
}

/** Exactly `length` elements with no length prefix. */
export function array<T>(element: Shape<T>, length: number, name = `array<${element.name};${length}>`): Shape<T[]> {
  if (!Number.isInteger(length) || length < 0 || length > MAX_U32) {
    throw CodecError.invalidShape({ shape: name, reason: `length must be an integer in 0..${MAX_U32}` })
  }

  return {
    kind: "container",
    name,
    get width() {
      if (length === 0) return 0
      return element.width === undefined ? undefined : element.width * length
    },
    write(sink, value, depth) {
      if (!Array.isArray(value) || value.length !== length) {
        throw CodecError.invalidValue({ shape: name, reason: `expected an array of ${length}`, received: value })
      }

      const inner = descend(depth, sink.limits)
      for (const item of value) element.write(sink, item, inner)
    },
    read(source, depth) {
      const inner = descend(depth, source.limits, source.offset)
      ensureRoom(source, element, length)

      const out: T[] = []
      for (let i = 0; i < length; i++) out.push(element.read(source, inner))
      return out
    },
  }
}
