import type { ByteSink, ByteSource } from "../../ports/cursor"
import { MAX_U32 } from "../../ports/limits"
import { CodecError } from "../errors/codec-error"

const MAX_GROUPS = 5

/**
 * Writes `value` as ULEB128: seven payload bits per byte, least significant
 * group first, high bit set on every byte but the last.
 */
export function writeUleb128(sink: ByteSink, value: number): void {
  let rest = value

  while (rest >= 0x80) {
    sink.writeU8((rest % 0x80) | 0x80)
    rest = Math.floor(rest / 0x80)
  }

  sink.writeU8(rest)
}

/**
 * Reads a ULEB128 value no larger than 2^32 - 1. Only the minimal encoding is
 * accepted: a multi-byte varint may not end in a zero group.
 */
export function readUleb128(source: ByteSource): number {
  const start = source.offset
  let value = 0

  for (let group = 0; group < MAX_GROUPS; group++) {
    const byte = source.readU8()
    const digit = byte & 0x7f

    value += digit * 2 ** (7 * group)
    if (value > MAX_U32) throw CodecError.lengthOverflow({ offset: start, max: MAX_U32 })

    if ((byte & 0x80) === 0) {
      if (group > 0 && digit === 0) throw CodecError.nonCanonicalLength({ offset: start })
      return value
    }
  }

  throw CodecError.lengthOverflow({ offset: start, max: MAX_U32 })
}

/** Collection length prefix, bounded by `limits.maxSequenceLength`. */
export function writeLength(sink: ByteSink, length: number): void {
  const max = sink.limits.maxSequenceLength
  if (length > max) throw CodecError.lengthOverflow({ length, max })

  writeUleb128(sink, length)
}

export function readLength(source: ByteSource): number {
  const offset = source.offset
  const length = readUleb128(source)
  const max = source.limits.maxSequenceLength

  if (length > max) throw CodecError.lengthOverflow({ offset, length, max })

  return length
}
