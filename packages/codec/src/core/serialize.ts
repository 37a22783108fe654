import type { CodecOptions, DecodeResult } from "../ports/codec-options"
import { type CodecLimits, DEFAULT_CODEC_LIMITS } from "../ports/limits"
import type { Shape } from "../ports/shape"
import { ByteReader } from "./io/byte-reader"
import { ByteWriter } from "./io/byte-writer"

/** Applies per-field overrides over `DEFAULT_CODEC_LIMITS`. */
export function resolveLimits(overrides: Partial<CodecLimits> = {}): CodecLimits {
  return {
    maxDepth: overrides.maxDepth ?? DEFAULT_CODEC_LIMITS.maxDepth,
    maxSequenceLength: overrides.maxSequenceLength ?? DEFAULT_CODEC_LIMITS.maxSequenceLength,
    maxEncodedBytes: overrides.maxEncodedBytes ?? DEFAULT_CODEC_LIMITS.maxEncodedBytes,
  }
}

/**
 * Encodes `value` to its canonical bytes. Equal values always produce
 * identical output.
 *
 * @throws {CodecError} `invalid_value` when the value does not match the
 * shape, `recursion_limit_exceeded` or `length_overflow` past the limits, and
 * `sink_exhausted` past `maxEncodedBytes`
 */
export function serialize<T>(shape: Shape<T>, value: T, options: CodecOptions = {}): Uint8Array {
  const writer = new ByteWriter(resolveLimits(options.limits))
  shape.write(writer, value, 0)

  return writer.toBytes()
}

/**
 * Decodes exactly one value spanning all of `bytes`.
 *
 * @throws {CodecError} on malformed or non-canonical input, and
 * `trailing_data` when bytes are left over
 */
export function deserialize<T>(shape: Shape<T>, bytes: Uint8Array, options: CodecOptions = {}): T {
  const reader = new ByteReader(bytes, resolveLimits(options.limits))
  const value = shape.read(reader, 0)
  reader.finish()

  return value
}

/**
 * Decodes one value starting at `offset` and reports where it ended. Bytes
 * after the value are left alone, so concatenated encodings can be read one
 * after another.
 */
export function decodePrefix<T>(
  shape: Shape<T>,
  bytes: Uint8Array,
  offset = 0,
  options: CodecOptions = {},
): DecodeResult<T> {
  const reader = new ByteReader(bytes, resolveLimits(options.limits), offset)
  const value = shape.read(reader, 0)

  return { value, offset: reader.offset }
}
