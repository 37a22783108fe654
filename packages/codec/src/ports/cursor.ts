import type { CodecLimits } from "./limits"

/**
 * Position-tracked sink that encoding writes into. Multi-byte numbers are
 * written little-endian.
 */
export interface ByteSink {
  readonly limits: CodecLimits

  /** Bytes written so far */
  readonly length: number

  writeU8(value: number): void
  writeU16(value: number): void
  writeU32(value: number): void
  writeU64(value: bigint): void
  writeF32(value: number): void
  writeF64(value: number): void
  writeBytes(bytes: Uint8Array): void

  /**
   * An empty sink with the same limits whose capacity is what this sink has
   * left. Used to encode map keys before they are ordered.
   */
  fork(): ByteSink

  /** A copy of the bytes written so far. */
  toBytes(): Uint8Array
}

/**
 * Bounds-checked, position-tracked source that decoding reads from. Every read
 * advances `offset` or throws; there is no rewind.
 */
export interface ByteSource {
  readonly limits: CodecLimits
  readonly offset: number
  readonly remaining: number

  readU8(): number
  readU16(): number
  readU32(): number
  readU64(): bigint
  readF32(): number
  readF64(): number

  /** The next `length` bytes, copied out of the input. */
  readBytes(length: number): Uint8Array

  /** The next `length` bytes as a view over the input. */
  readView(length: number): Uint8Array

  /** A view over already consumed input, `start` inclusive, `end` exclusive. */
  span(start: number, end: number): Uint8Array
}
