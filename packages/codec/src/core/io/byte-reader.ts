import type { ByteSource } from "../../ports/cursor"
import type { CodecLimits } from "../../ports/limits"
import { CodecError } from "../errors/codec-error"

export class ByteReader implements ByteSource {
  private readonly view: DataView
  private pos: number

  constructor(
    private readonly bytes: Uint8Array,
    readonly limits: CodecLimits,
    offset = 0,
  ) {
    if (!Number.isInteger(offset) || offset < 0 || offset > bytes.length) {
      throw CodecError.unexpectedEndOfInput({ offset, needed: 0, remaining: 0 })
    }

    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    this.pos = offset
  }

  get offset(): number {
    return this.pos
  }

  get remaining(): number {
    return this.bytes.length - this.pos
  }

  readU8(): number {
    return this.view.getUint8(this.take(1))
  }

  readU16(): number {
    return this.view.getUint16(this.take(2), true)
  }

  readU32(): number {
    return this.view.getUint32(this.take(4), true)
  }

  readU64(): bigint {
    return this.view.getBigUint64(this.take(8), true)
  }

  readF32(): number {
    return this.view.getFloat32(this.take(4), true)
  }

  readF64(): number {
    return this.view.getFloat64(this.take(8), true)
  }

  readBytes(length: number): Uint8Array {
    return this.readView(length).slice()
  }

  readView(length: number): Uint8Array {
    const start = this.take(length)
    return this.bytes.subarray(start, start + length)
  }

  span(start: number, end: number): Uint8Array {
    return this.bytes.subarray(start, Math.min(end, this.pos))
  }

  /** Throws `trailing_data` unless the whole input was consumed. */
  finish(): void {
    if (this.remaining > 0) {
      throw CodecError.trailingData({ offset: this.pos, remaining: this.remaining })
    }
  }

  private take(n: number): number {
    const start = this.pos
    if (n > this.remaining) {
      throw CodecError.unexpectedEndOfInput({ offset: start, needed: n, remaining: this.remaining })
    }

    this.pos += n
    return start
  }
}
