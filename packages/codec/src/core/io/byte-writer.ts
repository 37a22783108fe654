import type { ByteSink } from "../../ports/cursor"
import type { CodecLimits } from "../../ports/limits"
import { CodecError } from "../errors/codec-error"

export type ByteWriterOptions = {
  /** Overrides `limits.maxEncodedBytes` */
  maxBytes?: number
  initialCapacity?: number
}

export class ByteWriter implements ByteSink {
  private buf: Uint8Array
  private view: DataView
  private pos = 0
  private readonly maxBytes: number

  constructor(
    readonly limits: CodecLimits,
    options: ByteWriterOptions = {},
  ) {
    this.maxBytes = options.maxBytes ?? limits.maxEncodedBytes
    this.buf = new Uint8Array(Math.max(1, Math.min(options.initialCapacity ?? 64, this.maxBytes)))
    this.view = new DataView(this.buf.buffer)
  }

  get length(): number {
    return this.pos
  }

  writeU8(value: number): void {
    this.reserve(1)
    this.view.setUint8(this.pos, value)
    this.pos += 1
  }

  writeU16(value: number): void {
    this.reserve(2)
    this.view.setUint16(this.pos, value, true)
    this.pos += 2
  }

  writeU32(value: number): void {
    this.reserve(4)
    this.view.setUint32(this.pos, value, true)
    this.pos += 4
  }

  writeU64(value: bigint): void {
    this.reserve(8)
    this.view.setBigUint64(this.pos, value, true)
    this.pos += 8
  }

  writeF32(value: number): void {
    this.reserve(4)
    this.view.setFloat32(this.pos, value, true)
    this.pos += 4
  }

  writeF64(value: number): void {
    this.reserve(8)
    this.view.setFloat64(this.pos, value, true)
    this.pos += 8
  }

  writeBytes(bytes: Uint8Array): void {
    this.reserve(bytes.length)
    this.buf.set(bytes, this.pos)
    this.pos += bytes.length
  }

  fork(): ByteWriter {
    return new ByteWriter(this.limits, { maxBytes: this.maxBytes - this.pos })
  }

  toBytes(): Uint8Array {
    return this.buf.slice(0, this.pos)
  }

  private reserve(n: number): void {
    const needed = this.pos + n
    if (needed > this.maxBytes) {
      throw CodecError.sinkExhausted({ maxBytes: this.maxBytes, requested: needed })
    }
    if (needed <= this.buf.length) return

    let capacity = this.buf.length
    while (capacity < needed) capacity *= 2

    const next = new Uint8Array(Math.min(capacity, this.maxBytes))
    next.set(this.buf.subarray(0, this.pos))
    this.buf = next
    this.view = new DataView(next.buffer)
  }
}
