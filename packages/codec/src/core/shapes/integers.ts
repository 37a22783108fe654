import type { ByteSink, ByteSource } from "../../ports/cursor"
import type { Shape } from "../../ports/shape"
import { CodecError } from "../errors/codec-error"

type NumberCodec = {
  name: string
  width: number
  min: number
  max: number
  put(sink: ByteSink, value: number): void
  get(source: ByteSource): number
}

function numberShape(spec: NumberCodec): Shape<number> {
  return {
    kind: "primitive",
    name: spec.name,
    width: spec.width,
    write(sink, value) {
      if (typeof value !== "number" || !Number.isInteger(value)) {
        throw CodecError.invalidValue({ shape: spec.name, reason: "expected an integer", received: value })
      }
      if (value < spec.min || value > spec.max) {
        throw CodecError.invalidValue({
          shape: spec.name,
          reason: `expected ${spec.min}..${spec.max}`,
          received: value,
        })
      }

      spec.put(sink, value)
    },
    read(source) {
      return spec.get(source)
    },
  }
}

type BigIntCodec = {
  name: string
  bits: 64 | 128
  signed: boolean
}

function bigintShape(spec: BigIntCodec): Shape<bigint> {
  const min = spec.signed ? -(1n << BigInt(spec.bits - 1)) : 0n
  const max = spec.signed ? (1n << BigInt(spec.bits - 1)) - 1n : (1n << BigInt(spec.bits)) - 1n

  return {
    kind: "primitive",
    name: spec.name,
    width: spec.bits / 8,
    write(sink, value) {
      if (typeof value !== "bigint") {
        throw CodecError.invalidValue({ shape: spec.name, reason: "expected a bigint", received: value })
      }
      if (value < min || value > max) {
        throw CodecError.invalidValue({ shape: spec.name, reason: `expected ${min}..${max}`, received: value })
      }

      const bits = BigInt.asUintN(spec.bits, value)
      sink.writeU64(BigInt.asUintN(64, bits))
      if (spec.bits === 128) sink.writeU64(bits >> 64n)
    },
    read(source) {
      let bits = source.readU64()
      if (spec.bits === 128) bits |= source.readU64() << 64n

      return spec.signed ? BigInt.asIntN(spec.bits, bits) : bits
    },
  }
}

export const u8 = numberShape({
  name: "u8",
  width: 1,
  min: 0,
  max: 0xff,
  put: (sink, v) => sink.writeU8(v),
  get: (source) => source.readU8(),
})

export const u16 = numberShape({
  name: "u16",
  width: 2,
  min: 0,
  max: 0xffff,
  put: (sink, v) => sink.writeU16(v),
  get: (source) => source.readU16(),
})

export const u32 = numberShape({
  name: "u32",
  width: 4,
  min: 0,
  max: 0xffff_ffff,
  put: (sink, v) => sink.writeU32(v),
  get: (source) => source.readU32(),
})

export const i8 = numberShape({
  name: "i8",
  width: 1,
  min: -0x80,
  max: 0x7f,
  put: (sink, v) => sink.writeU8(v & 0xff),
  get: (source) => (source.readU8() << 24) >> 24,
})

export const i16 = numberShape({
  name: "i16",
  width: 2,
  min: -0x8000,
  max: 0x7fff,
  put: (sink, v) => sink.writeU16(v & 0xffff),
  get: (source) => (source.readU16() << 16) >> 16,
})

export const i32 = numberShape({
  name: "i32",
  width: 4,
  min: -0x8000_0000,
  max: 0x7fff_ffff,
  put: (sink, v) => sink.writeU32(v >>> 0),
  get: (source) => source.readU32() | 0,
})

export const u64 = bigintShape({ name: "u64", bits: 64, signed: false })
export const i64 = bigintShape({ name: "i64", bits: 64, signed: true })
export const u128 = bigintShape({ name: "u128", bits: 128, signed: false })
export const i128 = bigintShape({ name: "i128", bits: 128, signed: true })
