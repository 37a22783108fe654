export { loadCodecLimits, type LoadCodecLimitsOptions, codecLimitsSchema } from "./config/load-codec-limits"
export { CanonicalCodec, type CanonicalCodecDeps, createCodec } from "./core/canonical-codec"
export { CodecError, type CodecErrorCode } from "./core/errors/codec-error"
export { ByteReader } from "./core/io/byte-reader"
export { ByteWriter, type ByteWriterOptions } from "./core/io/byte-writer"
export { compareBytes } from "./core/io/compare-bytes"
export { decodePrefix, deserialize, resolveLimits, serialize } from "./core/serialize"
export { f32, f64 } from "./core/shapes/floats"
export { i8, i16, i32, i64, i128, u8, u16, u32, u64, u128 } from "./core/shapes/integers"
export { lazy } from "./core/shapes/lazy"
export { option } from "./core/shapes/option"
export { map, set } from "./core/shapes/ordered"
export { type Fields, struct, type StructValue, tuple, type TupleValue } from "./core/shapes/product"
export { bool, char, unit } from "./core/shapes/scalars"
export { array, seq } from "./core/shapes/sequence"
export { type EnumValue, enumeration, type Variant, type Variants, variant } from "./core/shapes/sum"
export { bytes, str } from "./core/shapes/text"
export { uleb128 } from "./core/shapes/varint"
export { readUleb128, writeUleb128 } from "./core/varint/uleb128"
export type { Codec } from "./ports/codec"
export type { CanonicalCodecOptions, CodecOptions, DecodeResult } from "./ports/codec-options"
export type { ByteSink, ByteSource } from "./ports/cursor"
export { type CodecLimits, DEFAULT_CODEC_LIMITS, MAX_U32 } from "./ports/limits"
export type { Infer, Shape, ShapeKind } from "./ports/shape"
