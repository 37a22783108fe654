/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and its canonical byte representation.
 *
 * @remarks
 * Implementations are pure and deterministic: equal values encode to identical
 * bytes, and `decode` accepts only bytes that `encode` could have produced.
 * Byte-oriented consumers (hashing, signing, storage adapters) treat the
 * output as opaque.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
