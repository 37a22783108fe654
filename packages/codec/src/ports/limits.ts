export const MAX_U32 = 0xffff_ffff

/**
 * Resource bounds applied while encoding and decoding.
 */
export type CodecLimits = {
  /**
   * Maximum nesting level. Every product, sum, sequence, fixed array, option,
   * map and set counts one level; the root value is level 1.
   */
  maxDepth: number

  /** Maximum element count of any length-prefixed collection, string or blob. */
  maxSequenceLength: number

  /** Upper bound on the size of an encoding. Unbounded by default. */
  maxEncodedBytes: number
}

export const DEFAULT_CODEC_LIMITS: Readonly<CodecLimits> = Object.freeze({
  maxDepth: 500,
  maxSequenceLength: 2 ** 31 - 1,
  maxEncodedBytes: Number.POSITIVE_INFINITY,
})
