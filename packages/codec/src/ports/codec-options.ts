import type { Logger } from "@bincanon/logger"
import type { CodecLimits } from "./limits"

export type CodecOptions = {
  /** Overrides merged over `DEFAULT_CODEC_LIMITS` */
  limits?: Partial<CodecLimits>
}

export type CanonicalCodecOptions = CodecOptions & {
  logger?: Logger
}

export type DecodeResult<T> = {
  readonly value: T

  /** Offset just past the decoded value */
  readonly offset: number
}
