import { createNullLogger, type Logger } from "@bincanon/logger"
import type { Codec } from "../ports/codec"
import type { CanonicalCodecOptions } from "../ports/codec-options"
import type { CodecLimits } from "../ports/limits"
import type { Shape } from "../ports/shape"
import { CodecError } from "./errors/codec-error"
import { deserialize, resolveLimits, serialize } from "./serialize"

export type CanonicalCodecDeps<T> = CanonicalCodecOptions & {
  shape: Shape<T>
}

/**
 * A `Codec` bound to one shape and one set of limits. Successful calls are
 * logged at trace level, failures at debug level before they are rethrown.
 *
 * @example
 * const codec = createCodec(struct({ x: u8, y: u64 }), { logger })
 * const bytes = codec.encode({ x: 1, y: 2n })
 */
export class CanonicalCodec<T> implements Codec<T> {
  readonly shape: Shape<T>
  readonly limits: Readonly<CodecLimits>
  private readonly logger: Logger

  constructor(deps: CanonicalCodecDeps<T>) {
    this.shape = deps.shape
    this.limits = Object.freeze(resolveLimits(deps.limits))
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "codec", shape: deps.shape.name })
  }

  encode(value: T): Uint8Array {
    try {
      const bytes = serialize(this.shape, value, { limits: this.limits })
      this.logger.trace("Value encoded", { operation: "encode", byteLength: bytes.length })

      return bytes
    } catch (err) {
      this.logFailure("encode", err)
      throw err
    }
  }

  decode(bytes: Uint8Array): T {
    try {
      const value = deserialize(this.shape, bytes, { limits: this.limits })
      this.logger.trace("Value decoded", { operation: "decode", byteLength: bytes.length })

      return value
    } catch (err) {
      this.logFailure("decode", err)
      throw err
    }
  }

  serialize(value: T): Uint8Array {
    return this.encode(value)
  }

  deserialize(bytes: Uint8Array): T {
    return this.decode(bytes)
  }

  private logFailure(operation: "encode" | "decode", err: unknown): void {
    if (!(err instanceof CodecError)) {
      this.logger.debug(`Failed to ${operation} value`, { operation, err })
      return
    }

    const offset = err.context.offset
    this.logger.debug(`Failed to ${operation} value`, {
      operation,
      code: err.code,
      ...(typeof offset === "number" && { offset }),
      err,
    })
  }
}

export function createCodec<T>(shape: Shape<T>, options: CanonicalCodecOptions = {}): CanonicalCodec<T> {
  return new CanonicalCodec({ ...options, shape })
}
