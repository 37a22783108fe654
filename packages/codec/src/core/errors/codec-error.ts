import { BaseError } from "@bincanon/errors"

export type CodecErrorCode =
  | "unexpected_end_of_input"
  | "invalid_boolean"
  | "invalid_char"
  | "invalid_option_tag"
  | "unknown_variant_tag"
  | "non_canonical_length"
  | "length_overflow"
  | "invalid_utf8"
  | "map_not_canonically_ordered"
  | "duplicate_key"
  | "non_canonical_key"
  | "trailing_data"
  | "recursion_limit_exceeded"
  | "sink_exhausted"
  | "invalid_value"
  | "invalid_shape"

/**
 * Every encode and decode failure. Decoding errors are operational (the
 * bytes are bad); `invalid_value` and `invalid_shape` are programmer errors.
 */
export class CodecError extends BaseError<CodecErrorCode> {
  static unexpectedEndOfInput(input: {
    offset: number
    needed: number
    remaining: number
  }): CodecError {
    return new CodecError(
      `Unexpected end of input at offset ${input.offset}: needed ${input.needed} byte(s), ${input.remaining} left`,
      { code: "unexpected_end_of_input", context: input },
    )
  }

  static invalidBoolean(input: { offset: number; byte: number }): CodecError {
    return new CodecError(`Non-canonical boolean byte ${hex(input.byte)} at offset ${input.offset}`, {
      code: "invalid_boolean",
      context: input,
    })
  }

  static invalidChar(input: { offset: number; codePoint: number }): CodecError {
    return new CodecError(
      `Code point ${hex(input.codePoint)} at offset ${input.offset} is not a Unicode scalar value`,
      { code: "invalid_char", context: input },
    )
  }

  static invalidOptionTag(input: { offset: number; byte: number }): CodecError {
    return new CodecError(`Invalid option tag ${hex(input.byte)} at offset ${input.offset}`, {
      code: "invalid_option_tag",
      context: input,
    })
  }

  static unknownVariantTag(input: { offset: number; tag: number; shape: string }): CodecError {
    return new CodecError(`Unknown variant tag ${input.tag} for ${input.shape} at offset ${input.offset}`, {
      code: "unknown_variant_tag",
      context: input,
    })
  }

  static nonCanonicalLength(input: { offset: number }): CodecError {
    return new CodecError(`Varint at offset ${input.offset} is not minimally encoded`, {
      code: "non_canonical_length",
      context: input,
    })
  }

  static lengthOverflow(input: { offset?: number; length?: number; max: number }): CodecError {
    const where = input.offset === undefined ? "" : ` at offset ${input.offset}`
    const what = input.length === undefined ? "Varint" : `Length ${input.length}`

    return new CodecError(`${what}${where} exceeds the maximum of ${input.max}`, {
      code: "length_overflow",
      context: input,
    })
  }

  static invalidUtf8(input: { offset: number; cause: unknown }): CodecError {
    return new CodecError(`Malformed UTF-8 in string at offset ${input.offset}`, {
      code: "invalid_utf8",
      context: { offset: input.offset },
      cause: input.cause,
    })
  }

  static mapNotCanonicallyOrdered(input: { offset: number; shape: string }): CodecError {
    return new CodecError(
      `Key at offset ${input.offset} of ${input.shape} is not in ascending byte order`,
      { code: "map_not_canonically_ordered", context: input },
    )
  }

  static duplicateKey(input: { offset?: number; shape: string }): CodecError {
    const where = input.offset === undefined ? "" : ` at offset ${input.offset}`

    return new CodecError(`Duplicate key${where} in ${input.shape}`, {
      code: "duplicate_key",
      context: input,
    })
  }

  static nonCanonicalKey(input: { offset: number; shape: string }): CodecError {
    return new CodecError(`Key at offset ${input.offset} of ${input.shape} would not be kept as decoded`, {
      code: "non_canonical_key",
      context: input,
    })
  }

  static trailingData(input: { offset: number; remaining: number }): CodecError {
    return new CodecError(
      `${input.remaining} trailing byte(s) after the value ending at offset ${input.offset}`,
      { code: "trailing_data", context: input },
    )
  }

  static recursionLimitExceeded(input: { maxDepth: number; offset?: number }): CodecError {
    return new CodecError(`Nesting exceeds the maximum depth of ${input.maxDepth}`, {
      code: "recursion_limit_exceeded",
      context: input,
    })
  }

  static sinkExhausted(input: { maxBytes: number; requested: number }): CodecError {
    return new CodecError(
      `Encoding needs ${input.requested} byte(s) but the sink is capped at ${input.maxBytes}`,
      { code: "sink_exhausted", context: input },
    )
  }

  static invalidValue(input: { shape: string; reason: string; received?: unknown }): CodecError {
    const received = input.received === undefined ? "" : ` (received ${describeValue(input.received)})`

    return new CodecError(`Invalid value for ${input.shape}: ${input.reason}${received}`, {
      code: "invalid_value",
      context: { shape: input.shape, reason: input.reason },
      isOperational: false,
    })
  }

  static invalidShape(input: { shape: string; reason: string }): CodecError {
    return new CodecError(`Invalid shape ${input.shape}: ${input.reason}`, {
      code: "invalid_shape",
      context: input,
      isOperational: false,
    })
  }
}

function hex(n: number): string {
  return `0x${n.toString(16).padStart(2, "0")}`
}

export function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return `array of ${value.length}`
  if (value instanceof Uint8Array) return `${value.constructor.name} of ${value.length}`

  switch (typeof value) {
    case "bigint":
      return `${value}n`
    case "number":
    case "boolean":
      return String(value)
    case "string":
      return JSON.stringify(value.length > 32 ? `${value.slice(0, 32)}…` : value)
    default:
      return typeof value
  }
}
