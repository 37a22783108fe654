export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: byte offsets, limits, offending
 * values. Frozen once the error is built.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for failures caused by the input (malformed bytes, exceeded limits),
   * `false` for programmer errors such as an ill-formed shape or a value that
   * does not match its shape.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON.stringify-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
