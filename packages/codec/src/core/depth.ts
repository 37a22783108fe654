import type { CodecLimits } from "../ports/limits"
import { CodecError } from "./errors/codec-error"

/**
 * Returns the nesting level for the members of a composite entered at
 * `depth`, failing once it passes `limits.maxDepth`.
 */
export function descend(depth: number, limits: CodecLimits, offset?: number): number {
  const next = depth + 1

  if (next > limits.maxDepth) {
    throw CodecError.recursionLimitExceeded({
      maxDepth: limits.maxDepth,
      ...(offset !== undefined && { offset }),
    })
  }

  return next
}
