import { type ConfigSource, EnvSource, loadConfig } from "@bincanon/config"
import type { Logger } from "@bincanon/logger"
import { z } from "zod"
import { type CodecLimits, DEFAULT_CODEC_LIMITS, MAX_U32 } from "../ports/limits"

export const codecLimitsSchema = z.object({
  MAX_DEPTH: z.coerce.number().int().positive().default(DEFAULT_CODEC_LIMITS.maxDepth),
  MAX_SEQUENCE_LENGTH: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_U32)
    .default(DEFAULT_CODEC_LIMITS.maxSequenceLength),

  /** Unset means unbounded */
  MAX_ENCODED_BYTES: z.coerce.number().int().positive().optional(),
})

export type LoadCodecLimitsOptions = {
  /** @default [new EnvSource({ prefix: "CODEC_" })] */
  sources?: ConfigSource[]
  logger?: Logger
}

/**
 * Reads codec limits from configuration sources, the `CODEC_`-prefixed
 * environment by default.
 *
 * @throws {ConfigError} `config_validation_failed` when a value is not a
 * valid limit
 */
export async function loadCodecLimits(options: LoadCodecLimitsOptions = {}): Promise<CodecLimits> {
  const config = await loadConfig({
    schema: codecLimitsSchema,
    sources: options.sources ?? [new EnvSource({ prefix: "CODEC_" })],
  })

  const unknownKeys = config.unknownKeys()
  if (unknownKeys.length > 0) {
    options.logger?.warn("Ignoring unknown codec settings", { keys: unknownKeys })
  }

  const { MAX_DEPTH, MAX_SEQUENCE_LENGTH, MAX_ENCODED_BYTES } = config.value
  const limits: CodecLimits = {
    maxDepth: MAX_DEPTH,
    maxSequenceLength: MAX_SEQUENCE_LENGTH,
    maxEncodedBytes: MAX_ENCODED_BYTES ?? DEFAULT_CODEC_LIMITS.maxEncodedBytes,
  }

  options.logger?.debug("Codec limits loaded", { ...limits, sources: config.sourcesUsed() })

  return limits
}
