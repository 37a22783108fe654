import { ConfigError, EnvSource, ObjectSource } from "@bincanon/config"
import type { Logger } from "@bincanon/logger"
import { mock } from "vitest-mock-extended"
import { loadCodecLimits } from "../load-codec-limits"

describe("loadCodecLimits", () => {
  it("falls back to the defaults", async () => {
    await expect(loadCodecLimits({ sources: [new ObjectSource({})] })).resolves.toEqual({
      maxDepth: 500,
      maxSequenceLength: 2 ** 31 - 1,
      maxEncodedBytes: Number.POSITIVE_INFINITY,
    })
  })

  it("coerces string values", async () => {
    const limits = await loadCodecLimits({
      sources: [new ObjectSource({ MAX_DEPTH: "64", MAX_SEQUENCE_LENGTH: "1000", MAX_ENCODED_BYTES: "4096" })],
    })

    expect(limits).toEqual({ maxDepth: 64, maxSequenceLength: 1000, maxEncodedBytes: 4096 })
  })

  it("reads CODEC_-prefixed variables from the environment by default", async () => {
    vi.stubEnv("CODEC_MAX_DEPTH", "32")

    try {
      expect((await loadCodecLimits()).maxDepth).toBe(32)
    } finally {
      vi.unstubAllEnvs()
    }
  })

  it("lets later sources win", async () => {
    const limits = await loadCodecLimits({
      sources: [
        new EnvSource({ prefix: "CODEC_", env: { CODEC_MAX_DEPTH: "10" } }),
        new ObjectSource({ MAX_DEPTH: 20 }),
      ],
    })

    expect(limits.maxDepth).toBe(20)
  })

  it("rejects invalid limits", async () => {
    await expect(loadCodecLimits({ sources: [new ObjectSource({ MAX_DEPTH: "-1" })] })).rejects.toBeInstanceOf(
      ConfigError,
    )
  })

  it("warns about unknown keys", async () => {
    const logger = mock<Logger>()

    await loadCodecLimits({ sources: [new ObjectSource({ MAX_DEPHT: "3" })], logger })

    expect(logger.warn).toHaveBeenCalledWith("Ignoring unknown codec settings", { keys: ["MAX_DEPHT"] })
  })

  it("logs the resolved limits", async () => {
    const logger = mock<Logger>()

    await loadCodecLimits({ sources: [new ObjectSource({ MAX_DEPTH: 7 }, "test")], logger })

    expect(logger.warn).not.toHaveBeenCalled()
    expect(logger.debug).toHaveBeenCalledWith("Codec limits loaded", {
      maxDepth: 7,
      maxSequenceLength: 2 ** 31 - 1,
      maxEncodedBytes: Number.POSITIVE_INFINITY,
      sources: ["object:test", "default"],
    })
  })
})
