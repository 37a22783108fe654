import { DEFAULT_CODEC_LIMITS } from "../../ports/limits"
import { catchCodecError } from "../../tests/utils/catch-codec-error"
import { descend } from "../depth"

describe("descend", () => {
  const limits = { ...DEFAULT_CODEC_LIMITS, maxDepth: 2 }

  it("returns the next level while within the limit", () => {
    expect(descend(0, limits)).toBe(1)
    expect(descend(1, limits)).toBe(2)
  })

  it("throws once the limit would be passed", () => {
    const err = catchCodecError(() => descend(2, limits, 17))

    expect(err.code).toBe("recursion_limit_exceeded")
    expect(err.context).toEqual({ maxDepth: 2, offset: 17 })
  })
})
