import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without throwing", () => {
    const logger = createNullLogger()

    expect(() => {
      logger.trace("t", { shape: "u8" })
      logger.debug("d")
      logger.info("i")
      logger.warn("w")
      logger.error("e", { err: new Error("x") })
      logger.fatal("f")
    }).not.toThrow()
  })

  it("returns another NullLogger from child()", () => {
    const child = new NullLogger().child({ module: "codec" })

    expect(child).toBeInstanceOf(NullLogger)
  })
})
