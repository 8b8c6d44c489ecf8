import { NullLogger } from "../null-logger"

describe("NullLogger behavior", () => {
  it("accepts every level without output", () => {
    const write = vi.spyOn(process.stdout, "write")
    const logger = new NullLogger()

    logger.trace("a")
    logger.debug("b")
    logger.info("c")
    logger.warn("d")
    logger.error("e", { err: new Error("x") })
    logger.fatal("f")

    expect(write).not.toHaveBeenCalled()
  })

  it("child() returns another NullLogger", () => {
    const child = new NullLogger().child({ command: "demo" })

    expect(child).toBeInstanceOf(NullLogger)
  })
})
