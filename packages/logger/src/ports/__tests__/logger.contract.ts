import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "wire-codec" })
      const child = parent.child({ operation: "decode" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        module: "wire-codec",
        operation: "decode",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ operation: "encode" })
      const child = parent.child({ operation: "decode" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.operation).toBe("decode")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ module: "wire-codec" })
      const child = parent.child({ formatVersion: 1 })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ module: "wire-codec" })
      expect(logs[0]?.payload).not.toHaveProperty("formatVersion")
      expect(logs[1]?.payload).toMatchObject({ module: "wire-codec", formatVersion: 1 })

      clear()
      expect(read()).toEqual([])
    })

    it("per-call meta merges with context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "wire-codec" }).debug("decoded", { byteLength: 12 })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ module: "wire-codec", byteLength: 12 })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
