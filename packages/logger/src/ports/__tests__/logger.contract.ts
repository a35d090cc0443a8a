import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds its own", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "dns-config" })
      const child = parent.child({ source: "dir:/etc/kube-dns" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        module: "dns-config",
        source: "dir:/etc/kube-dns",
      })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ source: "static" }).child({ source: "configmap" })

      child.info("hello")

      expect(read()[0]?.payload.source).toBe("configmap")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "dns-config" })
      const child = parent.child({ dir: "/etc/kube-dns" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("dir")
      expect(logs[1]?.payload).toMatchObject({ module: "dns-config", dir: "/etc/kube-dns" })
    })

    it("per-call meta overrides context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ source: "static" }).info("hello", { source: "dir:/tmp" })

      expect(read()[0]?.payload.source).toBe("dir:/tmp")
    })

    it("drops entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
