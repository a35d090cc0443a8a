import { Writable } from "node:stream"
import { BaseError } from "@dnssync/errors"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits one JSON line with bindings and meta", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace" },
      { module: "dns-config" },
    )

    logger.info("config applied", { source: "static", upstreamCount: 2 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "config applied",
      level: 30,
      module: "dns-config",
      source: "static",
      upstreamCount: 2,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() shares the parent's destination and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { module: "dns-config" })
    const child = base.child({ source: "configmap:kube-system/kube-dns" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "logged",
      module: "dns-config",
      source: "configmap:kube-system/kube-dns",
    })
  })

  it("serializes errors under err, including the cause", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    const err = new BaseError("directory read failed", {
      code: "config_read_failed",
      cause: new Error("ENOENT"),
    })

    logger.error("tick skipped", { err })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err).toMatchObject({
      type: "BaseError",
      message: expect.stringContaining("directory read failed"),
      code: "config_read_failed",
    })
  })
})
