import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON with bound context to the destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { prefix: "app" })

    logger.debug("resolved", { field: "Port", key: "APP_PORT" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "resolved",
      prefix: "app",
      field: "Port",
      key: "APP_PORT",
      level: 20,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("binds the service option to every entry", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "info", service: "billing" })

    logger.info("started")

    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ service: "billing", msg: "started" })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const cause = new RangeError("value out of range")

    logger.warn("binding failed", { err: new Error("assigning failed", { cause }) })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "assigning failed",
      cause: { type: "RangeError", message: "value out of range" },
    })
  })

  it("child() shares the parent's sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { module: "binder" })
    const child = base.child({ prefix: "app" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "logged",
      module: "binder",
      prefix: "app",
    })
  })
})
