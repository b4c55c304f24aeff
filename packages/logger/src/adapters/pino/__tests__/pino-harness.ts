import { Writable } from "node:stream"
import type { CapturedEntry, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import { type LogLevelName, LogLevels, logLevelNames } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const pinoLevelToName = new Map<number, LogLevelName>(
  Object.entries(LogLevels).flatMap(([label, value]) => {
    const name = logLevelNames.find((n) => n === label.toLowerCase())
    return name ? [[value, name] as const] : []
  }),
)

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    capture: (level) => {
      const captured: CapturedEntry[] = []

      const destination = new Writable({
        write(chunk, _, cb) {
          const { level: severity, msg, ...fields }: Record<string, unknown> = JSON.parse(
            chunk.toString(),
          )

          captured.push({
            level: pinoLevelToName.get(Number(severity)) ?? "info",
            message: typeof msg === "string" ? msg : "",
            fields,
          })

          cb()
        },
      })

      return {
        logger: new PinoLogger({ destination }, { level }),
        entries: () => captured,
      }
    },
  }
}
