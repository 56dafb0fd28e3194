import { Writable } from "node:stream"
import { type Logger, PinoLogger } from "@statekeep/logger"

/** A trace-level pino logger whose JSON lines are parsed into `entries`. */
export function captureLogger(): { logger: Logger; entries: Record<string, unknown>[] } {
  const entries: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      entries.push(JSON.parse(chunk.toString("utf8")))
      callback()
    },
  })

  return { logger: new PinoLogger({ destination }, { level: "trace" }), entries }
}
