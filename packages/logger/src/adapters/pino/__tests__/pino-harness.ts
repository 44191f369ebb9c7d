import { Writable } from "node:stream"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger.contract"
import { levelName } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const captured: CapturedLog[] = []

      const destination = new Writable({
        write(chunk, _, cb) {
          const payload = JSON.parse(chunk.toString())
          const level = levelName(Number(payload.level)) ?? "info"

          captured.push({ level, payload })

          cb()
        },
      })

      return {
        logger: new PinoLogger(
          { destination },
          { level: opts?.level ?? "trace", prettify: false },
          {},
        ),
        read: () => [...captured],
      }
    },
  }
}
