import { Logger, type ILogObj } from "tslog"

/**
 * Structured log object with the fields the engine attaches
 */
export interface AppLogObj extends ILogObj {
  batchId?: string
  reportId?: string
  count?: number
  [key: string]: unknown
}

export type LogMode = "silent" | "error" | "info" | "debug"

const MIN_LEVELS: Record<LogMode, number> = {
  silent: 7,
  error: 5,
  info: 3,
  debug: 2,
}

export type AppLogger = Logger<AppLogObj>

/**
 * Human-readable logger on stderr. Diagnostics only: user-facing results come
 * from the change report on stdout.
 */
export function createLogger(name: string, mode: LogMode = "error"): AppLogger {
  return new Logger<AppLogObj>({
    name,
    type: mode === "silent" ? "hidden" : "pretty",
    minLevel: MIN_LEVELS[mode],
    hideLogPositionForProduction: true,
    overwrite: {
      transportFormatted: (meta, args, errors) => console.error(meta.trimEnd(), ...args, ...errors),
    },
  })
}

/**
 * Structured logger writing one JSON object per line to stderr, for --json
 * runs where stdout carries the summary.
 */
export function createJsonLogger(name: string, mode: LogMode = "debug"): AppLogger {
  const logger = new Logger<AppLogObj>({
    name,
    type: "hidden",
    minLevel: MIN_LEVELS[mode],
    hideLogPositionForProduction: true,
  })
  if (mode !== "silent") {
    logger.attachTransport((logObj) => {
      process.stderr.write(`${JSON.stringify(logObj)}\n`)
    })
  }
  return logger
}

export const silentLogger: AppLogger = createLogger("fieldshift", "silent")
