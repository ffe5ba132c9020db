import fs from "fs"
import path from "path"
import { RunSummary } from "../core/types"
import { ConfigError } from "../core/errors"

/**
 * Save a run summary to <dir>/<runId>.json
 */
export function saveRunSummary(summary: RunSummary, dir: string): string {
  fs.mkdirSync(dir, { recursive: true })
  const file = path.join(dir, `${summary.runId}.json`)
  fs.writeFileSync(file, JSON.stringify(summary, null, 2))
  return file
}

/**
 * Load and validate a summary written by an earlier run
 */
export function loadRunSummary(file: string): RunSummary {
  if (!fs.existsSync(file)) {
    throw new ConfigError(`Run summary not found: ${file}`)
  }
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"))
  } catch (error) {
    throw new ConfigError(`Run summary ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }
  const parsed = RunSummary.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Run summary ${file} is invalid: ${parsed.error.issues.map((i) => i.message).join("; ")}`)
  }
  return parsed.data
}

/**
 * Report-id sets of the batches a summary confirmed, keyed for lookup
 */
export function confirmedBatchKeys(summary: RunSummary): Set<string> {
  return new Set(
    summary.batches.filter((b) => b.status === "CONFIRMED").map((b) => batchKey(b.reportIds))
  )
}

export function batchKey(reportIds: readonly string[]): string {
  return reportIds.join("\n")
}
