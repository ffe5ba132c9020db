import { describe, test, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { saveRunSummary, loadRunSummary, confirmedBatchKeys, batchKey } from "../../tools/lib/replace/summary"
import { ConfigError } from "../../tools/lib/core/errors"
import type { RunSummary } from "../../tools/lib/core/types"

let dir: string

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "fieldshift-summary-"))
})

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true })
})

const summary: RunSummary = {
  runId: "2026-01-05T10-00-00-000Z",
  status: "failed",
  dryRun: false,
  oldField: "Account.OldField__c",
  newField: "Account.NewField__c",
  batchSize: 2,
  startedAt: "2026-01-05T10:00:00.000Z",
  finishedAt: "2026-01-05T10:02:00.000Z",
  batches: [
    { batchId: "batch-1", status: "CONFIRMED", reportIds: ["r1", "r2"], attempts: 2 },
    {
      batchId: "batch-2",
      status: "FAILED",
      reportIds: ["r3"],
      attempts: 2,
      error: { code: "DEPLOY_VALIDATION", message: "rejected", details: [] },
    },
  ],
  entries: [],
  intendedChanges: [],
  counts: { scanned: 3, matched: 3, replaced: 2, skipped: 0, failed: 1 },
  confirmedBatches: ["batch-1"],
  failedBatches: ["batch-2"],
  notAttemptedBatches: [],
}

describe("run summaries", () => {
  test("round-trip through <dir>/<runId>.json", () => {
    const file = saveRunSummary(summary, path.join(dir, "runs"))
    expect(file).toBe(path.join(dir, "runs", "2026-01-05T10-00-00-000Z.json"))
    expect(loadRunSummary(file)).toEqual(summary)
  })

  test("a missing file is a ConfigError", () => {
    expect(() => loadRunSummary(path.join(dir, "nope.json"))).toThrow(ConfigError)
  })

  test("invalid JSON is a ConfigError", () => {
    const file = path.join(dir, "bad.json")
    fs.writeFileSync(file, "{not json")
    expect(() => loadRunSummary(file)).toThrow(/is not valid JSON/)
  })

  test("a summary of the wrong shape is a ConfigError", () => {
    const file = path.join(dir, "shape.json")
    fs.writeFileSync(file, JSON.stringify({ runId: "x" }))
    expect(() => loadRunSummary(file)).toThrow(/is invalid/)
  })

  test("confirmed batches are keyed by their report ids", () => {
    expect(confirmedBatchKeys(summary)).toEqual(new Set([batchKey(["r1", "r2"])]))
  })
})
