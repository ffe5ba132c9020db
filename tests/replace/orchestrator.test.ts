import { describe, test, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { runReplacement, type ReplacementRunOptions } from "../../tools/lib/replace/orchestrator"
import { BackupManager } from "../../tools/lib/replace/backup"
import { ChangeReport } from "../../tools/lib/replace/change-report"
import { ReplacementPlan, type ReplacementPlanInput, type RunSummary } from "../../tools/lib/core/types"
import { runIdFor } from "../../tools/lib/core/clock"
import { AuthError, RateLimitError, TransientError } from "../../tools/lib/core/errors"
import { MemoryOrg, reportXml } from "../helpers/memory-org"

const OLD = "Account.OldField__c"
const NEW = "Account.NewField__c"
const IDS = ["00O000000000001", "00O000000000002", "00O000000000003", "00O000000000004", "00O000000000005"]

let dir: string

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "fieldshift-run-"))
})

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true })
})

function orgWith(count: number): MemoryOrg {
  const org = new MemoryOrg({ fields: [OLD, NEW] })
  // inserted out of order; the locator sorts
  for (const id of IDS.slice(0, count).reverse()) {
    org.addReport(id, reportXml(["Account.Name", OLD]))
  }
  return org
}

function setup(
  org: MemoryOrg,
  planInput: Partial<ReplacementPlanInput> = {},
  startedAt = new Date("2026-01-05T10:00:00.000Z")
) {
  const plan = ReplacementPlan.parse({
    oldField: { objectName: "Account", fieldName: "OldField__c" },
    newField: { objectName: "Account", fieldName: "NewField__c" },
    batchSize: 2,
    ...planInput,
  })
  const runId = runIdFor(startedAt)
  const backups = new BackupManager({ dir: path.join(dir, "backup"), runId })
  const report = new ChangeReport({ runId, plan, startedAt })
  const sleeps: number[] = []
  const run = (extra: Partial<ReplacementRunOptions> = {}) =>
    runReplacement({
      connector: org,
      plan,
      backups,
      report,
      sleep: async (ms) => {
        sleeps.push(ms)
      },
      now: () => new Date(startedAt.getTime() + 1000),
      ...extra,
    })
  return { plan, backups, report, sleeps, run }
}

function rejectReport(org: MemoryOrg, reportId: string): void {
  org.rejectDeploy = (reports) =>
    reports.some((r) => r.reportId === reportId)
      ? [{ fullName: `Sales/${reportId}`, problem: "Invalid field NewField__c" }]
      : undefined
}

describe("runReplacement", () => {
  test("partitions 5 reports with batch size 2 into batches of 2, 2 and 1", async () => {
    const org = orgWith(5)
    const { run } = setup(org)

    const result = await run()

    expect(result.status).toBe("completed")
    expect(result.batches.map((b) => b.reports.length)).toEqual([2, 2, 1])
    expect(result.batches.map((b) => b.reports.map((r) => r.reportId))).toEqual([
      [IDS[0], IDS[1]],
      [IDS[2], IDS[3]],
      [IDS[4]],
    ])
    expect(result.batches.map((b) => b.status)).toEqual(["CONFIRMED", "CONFIRMED", "CONFIRMED"])
    expect(result.batches[0]!.transitions).toEqual(["PENDING", "RETRIEVED", "REWRITTEN", "BACKED_UP", "DEPLOYED", "CONFIRMED"])
    expect(result.summary.counts).toEqual({ scanned: 5, matched: 5, replaced: 5, skipped: 0, failed: 0 })
    for (const id of IDS) {
      expect(org.content(id)).toBe(reportXml(["Account.Name", NEW]))
    }
  })

  test("dry run leaves the org and the backup directory untouched", async () => {
    const org = orgWith(3)
    const before = IDS.slice(0, 3).map((id) => org.content(id))
    const { run, backups } = setup(org, { dryRun: true })

    const result = await run()

    expect(result.status).toBe("completed")
    expect(org.callsOf("deploy")).toHaveLength(0)
    expect(IDS.slice(0, 3).map((id) => org.content(id))).toEqual(before)
    expect(fs.existsSync(backups.runDir)).toBe(false)
    expect(result.batches.map((b) => b.status)).toEqual(["DRY_RUN_REPORTED", "DRY_RUN_REPORTED"])
    expect(result.summary.entries.map((e) => e.outcome)).toEqual(["would-replace", "would-replace", "would-replace"])
    expect(result.summary.intendedChanges).toHaveLength(3)
    expect(result.summary.intendedChanges[0]!.lines).toEqual([
      { line: 7, before: `<field>${OLD}</field>`, after: `<field>${NEW}</field>` },
    ])
  })

  test("every deployed report has a durable backup taken before the deploy", async () => {
    const org = orgWith(3)
    const { run, backups } = setup(org)
    const backedUpAtDeploy: boolean[] = []
    org.onDeploy = (reports) => {
      for (const r of reports) backedUpAtDeploy.push(backups.has(r.reportId))
    }
    const original = org.content(IDS[0]!)

    const result = await run()

    expect(backedUpAtDeploy).toEqual([true, true, true])
    for (const batch of result.batches) {
      for (const r of batch.reports) {
        const record = backups.get(r.reportId)
        expect(record).toBeDefined()
        expect(record!.timestamp).toBeLessThan(batch.deployedAt!)
      }
    }
    expect(backups.get(IDS[0]!)!.originalContent).toBe(original)
  })

  test("halts after a failed deploy in batch 2 of 3", async () => {
    const org = orgWith(5)
    rejectReport(org, IDS[2]!)
    const { run, backups } = setup(org)

    const result = await run()

    expect(result.status).toBe("failed")
    expect(result.batches.map((b) => b.status)).toEqual(["CONFIRMED", "FAILED", "PENDING"])
    expect(result.batches[1]!.error).toEqual({
      code: "DEPLOY_VALIDATION",
      message: "Deploy job-2 finished with status Failed",
      details: [`Sales/${IDS[2]}: Invalid field NewField__c`],
    })
    expect(result.summary.confirmedBatches).toEqual(["batch-1"])
    expect(result.summary.failedBatches).toEqual(["batch-2"])
    expect(result.summary.notAttemptedBatches).toEqual(["batch-3"])

    // batch 1 stays deployed; batch 2 keeps its backups for recovery
    expect(org.content(IDS[0]!)).toContain(NEW)
    expect(org.content(IDS[2]!)).toContain(OLD)
    expect(backups.has(IDS[2]!)).toBe(true)
    expect(backups.has(IDS[4]!)).toBe(false)
    expect(org.callsOf("retrieve").map((c) => c.label)).toEqual(["batch-1", "batch-2"])

    const outcomes = Object.fromEntries(result.summary.entries.map((e) => [e.reportId, e.outcome]))
    expect(outcomes).toEqual({ [IDS[0]!]: "replaced", [IDS[1]!]: "replaced", [IDS[2]!]: "failed", [IDS[3]!]: "failed" })
  })

  test("continueOnError runs the remaining batches", async () => {
    const org = orgWith(5)
    rejectReport(org, IDS[2]!)
    const { run } = setup(org, { continueOnError: true })

    const result = await run()

    expect(result.status).toBe("failed")
    expect(result.batches.map((b) => b.status)).toEqual(["CONFIRMED", "FAILED", "CONFIRMED"])
    expect(org.content(IDS[4]!)).toContain(NEW)
  })

  test("retries transient failures with exponential backoff", async () => {
    const org = orgWith(2)
    org.failNext("deploy", new TransientError("socket hang up"))
    const { run, sleeps } = setup(org)

    const result = await run()

    expect(result.status).toBe("completed")
    expect(result.batches[0]!.status).toBe("CONFIRMED")
    expect(result.batches[0]!.attempts).toBe(3) // 1 retrieve + 2 deploys
    expect(sleeps).toEqual([1000])
  })

  test("fails the batch when retries are exhausted", async () => {
    const org = orgWith(2)
    org.failNext("retrieve", new RateLimitError("REQUEST_LIMIT_EXCEEDED"), 3)
    const { run, sleeps } = setup(org)

    const result = await run()

    expect(result.status).toBe("failed")
    expect(result.batches[0]!.status).toBe("FAILED")
    expect(result.batches[0]!.attempts).toBe(3)
    expect(result.batches[0]!.error?.code).toBe("RATE_LIMIT")
    expect(sleeps).toEqual([1000, 2000])
    expect(result.summary.entries.map((e) => e.outcome)).toEqual(["failed", "failed"])
  })

  test("an auth failure aborts the run even with continueOnError", async () => {
    const org = orgWith(5)
    org.failNext("retrieve", new AuthError("INVALID_SESSION_ID: Session expired or invalid"))
    const { run } = setup(org, { continueOnError: true })

    const result = await run()

    expect(result.status).toBe("aborted")
    expect(result.batches.map((b) => b.status)).toEqual(["FAILED", "PENDING", "PENDING"])
    expect(result.summary.error?.code).toBe("AUTH")
    expect(org.callsOf("retrieve")).toHaveLength(1)
  })

  test("a field missing from the schema aborts before any report is touched", async () => {
    const org = orgWith(2)
    org.fields.delete(OLD)
    const { run } = setup(org)

    const result = await run()

    expect(result.status).toBe("aborted")
    expect(result.batches).toEqual([])
    expect(result.summary.error).toEqual({
      code: "NOT_FOUND",
      message: `Field ${OLD} does not exist in the org schema`,
      details: [],
    })
    expect(org.callsOf("listReports")).toHaveLength(0)
    expect(org.callsOf("retrieve")).toHaveLength(0)
  })

  test("a replacement field missing from the schema aborts before any report is touched", async () => {
    const org = orgWith(2)
    org.fields.delete(NEW)
    const { run, backups } = setup(org)

    const result = await run()

    expect(result.status).toBe("aborted")
    expect(result.summary.error?.message).toBe(`Field ${NEW} does not exist in the org schema`)
    expect(org.callsOf("retrieve")).toHaveLength(0)
    expect(org.callsOf("deploy")).toHaveLength(0)
    expect(fs.existsSync(backups.runDir)).toBe(false)
    expect(org.content(IDS[0]!)).toBe(reportXml(["Account.Name", OLD]))
  })

  test("a retrieve that leaves out a report fails the whole batch", async () => {
    const org = orgWith(3)
    org.missingFromRetrieve.add(IDS[1]!)
    const { run } = setup(org)

    const result = await run()

    expect(result.status).toBe("failed")
    expect(result.batches.map((b) => b.status)).toEqual(["FAILED", "PENDING"])
    expect(result.batches[0]!.error).toEqual({
      code: "NOT_FOUND",
      message: `Retrieve did not return: Sales/${IDS[1]}`,
      details: [],
    })
    expect(result.summary.entries.map((e) => e.outcome)).toEqual(["failed", "failed"])
    expect(org.callsOf("retrieve")).toHaveLength(1)
    expect(org.callsOf("deploy")).toHaveLength(0)
  })

  test("skips malformed reports and deploys the rest of the batch", async () => {
    const org = orgWith(1)
    const broken = `<Report><columns><field>${OLD}</field></Report>`
    org.addReport(IDS[1]!, broken)
    const { run } = setup(org)

    const result = await run()

    expect(result.status).toBe("completed")
    expect(result.batches[0]!.status).toBe("CONFIRMED")
    expect(org.callsOf("deploy").map((c) => c.ids)).toEqual([[IDS[0]]])
    expect(org.content(IDS[1]!)).toBe(broken)
    const skipped = result.summary.entries.find((e) => e.reportId === IDS[1])
    expect(skipped).toMatchObject({ outcome: "skipped", referencesFound: 0, detail: "<columns> closed by </Report>" })
    expect(result.summary.counts.skipped).toBe(1)
  })

  test("reports without the reference are neither backed up nor deployed", async () => {
    const org = orgWith(1)
    org.addReport(IDS[1]!, reportXml(["Account.Name"]))
    const { run, backups } = setup(org)

    const result = await run()

    expect(org.callsOf("deploy").map((c) => c.ids)).toEqual([[IDS[0]]])
    expect(backups.has(IDS[1]!)).toBe(false)
    expect(result.summary.entries.map((e) => [e.reportId, e.outcome])).toEqual([
      [IDS[0], "replaced"],
      [IDS[1], "unchanged"],
    ])
  })

  test("a second run over the same reports changes nothing", async () => {
    const org = orgWith(3)
    await setup(org).run()
    const after = IDS.slice(0, 3).map((id) => org.content(id))

    const second = await setup(org, {}, new Date("2026-01-05T11:00:00.000Z")).run()

    expect(IDS.slice(0, 3).map((id) => org.content(id))).toEqual(after)
    expect(org.callsOf("deploy")).toHaveLength(2) // both from the first run
    expect(second.batches.map((b) => b.status)).toEqual(["CONFIRMED", "CONFIRMED"])
    expect(second.summary.counts.replaced).toBe(0)
  })

  test("stops between batches when cancelled", async () => {
    const org = orgWith(5)
    const controller = new AbortController()
    org.onDeploy = () => controller.abort()
    const { run } = setup(org)

    const result = await run({ signal: controller.signal })

    expect(result.status).toBe("cancelled")
    expect(result.batches.map((b) => b.status)).toEqual(["CONFIRMED", "PENDING", "PENDING"])
    expect(result.summary.notAttemptedBatches).toEqual(["batch-2", "batch-3"])
  })

  describe("resume", () => {
    async function failedFirstRun(org: MemoryOrg): Promise<RunSummary> {
      rejectReport(org, IDS[2]!)
      const first = await setup(org).run()
      org.rejectDeploy = undefined
      return first.summary
    }

    test("skips batches an earlier run confirmed", async () => {
      const org = orgWith(5)
      const previous = await failedFirstRun(org)
      org.calls.length = 0

      const result = await setup(org, {}, new Date("2026-01-05T11:00:00.000Z")).run({ resumeFrom: previous })

      expect(result.status).toBe("completed")
      expect(result.batches.map((b) => [b.status, b.resumed ?? false])).toEqual([
        ["CONFIRMED", true],
        ["CONFIRMED", false],
        ["CONFIRMED", false],
      ])
      expect(org.callsOf("retrieve").map((c) => c.label)).toEqual(["batch-2", "batch-3"])
      for (const id of IDS) expect(org.content(id)).toContain(NEW)
      expect(result.summary.batches[0]!.resumed).toBe(true)
    })

    test("refuses a summary for a different replacement", async () => {
      const org = orgWith(5)
      const previous = await failedFirstRun(org)

      const result = await setup(org).run({
        resumeFrom: { ...previous, newField: "Account.OtherField__c" },
      })

      expect(result.status).toBe("aborted")
      expect(result.summary.error?.code).toBe("CONFIG")
    })
  })
})
