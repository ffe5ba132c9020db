/**
 * orchestrator.ts - Drives a replacement run batch by batch
 *
 *   locate → partition → for each batch:
 *     PENDING → RETRIEVED → REWRITTEN → DRY_RUN_REPORTED            (dry run)
 *                                     → BACKED_UP → DEPLOYED → CONFIRMED
 *     any non-terminal state → FAILED
 *
 * Batches run one at a time. A FAILED batch stops the run unless the plan says
 * continueOnError; an auth failure always stops it. Confirmed batches are never
 * rolled back: their backups are the recovery path. Cancellation is checked
 * between batches only.
 */

import type { BatchError, BatchJob, ChangeEntry, ReplacementPlan, RetrievedReport, RunStatus, RunSummary } from "../core/types"
import type { OrgConnector } from "../connector"
import {
  DeployValidationError,
  FieldshiftError,
  MalformedReportError,
  NotFoundError,
  ConfigError,
  describeError,
} from "../core/errors"
import { qualifiedName } from "../core/field-ref"
import type { Clock } from "../core/clock"
import { silentLogger, type AppLogger } from "../logger"
import { locateReports } from "./locator"
import { partitionBatches, transition } from "./batches"
import { rewriteReferences, describeChanges, type RewriteResult } from "./rewriter"
import { mapWithConcurrency } from "./pool"
import { DEFAULT_RETRY, withRetry, type RetryPolicy, type Sleep } from "./retry"
import { batchKey, confirmedBatchKeys } from "./summary"
import type { BackupManager } from "./backup"
import type { ChangeReport } from "./change-report"

export interface ReplacementRunOptions {
  connector: OrgConnector
  plan: ReplacementPlan
  backups: BackupManager
  report: ChangeReport
  logger?: AppLogger
  workers?: number // rewrite concurrency within a batch
  retry?: RetryPolicy
  sleep?: Sleep
  signal?: AbortSignal
  resumeFrom?: RunSummary
  clock?: Clock // stamps deploys; defaults to the BackupManager's clock
  now?: () => Date
}

export interface ReplacementRunResult {
  status: RunStatus
  batches: BatchJob[]
  summary: RunSummary
}

type RewriteOutcome =
  | { kind: "rewritten"; original: RetrievedReport; result: RewriteResult }
  | { kind: "malformed"; original: RetrievedReport; error: MalformedReportError }

const DEFAULT_WORKERS = 4

export async function runReplacement(options: ReplacementRunOptions): Promise<ReplacementRunResult> {
  const { connector, plan, report } = options
  const log = options.logger ?? silentLogger
  const now = options.now ?? (() => new Date())
  let batches: BatchJob[] = []

  const finish = (status: RunStatus, error?: BatchError): ReplacementRunResult => {
    report.finish(status, now(), error)
    return { status, batches, summary: report.toSummary() }
  }

  try {
    if (options.resumeFrom) checkResumable(options.resumeFrom, plan)
    const candidates = await locateReports(connector, plan.oldField, { target: plan.newField })
    batches = partitionBatches(candidates, plan.batchSize)
  } catch (error) {
    if (!(error instanceof FieldshiftError)) throw error
    log.error(`Run aborted before batching: ${error.message}`)
    return finish("aborted", describeError(error))
  }

  report.trackBatches(batches)
  if (options.resumeFrom) markResumed(batches, options.resumeFrom)
  log.info(`${batches.length} batch(es) of up to ${plan.batchSize} report(s)`, { count: batches.length })

  let status: RunStatus = "completed"
  let runError: BatchError | undefined

  for (const batch of batches) {
    if (batch.resumed) {
      log.info(`${batch.batchId} confirmed by an earlier run, skipping`, { batchId: batch.batchId })
      continue
    }
    if (options.signal?.aborted) {
      log.warn("Cancelled; remaining batches not attempted")
      status = "cancelled"
      break
    }

    await processBatch(batch, options, log)

    if (batch.status === "FAILED") {
      if (batch.error?.code === "AUTH") {
        status = "aborted"
        runError = batch.error
        break
      }
      status = "failed"
      if (!plan.continueOnError) break
    }
  }

  return finish(status, runError)
}

/**
 * Take one batch to a terminal state and record its entries. Never throws
 * for connector or per-report errors: they end in FAILED or "skipped".
 */
async function processBatch(batch: BatchJob, options: ReplacementRunOptions, log: AppLogger): Promise<void> {
  const { connector, plan, backups } = options
  const retry = options.retry ?? DEFAULT_RETRY
  const clock = options.clock ?? backups.clock
  const meta = { batchId: batch.batchId }
  let rewrites: RewriteOutcome[] | undefined

  const attempt = <T>(step: string, call: () => Promise<T>): Promise<T> =>
    withRetry(
      () => {
        batch.attempts++
        return call()
      },
      retry,
      {
        sleep: options.sleep,
        onRetry: (error, n, delay) =>
          log.warn(`${batch.batchId} ${step} attempt ${n} failed, retrying in ${delay}ms: ${describeError(error).message}`, meta),
      }
    )

  try {
    log.debug(`${batch.batchId}: retrieving ${batch.reports.length} report(s)`, meta)
    const retrieved = await attempt("retrieve", () => connector.retrieve(batch.reports, { label: batch.batchId }))
    const originals = inBatchOrder(batch, retrieved)
    transition(batch, "RETRIEVED")

    rewrites = await mapWithConcurrency(originals, options.workers ?? DEFAULT_WORKERS, async (original) =>
      rewriteOne(original, plan)
    )
    transition(batch, "REWRITTEN")

    if (plan.dryRun) {
      for (const outcome of rewrites) {
        if (outcome.kind === "rewritten" && outcome.result.referencesFound > 0) {
          options.report.recordIntended({
            reportId: outcome.original.reportId,
            fullName: outcome.original.fullName,
            referencesFound: outcome.result.referencesFound,
            lines: describeChanges(outcome.original.rawDefinition, outcome.result.content),
          })
        }
      }
      transition(batch, "DRY_RUN_REPORTED")
      return
    }

    const deploySet = rewrites.filter(
      (o): o is Extract<RewriteOutcome, { kind: "rewritten" }> =>
        o.kind === "rewritten" && o.result.content !== o.original.rawDefinition
    )

    for (const outcome of deploySet) {
      backups.snapshot(outcome.original)
    }
    transition(batch, "BACKED_UP")

    if (deploySet.length === 0) {
      transition(batch, "CONFIRMED")
      return
    }

    const unbacked = deploySet.filter((o) => !backups.has(o.original.reportId))
    if (unbacked.length > 0) {
      throw new Error(`No durable backup for ${unbacked.map((o) => o.original.reportId).join(", ")}`)
    }

    const payload: RetrievedReport[] = deploySet.map((o) => ({ ...o.original, rawDefinition: o.result.content }))
    batch.deployedAt = clock()
    log.debug(`${batch.batchId}: deploying ${payload.length} report(s)`, meta)
    const result = await attempt("deploy", () => connector.deploy(payload, { label: batch.batchId }))
    transition(batch, "DEPLOYED")

    if (result.status !== "Succeeded" || result.componentFailures.length > 0) {
      throw new DeployValidationError(`Deploy ${result.jobId} finished with status ${result.status}`, result.componentFailures)
    }
    transition(batch, "CONFIRMED")
    log.info(`${batch.batchId} confirmed (${payload.length} report(s) deployed)`, meta)
  } catch (error) {
    batch.error = describeError(error)
    transition(batch, "FAILED")
    log.error(`${batch.batchId} failed: ${batch.error.message}`, meta)
  } finally {
    recordEntries(batch, rewrites, options)
  }
}

async function rewriteOne(original: RetrievedReport, plan: ReplacementPlan): Promise<RewriteOutcome> {
  try {
    return { kind: "rewritten", original, result: rewriteReferences(original.rawDefinition, plan) }
  } catch (error) {
    if (error instanceof MalformedReportError) {
      return { kind: "malformed", original, error: error.forReport(original.reportId) }
    }
    throw error
  }
}

// Retrieval is all-or-nothing: a report missing from the response fails the batch
function inBatchOrder(batch: BatchJob, retrieved: readonly RetrievedReport[]): RetrievedReport[] {
  const byId = new Map(retrieved.map((r) => [r.reportId, r]))
  const missing = batch.reports.filter((r) => !byId.has(r.reportId)).map((r) => r.fullName)
  if (missing.length > 0) {
    throw new NotFoundError(`Retrieve did not return: ${missing.join(", ")}`)
  }
  return batch.reports.flatMap((r) => {
    const found = byId.get(r.reportId)
    return found ? [found] : []
  })
}

function recordEntries(batch: BatchJob, rewrites: RewriteOutcome[] | undefined, options: ReplacementRunOptions): void {
  const { report, plan } = options

  if (!rewrites) {
    for (const r of batch.reports) {
      report.record(entry(batch, r, 0, 0, "failed", batch.error?.message))
    }
    return
  }

  for (const outcome of rewrites) {
    const r = outcome.original
    if (outcome.kind === "malformed") {
      report.record(entry(batch, r, 0, 0, "skipped", outcome.error.reason))
      continue
    }
    const found = outcome.result.referencesFound
    if (found === 0) {
      report.record(entry(batch, r, 0, 0, "unchanged"))
    } else if (plan.dryRun) {
      report.record(entry(batch, r, found, 0, "would-replace"))
    } else if (batch.status === "CONFIRMED") {
      report.record(entry(batch, r, found, outcome.result.referencesReplaced, "replaced"))
    } else {
      report.record(entry(batch, r, found, 0, "failed", batch.error?.message))
    }
  }
}

function entry(
  batch: BatchJob,
  r: { reportId: string; fullName: string },
  found: number,
  replaced: number,
  outcome: ChangeEntry["outcome"],
  detail?: string
): ChangeEntry {
  return {
    reportId: r.reportId,
    fullName: r.fullName,
    batchId: batch.batchId,
    referencesFound: found,
    referencesReplaced: replaced,
    outcome,
    ...(detail ? { detail } : {}),
  }
}

function checkResumable(previous: RunSummary, plan: ReplacementPlan): void {
  const oldField = qualifiedName(plan.oldField)
  const newField = qualifiedName(plan.newField)
  if (previous.oldField !== oldField || previous.newField !== newField) {
    throw new ConfigError(
      `Cannot resume run ${previous.runId}: it replaced ${previous.oldField} → ${previous.newField}, not ${oldField} → ${newField}`
    )
  }
}

function markResumed(batches: BatchJob[], previous: RunSummary): void {
  const confirmed = confirmedBatchKeys(previous)
  for (const batch of batches) {
    if (confirmed.has(batchKey(batch.reports.map((r) => r.reportId)))) {
      batch.status = "CONFIRMED"
      batch.resumed = true
    }
  }
}
