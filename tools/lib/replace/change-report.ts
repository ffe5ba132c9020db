/**
 * change-report.ts - Run-level accumulator and the only user-facing renderer
 *
 * Entries are recorded synchronously, so concurrent rewrite workers still
 * write one at a time through the event loop.
 */

import {
  ChangeEntry,
  type BatchError,
  type BatchJob,
  type IntendedChange,
  type ReplacementPlan,
  type RunCounts,
  type RunStatus,
  type RunSummary,
} from "../core/types"
import { qualifiedName } from "../core/field-ref"
import { BOLD, CYAN, DIM, GREEN, RED, YELLOW, painter, plural, type Painter } from "../format"

export interface ChangeReportOptions {
  runId: string
  plan: ReplacementPlan
  startedAt: Date
}

export class ChangeReport {
  readonly runId: string
  readonly plan: ReplacementPlan
  readonly startedAt: Date
  private finishedAt: Date | undefined
  private status: RunStatus = "completed"
  private runError: BatchError | undefined
  private readonly entries = new Map<string, ChangeEntry>()
  private readonly intended: IntendedChange[] = []
  private batches: readonly BatchJob[] = []

  constructor(options: ChangeReportOptions) {
    this.runId = options.runId
    this.plan = options.plan
    this.startedAt = options.startedAt
  }

  /**
   * Record the outcome for one report. Each report is recorded once per run.
   */
  record(entry: ChangeEntry): void {
    const parsed = ChangeEntry.parse(entry)
    if (this.entries.has(parsed.reportId)) {
      throw new Error(`Report ${parsed.reportId} already recorded in run ${this.runId}`)
    }
    this.entries.set(parsed.reportId, parsed)
  }

  recordIntended(change: IntendedChange): void {
    this.intended.push(change)
  }

  trackBatches(batches: readonly BatchJob[]): void {
    this.batches = batches
  }

  finish(status: RunStatus, finishedAt: Date, error?: BatchError): void {
    this.status = status
    this.finishedAt = finishedAt
    this.runError = error
  }

  get runStatus(): RunStatus {
    return this.status
  }

  getEntries(): ChangeEntry[] {
    return [...this.entries.values()]
  }

  getIntendedChanges(): IntendedChange[] {
    return [...this.intended]
  }

  summarize(): RunCounts {
    const counts: RunCounts = { scanned: 0, matched: 0, replaced: 0, skipped: 0, failed: 0 }
    for (const entry of this.entries.values()) {
      counts.scanned++
      if (entry.referencesFound > 0) counts.matched++
      if (entry.outcome === "replaced") counts.replaced++
      if (entry.outcome === "skipped") counts.skipped++
      if (entry.outcome === "failed") counts.failed++
    }
    return counts
  }

  toSummary(): RunSummary {
    const batches = this.batches.map((batch) => ({
      batchId: batch.batchId,
      status: batch.status,
      reportIds: batch.reports.map((r) => r.reportId),
      attempts: batch.attempts,
      ...(batch.error ? { error: batch.error } : {}),
      ...(batch.resumed ? { resumed: true } : {}),
    }))

    return {
      runId: this.runId,
      status: this.status,
      dryRun: this.plan.dryRun,
      oldField: qualifiedName(this.plan.oldField),
      newField: qualifiedName(this.plan.newField),
      batchSize: this.plan.batchSize,
      startedAt: this.startedAt.toISOString(),
      finishedAt: (this.finishedAt ?? this.startedAt).toISOString(),
      batches,
      entries: this.getEntries(),
      intendedChanges: this.getIntendedChanges(),
      counts: this.summarize(),
      confirmedBatches: this.batches.filter((b) => b.status === "CONFIRMED").map((b) => b.batchId),
      failedBatches: this.batches.filter((b) => b.status === "FAILED").map((b) => b.batchId),
      notAttemptedBatches: this.batches.filter((b) => b.status === "PENDING").map((b) => b.batchId),
      ...(this.runError ? { error: this.runError } : {}),
    }
  }

  /**
   * Text for the terminal. Color is on by default; tests render plain.
   */
  render(options: { color?: boolean } = {}): string {
    const paint = painter(options.color ?? true)
    const summary = this.toSummary()
    const lines: string[] = []

    lines.push(
      `${paint(BOLD, "Field replacement")} ${summary.oldField} → ${summary.newField} ${paint(DIM, `(run ${this.runId})`)}`
    )
    if (summary.dryRun) {
      lines.push(paint(YELLOW, "DRY RUN: no backups taken, nothing deployed"))
      lines.push("")
      if (summary.intendedChanges.length === 0) {
        lines.push("No changes would be made.")
      } else {
        lines.push(paint(BOLD, "Intended changes:"))
        for (const change of summary.intendedChanges) {
          lines.push(`  ${paint(CYAN, change.fullName)} (${plural(change.referencesFound, "reference")})`)
          for (const line of change.lines) {
            lines.push(`    L${line.line}  ${paint(RED, `- ${line.before}`)}`)
            lines.push(`    ${" ".repeat(String(line.line).length + 1)}  ${paint(GREEN, `+ ${line.after}`)}`)
          }
        }
      }
    }

    if (summary.batches.length > 0) {
      lines.push("")
      lines.push(paint(BOLD, "Batches:"))
      for (const batch of summary.batches) {
        lines.push(`  ${this.batchLine(batch, paint)}`)
        for (const detail of batch.error?.details ?? []) {
          lines.push(`      ${paint(DIM, detail)}`)
        }
      }
    }

    const skipped = summary.entries.filter((e) => e.outcome === "skipped")
    if (skipped.length > 0) {
      lines.push("")
      lines.push(paint(YELLOW, "Skipped (malformed):"))
      for (const entry of skipped) {
        lines.push(`  ${entry.fullName}${entry.detail ? `: ${entry.detail}` : ""}`)
      }
    }

    const c = summary.counts
    lines.push("")
    lines.push(
      `Reports: ${c.scanned} scanned, ${c.matched} matched, ${c.replaced} replaced, ${c.skipped} skipped, ${c.failed} failed`
    )

    if (summary.error) {
      lines.push(paint(RED, `Error: ${summary.error.message}`))
    }

    if (summary.status !== "completed") {
      const list = (ids: string[]) => (ids.length > 0 ? ids.join(", ") : "none")
      lines.push(paint(RED, `Run ${summary.status}.`))
      lines.push(`  Confirmed: ${list(summary.confirmedBatches)}`)
      lines.push(`  Failed: ${list(summary.failedBatches)}`)
      lines.push(`  Not attempted: ${list(summary.notAttemptedBatches)}`)
    }

    return lines.join("\n")
  }

  private batchLine(batch: RunSummary["batches"][number], paint: Painter): string {
    const size = plural(batch.reportIds.length, "report")
    const status = batch.status.padEnd(18)
    switch (batch.status) {
      case "CONFIRMED":
        return `${paint(GREEN, "✓")} ${batch.batchId}  ${status}${size}${batch.resumed ? "  (confirmed by earlier run)" : ""}`
      case "DRY_RUN_REPORTED":
        return `${paint(YELLOW, "○")} ${batch.batchId}  ${status}${size}`
      case "FAILED":
        return `${paint(RED, "✗")} ${batch.batchId}  ${status}${size}  ${batch.error ? `${batch.error.code}: ${batch.error.message}` : ""}`.trimEnd()
      case "PENDING":
        return `${paint(DIM, "·")} ${batch.batchId}  ${status}${size}  not attempted`
      default:
        return `${paint(YELLOW, "⚠")} ${batch.batchId}  ${status}${size}`
    }
  }
}
