import type { BatchJob, BatchStatus, ReportDescriptor } from "../core/types"
import { ConfigError, IllegalTransitionError } from "../core/errors"

/**
 * Split reports into contiguous batches of `batchSize`, keeping locator order.
 * N reports give ceil(N / batchSize) batches; only the last may be short.
 */
export function partitionBatches(reports: readonly ReportDescriptor[], batchSize: number): BatchJob[] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new ConfigError(`Batch size must be a positive integer, got ${batchSize}`)
  }

  const batches: BatchJob[] = []
  for (let i = 0; i < reports.length; i += batchSize) {
    const index = batches.length
    batches.push({
      batchId: `batch-${index + 1}`,
      index,
      reports: reports.slice(i, i + batchSize),
      status: "PENDING",
      attempts: 0,
      transitions: ["PENDING"],
    })
  }
  return batches
}

// Allowed moves. FAILED is reachable from every non-terminal state.
const TRANSITIONS: Record<BatchStatus, readonly BatchStatus[]> = {
  PENDING: ["RETRIEVED", "FAILED"],
  RETRIEVED: ["REWRITTEN", "FAILED"],
  REWRITTEN: ["DRY_RUN_REPORTED", "BACKED_UP", "FAILED"],
  BACKED_UP: ["DEPLOYED", "CONFIRMED", "FAILED"], // straight to CONFIRMED when nothing needs deploying
  DEPLOYED: ["CONFIRMED", "FAILED"],
  DRY_RUN_REPORTED: [],
  CONFIRMED: [],
  FAILED: [],
}

export function isTerminal(status: BatchStatus): boolean {
  return TRANSITIONS[status].length === 0
}

/**
 * Move a batch to its next state, recording the step
 */
export function transition(batch: BatchJob, to: BatchStatus): void {
  if (!TRANSITIONS[batch.status].includes(to)) {
    throw new IllegalTransitionError(batch.batchId, batch.status, to)
  }
  batch.status = to
  batch.transitions.push(to)
}
