import fs from "fs"
import path from "path"
import type { BatchError } from "../core/types"
import type { OrgConnector } from "../connector"
import { ConfigError, describeError } from "../core/errors"
import { partitionBatches } from "../replace/batches"
import { silentLogger, type AppLogger } from "../logger"

export interface PullOptions {
  outputDir: string
  nameContains?: string
  batchSize: number
  logger?: AppLogger
}

export interface PullResult {
  listed: number
  written: string[] // files, in retrieval order
  failed: Array<{ batchId: string; reportIds: string[]; error: BatchError }>
}

/**
 * Retrieve report definitions into `outputDir` as source-format files.
 * A batch that fails is recorded and the pull moves on.
 */
export async function pullReports(connector: OrgConnector, options: PullOptions): Promise<PullResult> {
  const log = options.logger ?? silentLogger
  const reports = await connector.listReports(
    options.nameContains ? { nameContains: options.nameContains } : {}
  )
  const result: PullResult = { listed: reports.length, written: [], failed: [] }
  if (reports.length === 0) return result

  const outputDir = path.resolve(options.outputDir)
  for (const batch of partitionBatches(reports, options.batchSize)) {
    try {
      const retrieved = await connector.retrieve(batch.reports, { label: `pull-${batch.batchId}` })
      for (const report of retrieved) {
        const file = path.resolve(outputDir, `${report.fullName}.report-meta.xml`)
        if (path.relative(outputDir, file).startsWith("..")) {
          throw new ConfigError(`Report name escapes the output directory: ${report.fullName}`)
        }
        fs.mkdirSync(path.dirname(file), { recursive: true })
        fs.writeFileSync(file, report.rawDefinition)
        result.written.push(file)
      }
      log.info(`${batch.batchId}: ${retrieved.length} report(s) written`, { batchId: batch.batchId })
    } catch (error) {
      const described = describeError(error)
      log.error(`${batch.batchId} failed: ${described.message}`, { batchId: batch.batchId })
      result.failed.push({ batchId: batch.batchId, reportIds: batch.reports.map((r) => r.reportId), error: described })
    }
  }
  return result
}
