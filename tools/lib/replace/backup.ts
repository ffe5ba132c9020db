/**
 * backup.ts - Durable, write-once snapshots of reports before they are deployed
 *
 * Layout: <dir>/<runId>/<encoded reportId>.json, one BackupRecord per file.
 * Records are written to a temp file, fsynced, then renamed into place, so a
 * record that exists on disk is complete.
 */

import fs from "fs"
import path from "path"
import { BackupRecord, type RetrievedReport } from "../core/types"
import { createMonotonicClock, type Clock } from "../core/clock"
import { NotFoundError } from "../core/errors"

export interface BackupManagerOptions {
  dir: string
  runId: string
  clock?: Clock
}

export class BackupManager {
  readonly dir: string
  readonly runId: string
  readonly clock: Clock
  private readonly records = new Map<string, BackupRecord>()

  constructor(options: BackupManagerOptions) {
    this.dir = options.dir
    this.runId = options.runId
    this.clock = options.clock ?? createMonotonicClock()
  }

  get runDir(): string {
    return path.join(this.dir, this.runId)
  }

  /**
   * Persist the report's current content. Returns once the record is durable.
   * A report already backed up in this run keeps its first record.
   */
  snapshot(report: RetrievedReport): BackupRecord {
    const existing = this.records.get(report.reportId) ?? this.readRecord(report.reportId)
    if (existing) {
      this.records.set(report.reportId, existing)
      return existing
    }

    const record: BackupRecord = {
      runId: this.runId,
      reportId: report.reportId,
      fullName: report.fullName,
      storagePath: report.storagePath,
      originalContent: report.rawDefinition,
      timestamp: this.clock(),
    }
    writeDurably(this.recordPath(report.reportId), JSON.stringify(record, null, 2))
    this.records.set(report.reportId, record)
    return record
  }

  /**
   * Whether a durable backup of `reportId` exists for this run
   */
  has(reportId: string): boolean {
    return fs.existsSync(this.recordPath(reportId))
  }

  get(reportId: string): BackupRecord | undefined {
    return this.records.get(reportId) ?? this.readRecord(reportId)
  }

  /**
   * Rebuild the pre-run report from a record
   */
  restore(record: BackupRecord): RetrievedReport {
    return restoreBackup(record)
  }

  private recordPath(reportId: string): string {
    return path.join(this.runDir, `${encodeURIComponent(reportId)}.json`)
  }

  private readRecord(reportId: string): BackupRecord | undefined {
    const file = this.recordPath(reportId)
    if (!fs.existsSync(file)) return undefined
    return BackupRecord.parse(JSON.parse(fs.readFileSync(file, "utf-8")))
  }
}

export function restoreBackup(record: BackupRecord): RetrievedReport {
  return {
    reportId: record.reportId,
    fullName: record.fullName,
    storagePath: record.storagePath,
    rawDefinition: record.originalContent,
  }
}

/**
 * Load every record of a run, ordered by report id
 */
export function listBackups(dir: string, runId: string): BackupRecord[] {
  const runDir = path.join(dir, runId)
  if (!fs.existsSync(runDir)) {
    throw new NotFoundError(`No backups for run ${runId} in ${dir}`)
  }
  return fs
    .readdirSync(runDir)
    .filter((name) => name.endsWith(".json"))
    .map((name) => BackupRecord.parse(JSON.parse(fs.readFileSync(path.join(runDir, name), "utf-8"))))
    .sort((a, b) => (a.reportId < b.reportId ? -1 : a.reportId > b.reportId ? 1 : 0))
}

/**
 * Run ids that have backups, oldest first
 */
export function listRuns(dir: string): string[] {
  if (!fs.existsSync(dir)) return []
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
}

function writeDurably(file: string, content: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  const temp = `${file}.${process.pid}.tmp`
  const fd = fs.openSync(temp, "w")
  try {
    fs.writeSync(fd, content)
    fs.fsyncSync(fd)
  } finally {
    fs.closeSync(fd)
  }
  fs.renameSync(temp, file)
}
