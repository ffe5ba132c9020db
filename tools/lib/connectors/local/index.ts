/**
 * local - OrgConnector over report files already on disk
 *
 * Source format (`*.report-meta.xml`) and metadata format (`*.report`) files
 * under the root are reports; their id and full name are the path relative to
 * the root without the suffix. Deploying writes the files back in place.
 */

import fs from "fs"
import path from "path"
import fg from "fast-glob"
import type { FieldReference, ReportDescriptor, RetrievedReport } from "../../core/types"
import type { DeployResult, OrgConnector, ReportFilter } from "../../connector"
import { ConfigError, MalformedReportError, NotFoundError } from "../../core/errors"
import { findReferences } from "../../replace/rewriter"

const SUFFIXES = [".report-meta.xml", ".report"]

export interface LocalReportsOptions {
  /** Source-format object tree (`<Object>/fields/<Field>.field-meta.xml`) used to check fields */
  schemaDir?: string
}

export class LocalReportsConnector implements OrgConnector {
  readonly name = "local"
  readonly rootDir: string
  private readonly schemaDir: string | undefined

  constructor(rootDir: string, options: LocalReportsOptions = {}) {
    if (!fs.existsSync(rootDir) || !fs.statSync(rootDir).isDirectory()) {
      throw new ConfigError(`Reports directory not found: ${rootDir}`)
    }
    this.rootDir = rootDir
    this.schemaDir = options.schemaDir
  }

  async fieldExists(field: FieldReference): Promise<boolean> {
    if (!this.schemaDir) return true
    return fs.existsSync(path.join(this.schemaDir, field.objectName, "fields", `${field.fieldName}.field-meta.xml`))
  }

  async listReports(filter: ReportFilter = {}): Promise<ReportDescriptor[]> {
    const needle = filter.nameContains?.toLowerCase()
    return fg
      .sync(SUFFIXES.map((suffix) => `**/*${suffix}`), { cwd: this.rootDir, onlyFiles: true })
      .sort()
      .map((file) => {
        const id = stripSuffix(file)
        return { reportId: id, fullName: id, storagePath: file }
      })
      .filter((r) => !needle || r.fullName.toLowerCase().includes(needle))
  }

  /**
   * Reports with at least one reference to `field`. Unreadable markup is kept
   * so the run reports it as skipped.
   */
  async searchReports(field: FieldReference): Promise<ReportDescriptor[]> {
    const reports = await this.listReports()
    return reports.filter((report) => {
      try {
        return findReferences(this.read(report), field) > 0
      } catch (error) {
        if (error instanceof MalformedReportError) return true
        throw error
      }
    })
  }

  async retrieve(reports: readonly ReportDescriptor[]): Promise<RetrievedReport[]> {
    return reports.map((report) => ({ ...report, rawDefinition: this.read(report) }))
  }

  async deploy(reports: readonly RetrievedReport[]): Promise<DeployResult> {
    for (const report of reports) {
      fs.writeFileSync(this.resolve(report), report.rawDefinition)
    }
    return { jobId: `local-${Date.now()}`, status: "Succeeded", componentFailures: [] }
  }

  private read(report: ReportDescriptor): string {
    const file = this.resolve(report)
    if (!fs.existsSync(file)) {
      throw new NotFoundError(`Report file not found: ${report.storagePath}`)
    }
    return fs.readFileSync(file, "utf-8")
  }

  private resolve(report: ReportDescriptor): string {
    const file = path.resolve(this.rootDir, report.storagePath)
    const relative = path.relative(path.resolve(this.rootDir), file)
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new ConfigError(`Report path escapes the reports directory: ${report.storagePath}`)
    }
    return file
  }
}

function stripSuffix(file: string): string {
  const suffix = SUFFIXES.find((s) => file.endsWith(s))
  return suffix ? file.slice(0, -suffix.length) : file
}
