/**
 * sf-cli - OrgConnector backed by the Salesforce CLI
 *
 * Every call shells out to `sf ... --json` through an injectable runner.
 * Reports move through the Metadata API in metadata format: a package.xml
 * manifest per batch, staged under the work directory.
 */

import fs from "fs"
import path from "path"
import fg from "fast-glob"
import { z } from "zod"
import type { FieldReference, ReportDescriptor, RetrievedReport } from "../../core/types"
import type {
  DeployOptions,
  DeployResult,
  FieldDescription,
  FieldMetadataSource,
  OrgConnector,
  OrgContext,
  ReportFilter,
} from "../../connector"
import { NotFoundError, TransientError } from "../../core/errors"
import { silentLogger, type AppLogger } from "../../logger"
import { sleep as realSleep, type Sleep } from "../../replace/retry"
import { execRunner, runSf, type CommandRunner } from "./exec"
import { buildPackageXml, reportFullName, soqlString } from "./manifest"

export interface SfCliConnectorOptions {
  workDir: string
  runner?: CommandRunner
  timeoutMs?: number
  pollIntervalMs?: number
  maxPolls?: number
  sleep?: Sleep
  logger?: AppLogger
}

export interface ConnectionInfo {
  username: string
  instanceUrl: string
}

const DEFAULT_TIMEOUT_MS = 10 * 60_000
const DEFAULT_POLL_INTERVAL_MS = 5_000
const DEFAULT_MAX_POLLS = 120

const REPORT_SUFFIX = ".report"

const ReportRecord = z.object({
  Id: z.string(),
  Name: z.string(),
  DeveloperName: z.string(),
  FolderName: z.string().nullable(),
})

const FolderRecord = z.object({
  Name: z.string(),
  DeveloperName: z.string().nullable(),
})

const FieldNameRecord = z.object({ QualifiedApiName: z.string() })

const FieldDefinitionRecord = z.object({
  EntityDefinition: z.object({ QualifiedApiName: z.string() }).nullable().optional(),
  QualifiedApiName: z.string(),
  FullName: z.string().nullable().optional(),
  NamespacePrefix: z.string().nullable(),
  DeveloperName: z.string(),
  MasterLabel: z.string().nullable(),
  DataType: z.string().nullable(),
  Description: z.string().nullable(),
  Metadata: z.object({ formula: z.string().nullable().optional() }).passthrough().nullable().optional(),
})

const ComponentFailure = z.object({
  fullName: z.string().default(""),
  problem: z.string().default(""),
})

const DeployStartResult = z.object({ id: z.string() })

const DeployReportResult = z.object({
  id: z.string(),
  status: z.string(),
  details: z
    .object({
      // a single failure comes back as an object, several as an array
      componentFailures: z.union([ComponentFailure, z.array(ComponentFailure)]).optional(),
    })
    .optional(),
})

const TERMINAL_STATUSES = ["Succeeded", "SucceededPartial", "Failed", "Canceled"] as const
type TerminalStatus = (typeof TERMINAL_STATUSES)[number]

function isTerminal(status: string): status is TerminalStatus {
  return TERMINAL_STATUSES.some((s) => s === status)
}

const OrgDisplayResult = z.object({
  username: z.string(),
  instanceUrl: z.string(),
})

export class SfCliConnector implements OrgConnector, FieldMetadataSource {
  readonly name = "sf-cli"
  private readonly runner: CommandRunner
  private readonly timeoutMs: number
  private readonly pollIntervalMs: number
  private readonly maxPolls: number
  private readonly sleep: Sleep
  private readonly log: AppLogger

  constructor(
    private readonly context: OrgContext,
    private readonly options: SfCliConnectorOptions
  ) {
    this.runner = options.runner ?? execRunner
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.maxPolls = options.maxPolls ?? DEFAULT_MAX_POLLS
    this.sleep = options.sleep ?? realSleep
    this.log = options.logger ?? silentLogger
  }

  async fieldExists(field: FieldReference): Promise<boolean> {
    const result = await this.query(
      `SELECT QualifiedApiName FROM FieldDefinition WHERE EntityDefinition.QualifiedApiName = ${soqlString(
        field.objectName
      )} AND QualifiedApiName = ${soqlString(field.fieldName)}`,
      FieldNameRecord,
      { tooling: true }
    )
    return result.records.length > 0
  }

  async listReports(filter: ReportFilter = {}): Promise<ReportDescriptor[]> {
    const reports = await this.query(
      "SELECT Id, Name, DeveloperName, FolderName FROM Report WHERE IsDeleted = false ORDER BY Name",
      ReportRecord
    )
    const folders = await this.query("SELECT Name, DeveloperName FROM Folder WHERE Type = 'Report'", FolderRecord)

    const folderNames = new Map<string, string>()
    for (const folder of folders.records) {
      if (folder.DeveloperName) folderNames.set(folder.Name, folder.DeveloperName)
    }

    const needle = filter.nameContains?.toLowerCase()
    return reports.records
      .filter(
        (r) => !needle || r.Name.toLowerCase().includes(needle) || r.DeveloperName.toLowerCase().includes(needle)
      )
      .map((r) => {
        const fullName = reportFullName(r, folderNames)
        return { reportId: r.Id, fullName, storagePath: `reports/${fullName}${REPORT_SUFFIX}` }
      })
  }

  async retrieve(reports: readonly ReportDescriptor[], options: DeployOptions = {}): Promise<RetrievedReport[]> {
    if (reports.length === 0) return []
    const staging = this.freshDir("retrieve", options.label ?? "reports")
    const manifest = path.join(staging, "package.xml")
    fs.writeFileSync(manifest, buildPackageXml(reports.map((r) => r.fullName)))

    const target = path.join(staging, "metadata")
    fs.mkdirSync(target, { recursive: true })
    this.log.debug(`Retrieving ${reports.length} report(s) into ${target}`)
    await runSf(
      this.runner,
      ["project", "retrieve", "start", "--manifest", manifest, "--target-metadata-dir", target, "--unzip", ...this.orgArgs()],
      z.unknown(),
      { timeoutMs: this.timeoutMs }
    )

    const files = new Map<string, string>()
    for (const file of fg.sync(`**/reports/**/*${REPORT_SUFFIX}`, { cwd: target, onlyFiles: true })) {
      const segments = file.split("/")
      const fullName = segments.slice(segments.indexOf("reports") + 1).join("/")
      files.set(fullName.slice(0, -REPORT_SUFFIX.length), path.join(target, file))
    }

    return reports.map((report) => {
      const file = files.get(report.fullName)
      if (!file) {
        throw new NotFoundError(`Report ${report.fullName} was not returned by the retrieve`)
      }
      return { ...report, rawDefinition: fs.readFileSync(file, "utf-8") }
    })
  }

  async deploy(reports: readonly RetrievedReport[], options: DeployOptions = {}): Promise<DeployResult> {
    const staging = this.freshDir("deploy", options.label ?? "reports")
    fs.writeFileSync(path.join(staging, "package.xml"), buildPackageXml(reports.map((r) => r.fullName)))
    for (const report of reports) {
      const file = path.join(staging, "reports", `${report.fullName}${REPORT_SUFFIX}`)
      fs.mkdirSync(path.dirname(file), { recursive: true })
      fs.writeFileSync(file, report.rawDefinition)
    }

    const started = await runSf(
      this.runner,
      ["project", "deploy", "start", "--metadata-dir", staging, "--async", ...this.orgArgs()],
      DeployStartResult,
      { timeoutMs: this.timeoutMs }
    )
    this.log.debug(`Deploy ${started.id} started for ${reports.length} report(s)`)

    for (let poll = 1; poll <= this.maxPolls; poll++) {
      const report = await runSf(
        this.runner,
        ["project", "deploy", "report", "--job-id", started.id, ...this.orgArgs()],
        DeployReportResult,
        { timeoutMs: this.timeoutMs, acceptFailedResult: true }
      )
      if (isTerminal(report.status)) {
        const failures = report.details?.componentFailures ?? []
        return {
          jobId: report.id,
          status: report.status,
          componentFailures: Array.isArray(failures) ? failures : [failures],
        }
      }
      this.log.debug(`Deploy ${started.id}: ${report.status} (poll ${poll}/${this.maxPolls})`)
      await this.sleep(this.pollIntervalMs)
    }

    throw new TransientError(`Deploy ${started.id} did not finish after ${this.maxPolls} polls`)
  }

  async listFields(objectName: string): Promise<string[]> {
    const result = await this.query(
      `SELECT QualifiedApiName FROM FieldDefinition WHERE EntityDefinition.QualifiedApiName = ${soqlString(objectName)}`,
      FieldNameRecord,
      { tooling: true }
    )
    return result.records.map((r) => r.QualifiedApiName)
  }

  async describeField(objectName: string, fieldName: string): Promise<FieldDescription | null> {
    const result = await this.query(
      "SELECT EntityDefinition.QualifiedApiName, QualifiedApiName, FullName, NamespacePrefix, DeveloperName, " +
        "MasterLabel, DataType, Description, Metadata FROM FieldDefinition " +
        `WHERE EntityDefinition.QualifiedApiName = ${soqlString(objectName)} AND QualifiedApiName = ${soqlString(fieldName)}`,
      FieldDefinitionRecord,
      { tooling: true }
    )
    const record = result.records[0]
    if (!record) return null
    return {
      objectName: record.EntityDefinition?.QualifiedApiName ?? objectName,
      fullName: record.FullName ?? `${objectName}.${record.QualifiedApiName}`,
      namespacePrefix: record.NamespacePrefix,
      developerName: record.DeveloperName,
      label: record.MasterLabel ?? "",
      dataType: record.DataType ?? "",
      description: record.Description,
      formula: record.Metadata?.formula ?? null,
    }
  }

  /**
   * Confirm the org is authorized and answers queries
   */
  async checkConnection(): Promise<ConnectionInfo> {
    const org = await runSf(this.runner, ["org", "display", ...this.orgArgs()], OrgDisplayResult, {
      timeoutMs: this.timeoutMs,
    })
    await this.query("SELECT Id FROM User LIMIT 1", z.object({ Id: z.string() }))
    return { username: org.username, instanceUrl: org.instanceUrl }
  }

  private query<T>(
    soql: string,
    record: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { tooling?: boolean } = {}
  ): Promise<{ totalSize: number; records: T[] }> {
    const args = ["data", "query", "--query", soql, ...this.orgArgs()]
    if (options.tooling) args.push("--use-tooling-api")
    const result = z.object({ totalSize: z.number(), records: z.array(record) })
    return runSf(this.runner, args, result, { timeoutMs: this.timeoutMs })
  }

  private orgArgs(): string[] {
    return this.context.targetOrg ? ["--target-org", this.context.targetOrg] : []
  }

  private freshDir(kind: "retrieve" | "deploy", label: string): string {
    const dir = path.join(this.options.workDir, kind, label)
    fs.rmSync(dir, { recursive: true, force: true })
    fs.mkdirSync(dir, { recursive: true })
    return dir
  }
}
