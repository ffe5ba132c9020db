/**
 * fieldshift.ts - Salesforce report maintenance CLI
 *
 * Rewrites a field reference across every report that uses it, in batches,
 * with backups taken before anything is deployed.
 *
 * Usage:
 *   fieldshift replace-fields --old-field A.Old__c --new-field A.New__c [--dry-run]
 *   fieldshift extract-fields --objects Account,Contact
 *   fieldshift pull-reports [--name-contains text]
 *   fieldshift test-connection
 *   fieldshift restore-backup --run <runId>
 *
 * Examples:
 *   fieldshift -o prod replace-fields --old-field Account.Region__c --new-field Account.Sales_Region__c --dry-run
 *   fieldshift replace-fields --old-field Account.Region__c --new-field Account.Sales_Region__c \
 *     --reports-path force-app/main/default/reports
 *   fieldshift replace-fields ... --resume report-migration/runs/2026-01-05T10-00-00-000Z.json
 */

import { Command, CommanderError } from "commander"
import path from "path"
import { ReplacementPlan, type RunStatus } from "./lib/core/types"
import { parseFieldReference } from "./lib/core/field-ref"
import { runIdFor } from "./lib/core/clock"
import { ConfigError, FieldshiftError, describeError } from "./lib/core/errors"
import { positiveInt, resolveConfig, DEFAULT_ORG_ENV, type ResolvedConfig } from "./lib/config"
import type { OrgConnector } from "./lib/connector"
import { SfCliConnector } from "./lib/connectors/sf-cli"
import type { CommandRunner } from "./lib/connectors/sf-cli/exec"
import { LocalReportsConnector } from "./lib/connectors/local"
import { BackupManager, listBackups, listRuns, restoreBackup } from "./lib/replace/backup"
import { ChangeReport } from "./lib/replace/change-report"
import { runReplacement } from "./lib/replace/orchestrator"
import { loadRunSummary, saveRunSummary } from "./lib/replace/summary"
import { partitionBatches } from "./lib/replace/batches"
import { extractFields, writeFieldCsv } from "./lib/extract/fields"
import { pullReports } from "./lib/pull/reports"
import { createJsonLogger, createLogger, type AppLogger, type LogMode } from "./lib/logger"
import { plural, status, type StatusKind } from "./lib/format"

export const VERSION = "0.1.0"

export const EXIT_OK = 0
export const EXIT_FAILED = 1
export const EXIT_CANCELLED = 130

/**
 * Where the CLI reads and writes. Tests swap these out.
 */
export interface CliIO {
  out: (text: string) => void
  err: (text: string) => void
  env: NodeJS.ProcessEnv
  color: boolean
  signal?: AbortSignal
  runner?: CommandRunner // for the sf CLI
  now?: () => Date
}

export function processIO(signal?: AbortSignal): CliIO {
  return {
    out: (text) => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`),
    err: (text) => process.stderr.write(text.endsWith("\n") ? text : `${text}\n`),
    env: process.env,
    color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
    signal,
  }
}

type GlobalOptions = {
  org?: string
  verbose?: boolean
}

type ReplaceOptions = {
  oldField: string
  newField: string
  dryRun?: boolean
  batchSize: string
  continueOnError?: boolean
  reportsPath?: string
  schemaPath?: string
  resume?: string
  workDir?: string
  json?: boolean
}

type ExtractOptions = {
  objects: string
  maxFields: string
  specificFields?: string
  outputDir: string
}

type PullOptions = {
  nameContains?: string
  batchSize: string
  outputDir: string
  workDir?: string
}

type RestoreOptions = {
  run?: string
  reportsPath?: string
  workDir?: string
  dryRun?: boolean
  batchSize: string
}

export function exitCodeFor(runStatus: RunStatus): number {
  switch (runStatus) {
    case "completed":
      return EXIT_OK
    case "cancelled":
      return EXIT_CANCELLED
    default:
      return EXIT_FAILED
  }
}

export function createProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const program = new Command()
  const say = (kind: StatusKind, msg: string) => io.err(status(kind, msg, io.color))

  program
    .name("fieldshift")
    .description("Bulk field-reference replacement and metadata tools for Salesforce reports")
    .version(VERSION)
    .option("-o, --org <alias>", `Salesforce org alias (default: $${DEFAULT_ORG_ENV})`)
    .option("-v, --verbose", "Debug logging on stderr")
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err })
    .configureHelp({ helpWidth: 100 })

  const globals = () => program.opts<GlobalOptions>()
  const logMode = (): LogMode => (globals().verbose ? "debug" : "error")

  // Map known failures to exit code 1; anything else is a bug and propagates
  const guarded =
    <A extends unknown[]>(action: (...args: A) => Promise<number>) =>
    async (...args: A): Promise<void> => {
      try {
        setExitCode(await action(...args))
      } catch (err) {
        if (!(err instanceof FieldshiftError)) throw err
        say("error", err.message)
        for (const detail of err.details()) io.err(`  ${detail}`)
        setExitCode(EXIT_FAILED)
      }
    }

  const sfConnector = (config: ResolvedConfig, log: AppLogger): SfCliConnector => {
    if (!config.org.targetOrg) {
      throw new ConfigError(`No org specified. Use --org or set ${DEFAULT_ORG_ENV}.`)
    }
    return new SfCliConnector(config.org, { workDir: config.work.root, runner: io.runner, logger: log })
  }

  program
    .command("replace-fields")
    .description("Replace a field reference in every report that uses it")
    .requiredOption("--old-field <ref>", "Field to replace, e.g. Account.OldField__c")
    .requiredOption("--new-field <ref>", "Replacement field, e.g. Account.NewField__c")
    .option("--dry-run", "Show what would change; take no backups and deploy nothing")
    .option("-b, --batch-size <n>", "Reports per batch", "100")
    .option("--continue-on-error", "Keep going after a failed batch")
    .option("-r, --reports-path <dir>", "Rewrite report files on disk instead of the org")
    .option("--schema-path <dir>", "Object tree used to check the old field with --reports-path")
    .option("--resume <summary>", "Skip batches confirmed by an earlier run summary")
    .option("--work-dir <dir>", "Backups, staging and run summaries", "report-migration")
    .option("--json", "Print the run summary as JSON")
    .action(
      guarded(async (options: ReplaceOptions) => {
        const config = resolveConfig({ org: globals().org, workDir: options.workDir }, io.env)
        const parsed = ReplacementPlan.safeParse({
          oldField: parseFieldReference(options.oldField),
          newField: parseFieldReference(options.newField),
          dryRun: Boolean(options.dryRun),
          batchSize: positiveInt("--batch-size", options.batchSize),
          continueOnError: Boolean(options.continueOnError),
        })
        if (!parsed.success) {
          throw new ConfigError(parsed.error.issues[0]?.message ?? "invalid replacement plan")
        }
        const plan = parsed.data

        const log = options.json ? createJsonLogger("fieldshift", logMode()) : createLogger("fieldshift", logMode())
        const connector: OrgConnector = options.reportsPath
          ? new LocalReportsConnector(options.reportsPath, { schemaDir: options.schemaPath })
          : sfConnector(config, log)
        const resumeFrom = options.resume ? loadRunSummary(options.resume) : undefined

        const now = io.now ?? (() => new Date())
        const startedAt = now()
        const runId = runIdFor(startedAt)
        const backups = new BackupManager({ dir: config.work.backup, runId })
        const report = new ChangeReport({ runId, plan, startedAt })

        const result = await runReplacement({
          connector,
          plan,
          backups,
          report,
          logger: log,
          signal: io.signal,
          resumeFrom,
          now,
        })
        const summaryFile = saveRunSummary(result.summary, config.work.runs)

        if (options.json) {
          io.out(JSON.stringify(result.summary, null, 2))
        } else {
          io.out(report.render({ color: io.color }))
          say("info", `Run summary: ${path.relative(process.cwd(), summaryFile) || summaryFile}`)
          if (!plan.dryRun && result.summary.counts.replaced > 0) {
            say("info", `Backups: ${backups.runDir}`)
          }
        }
        return exitCodeFor(result.status)
      })
    )

  program
    .command("extract-fields")
    .description("Export field metadata to one CSV per object")
    .requiredOption("--objects <names>", "Comma-separated object API names")
    .option("-m, --max-fields <n>", "Fields per object (0 = all)", "0")
    .option("-f, --specific-fields <names>", "Comma-separated field API names")
    .option("-d, --output-dir <dir>", "Where to write the CSV files", ".")
    .action(
      guarded(async (options: ExtractOptions) => {
        const config = resolveConfig({ org: globals().org }, io.env)
        const log = createLogger("fieldshift", logMode())
        const source = sfConnector(config, log)
        const objects = splitList(options.objects)
        if (objects.length === 0) throw new ConfigError("--objects must name at least one object")
        const maxFields = options.maxFields === "0" ? undefined : positiveInt("--max-fields", options.maxFields)
        const fields = options.specificFields ? splitList(options.specificFields) : undefined

        for (const objectName of objects) {
          const rows = await extractFields(source, objectName, { maxFields, fields, logger: log })
          const file = writeFieldCsv(rows, objectName, options.outputDir)
          say("success", `${objectName}: ${plural(rows.length, "field")} → ${file}`)
        }
        return EXIT_OK
      })
    )

  program
    .command("pull-reports")
    .description("Retrieve report definitions into a local directory")
    .option("-n, --name-contains <text>", "Only reports whose name contains this text (case-insensitive)")
    .option("-b, --batch-size <n>", "Reports per retrieve", "100")
    .option("-d, --output-dir <dir>", "Where to write the reports", "force-app/main/default/reports")
    .option("--work-dir <dir>", "Retrieve staging", "report-migration")
    .action(
      guarded(async (options: PullOptions) => {
        const config = resolveConfig({ org: globals().org, workDir: options.workDir }, io.env)
        const log = createLogger("fieldshift", logMode())
        const result = await pullReports(sfConnector(config, log), {
          outputDir: options.outputDir,
          nameContains: options.nameContains,
          batchSize: positiveInt("--batch-size", options.batchSize),
          logger: log,
        })

        if (result.listed === 0) {
          say("warn", "No reports matched")
          return EXIT_OK
        }
        say("success", `${plural(result.written.length, "report")} written to ${options.outputDir}`)
        for (const failure of result.failed) {
          say("error", `${failure.batchId} (${plural(failure.reportIds.length, "report")}): ${failure.error.message}`)
        }
        return result.failed.length > 0 ? EXIT_FAILED : EXIT_OK
      })
    )

  program
    .command("test-connection")
    .description("Check that the org is authorized and answers queries")
    .action(
      guarded(async () => {
        const config = resolveConfig({ org: globals().org }, io.env)
        const connector = sfConnector(config, createLogger("fieldshift", logMode()))
        const info = await connector.checkConnection()
        say("success", `Connected to ${config.org.targetOrg} as ${info.username} (${info.instanceUrl})`)
        return EXIT_OK
      })
    )

  program
    .command("restore-backup")
    .description("Deploy the originals saved by a run, or list runs with backups")
    .option("--run <runId>", "Run whose backups to restore")
    .option("-r, --reports-path <dir>", "Restore report files on disk instead of the org")
    .option("--work-dir <dir>", "Where the backups live", "report-migration")
    .option("--dry-run", "List what would be restored")
    .option("-b, --batch-size <n>", "Reports per deploy", "100")
    .action(
      guarded(async (options: RestoreOptions) => {
        const config = resolveConfig({ org: globals().org, workDir: options.workDir }, io.env)
        if (!options.run) {
          const runs = listRuns(config.work.backup)
          io.out(runs.length > 0 ? runs.join("\n") : "No backups found.")
          return EXIT_OK
        }

        const records = listBackups(config.work.backup, options.run)
        if (records.length === 0 || options.dryRun) {
          for (const record of records) io.out(`${record.fullName}  ${new Date(record.timestamp).toISOString()}`)
          say("info", `${plural(records.length, "backup")} in run ${options.run}`)
          return EXIT_OK
        }

        const log = createLogger("fieldshift", logMode())
        const connector: OrgConnector = options.reportsPath
          ? new LocalReportsConnector(options.reportsPath)
          : sfConnector(config, log)
        const reports = new Map(records.map((record) => [record.reportId, restoreBackup(record)]))
        const batchSize = positiveInt("--batch-size", options.batchSize)

        let failed = 0
        for (const batch of partitionBatches([...reports.values()], batchSize)) {
          const payload = batch.reports.flatMap((r) => {
            const restored = reports.get(r.reportId)
            return restored ? [restored] : []
          })
          try {
            const result = await connector.deploy(payload, { label: `restore-${batch.batchId}` })
            if (result.status !== "Succeeded" || result.componentFailures.length > 0) {
              failed += payload.length
              say("error", `${batch.batchId}: deploy ${result.jobId} ${result.status}`)
              for (const f of result.componentFailures) io.err(`  ${f.fullName}: ${f.problem}`)
              continue
            }
            say("success", `${batch.batchId}: ${plural(payload.length, "report")} restored`)
          } catch (err) {
            if (!(err instanceof FieldshiftError)) throw err
            failed += payload.length
            say("error", `${batch.batchId}: ${describeError(err).message}`)
          }
        }
        return failed > 0 ? EXIT_FAILED : EXIT_OK
      })
    )

  return program
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

/**
 * Run the CLI and return its exit code. Never calls process.exit.
 */
export async function main(argv: string[] = process.argv.slice(2), io: CliIO = processIO()): Promise<number> {
  let exitCode = EXIT_OK
  const program = createProgram(io, (code) => {
    exitCode = code
  })

  if (argv.length === 0) {
    program.outputHelp()
    return EXIT_OK
  }

  try {
    await program.parseAsync(argv, { from: "user" })
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }
  return exitCode
}
