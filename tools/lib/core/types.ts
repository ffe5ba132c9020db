import { z } from "zod"

// API name: letter first, then letters, digits, underscores (custom suffixes like __c included)
export const API_NAME = /^[A-Za-z][A-Za-z0-9_]*$/

// A field on an object, e.g. Account.OldField__c
export const FieldReference = z
  .object({
    objectName: z.string().regex(API_NAME, "object name must be an API name"),
    fieldName: z.string().regex(API_NAME, "field name must be an API name"),
  })
  .readonly()
export type FieldReference = z.infer<typeof FieldReference>

// One remote report. rawDefinition is absent until retrieved.
export const ReportDescriptor = z.object({
  reportId: z.string().min(1),
  fullName: z.string().min(1), // "Folder_Dev_Name/Report_Dev_Name"
  storagePath: z.string().min(1), // where the definition lives relative to its root
  rawDefinition: z.string().optional(),
})
export type ReportDescriptor = z.infer<typeof ReportDescriptor>

export const RetrievedReport = ReportDescriptor.extend({
  rawDefinition: z.string(),
})
export type RetrievedReport = z.infer<typeof RetrievedReport>

export const ReplacementPlan = z
  .object({
    oldField: FieldReference,
    newField: FieldReference,
    dryRun: z.boolean().default(false),
    batchSize: z.number().int().positive(),
    continueOnError: z.boolean().default(false),
  })
  .refine(
    (plan) =>
      plan.oldField.objectName !== plan.newField.objectName ||
      plan.oldField.fieldName !== plan.newField.fieldName,
    { message: "old and new field must differ", path: ["newField"] }
  )
  .readonly()
export type ReplacementPlan = z.infer<typeof ReplacementPlan>
export type ReplacementPlanInput = z.input<typeof ReplacementPlan>

// Write-once snapshot of a report taken before it is deployed
export const BackupRecord = z.object({
  runId: z.string().min(1),
  reportId: z.string().min(1),
  fullName: z.string().min(1),
  storagePath: z.string().min(1),
  originalContent: z.string(),
  timestamp: z.number().int().nonnegative(), // epoch ms from the run's monotonic clock
})
export type BackupRecord = z.infer<typeof BackupRecord>

export const BatchStatus = z.enum([
  "PENDING",
  "RETRIEVED",
  "REWRITTEN",
  "DRY_RUN_REPORTED",
  "BACKED_UP",
  "DEPLOYED",
  "CONFIRMED",
  "FAILED",
])
export type BatchStatus = z.infer<typeof BatchStatus>

export const BatchError = z.object({
  code: z.string(),
  message: z.string(),
  details: z.array(z.string()).default([]),
})
export type BatchError = z.infer<typeof BatchError>

export const BatchJob = z.object({
  batchId: z.string(), // "batch-3"
  index: z.number().int().nonnegative(),
  reports: z.array(ReportDescriptor),
  status: BatchStatus,
  attempts: z.number().int().nonnegative(),
  transitions: z.array(BatchStatus), // every state entered, in order, starting with PENDING
  error: BatchError.optional(),
  deployedAt: z.number().optional(),
  resumed: z.boolean().optional(), // confirmed by an earlier run and skipped in this one
})
export type BatchJob = z.infer<typeof BatchJob>

export const ChangeOutcome = z.enum(["replaced", "unchanged", "would-replace", "skipped", "failed"])
export type ChangeOutcome = z.infer<typeof ChangeOutcome>

export const ChangeEntry = z
  .object({
    reportId: z.string(),
    fullName: z.string(),
    batchId: z.string(),
    referencesFound: z.number().int().nonnegative(),
    referencesReplaced: z.number().int().nonnegative(),
    outcome: ChangeOutcome,
    detail: z.string().optional(),
  })
  .refine((entry) => entry.referencesReplaced <= entry.referencesFound, {
    message: "referencesReplaced cannot exceed referencesFound",
    path: ["referencesReplaced"],
  })
export type ChangeEntry = z.infer<typeof ChangeEntry>

// A changed line in a dry-run preview
export const LineChange = z.object({
  line: z.number().int().positive(), // 1-indexed
  before: z.string(),
  after: z.string(),
})
export type LineChange = z.infer<typeof LineChange>

export const IntendedChange = z.object({
  reportId: z.string(),
  fullName: z.string(),
  referencesFound: z.number().int().nonnegative(),
  lines: z.array(LineChange),
})
export type IntendedChange = z.infer<typeof IntendedChange>

export const RunCounts = z.object({
  scanned: z.number().int().nonnegative(),
  matched: z.number().int().nonnegative(),
  replaced: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
})
export type RunCounts = z.infer<typeof RunCounts>

export const RunStatus = z.enum(["completed", "failed", "aborted", "cancelled"])
export type RunStatus = z.infer<typeof RunStatus>

export const BatchSummary = z.object({
  batchId: z.string(),
  status: BatchStatus,
  reportIds: z.array(z.string()),
  attempts: z.number().int().nonnegative(),
  error: BatchError.optional(),
  resumed: z.boolean().optional(),
})
export type BatchSummary = z.infer<typeof BatchSummary>

// Persisted outcome of one run; a rerun can skip the batches it confirmed
export const RunSummary = z.object({
  runId: z.string(),
  status: RunStatus,
  dryRun: z.boolean(),
  oldField: z.string(),
  newField: z.string(),
  batchSize: z.number().int().positive(),
  startedAt: z.string(),
  finishedAt: z.string(),
  batches: z.array(BatchSummary),
  entries: z.array(ChangeEntry),
  intendedChanges: z.array(IntendedChange),
  counts: RunCounts,
  confirmedBatches: z.array(z.string()),
  failedBatches: z.array(z.string()),
  notAttemptedBatches: z.array(z.string()),
  error: BatchError.optional(),
})
export type RunSummary = z.infer<typeof RunSummary>

// Field metadata row for CSV export
export const FieldMetadataRow = z.object({
  object: z.string(),
  fullName: z.string(),
  namespace: z.string(),
  developerName: z.string(),
  label: z.string(),
  type: z.string(),
  description: z.string(),
  formula: z.string(),
})
export type FieldMetadataRow = z.infer<typeof FieldMetadataRow>
