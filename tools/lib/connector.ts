import type { FieldReference, ReportDescriptor, RetrievedReport } from "./core/types"

/**
 * Explicit run context handed to a connector. Nothing below the CLI reads the
 * environment; the default org arrives here.
 */
export interface OrgContext {
  targetOrg?: string
}

export type DeployStatus = "Succeeded" | "SucceededPartial" | "Failed" | "Canceled"

export interface DeployResult {
  jobId: string
  status: DeployStatus
  componentFailures: Array<{ fullName: string; problem: string }>
}

export interface ReportFilter {
  nameContains?: string
}

export interface DeployOptions {
  label?: string // used to name manifests and staging directories ("batch-2")
}

/**
 * Connector interface for everything the engine needs from an org.
 * Each connector (sf CLI, local directory, in-memory) implements this.
 *
 * Errors are the taxonomy in core/errors: AuthError, NotFoundError,
 * RateLimitError, TransientError, DeployValidationError, ConnectorError.
 */
export interface OrgConnector {
  name: string

  // Schema
  fieldExists(field: FieldReference): Promise<boolean>

  // Discovery
  listReports(filter?: ReportFilter): Promise<ReportDescriptor[]>
  searchReports?(field: FieldReference): Promise<ReportDescriptor[]> // only when report bodies are searchable

  // Content
  retrieve(reports: readonly ReportDescriptor[], options?: DeployOptions): Promise<RetrievedReport[]>
  deploy(reports: readonly RetrievedReport[], options?: DeployOptions): Promise<DeployResult>
}

export interface FieldDescription {
  objectName: string
  fullName: string
  namespacePrefix: string | null
  developerName: string
  label: string
  dataType: string
  description: string | null
  formula: string | null
}

/**
 * Read-only field metadata, used by extract-fields
 */
export interface FieldMetadataSource {
  listFields(objectName: string): Promise<string[]>
  describeField(objectName: string, fieldName: string): Promise<FieldDescription | null>
}
