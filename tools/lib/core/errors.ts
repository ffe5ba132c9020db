export type FieldshiftErrorCode =
  | "AUTH"
  | "NOT_FOUND"
  | "RATE_LIMIT"
  | "TRANSIENT"
  | "DEPLOY_VALIDATION"
  | "MALFORMED_REPORT"
  | "CONNECTOR"
  | "CONFIG"
  | "ILLEGAL_TRANSITION"

export class FieldshiftError extends Error {
  readonly code: FieldshiftErrorCode

  constructor(code: FieldshiftErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.code = code
    this.name = "FieldshiftError"
  }

  /** Extra lines shown under the message in reports */
  details(): string[] {
    return []
  }
}

/** Not authenticated, or the org alias is unknown. Aborts the run. */
export class AuthError extends FieldshiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AUTH", message, options)
    this.name = "AuthError"
  }
}

export class NotFoundError extends FieldshiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NOT_FOUND", message, options)
    this.name = "NotFoundError"
  }
}

export class RateLimitError extends FieldshiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RATE_LIMIT", message, options)
    this.name = "RateLimitError"
  }
}

/** Timeouts, dropped connections, polls that never reached a terminal state */
export class TransientError extends FieldshiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSIENT", message, options)
    this.name = "TransientError"
  }
}

export interface ComponentFailure {
  fullName: string
  problem: string
}

export class DeployValidationError extends FieldshiftError {
  readonly failures: ComponentFailure[]

  constructor(message: string, failures: ComponentFailure[] = [], options?: { cause?: unknown }) {
    super("DEPLOY_VALIDATION", message, options)
    this.name = "DeployValidationError"
    this.failures = failures
  }

  override details(): string[] {
    return this.failures.map((f) => `${f.fullName}: ${f.problem}`)
  }
}

/** Per-report: the definition could not be scanned. Excludes the report, not the batch. */
export class MalformedReportError extends FieldshiftError {
  readonly reason: string
  readonly offset: number
  readonly reportId: string | undefined

  constructor(reason: string, offset: number, reportId?: string) {
    super("MALFORMED_REPORT", reportId ? `${reportId}: ${reason} (offset ${offset})` : `${reason} (offset ${offset})`)
    this.name = "MalformedReportError"
    this.reason = reason
    this.offset = offset
    this.reportId = reportId
  }

  forReport(reportId: string): MalformedReportError {
    return new MalformedReportError(this.reason, this.offset, reportId)
  }
}

export class ConnectorError extends FieldshiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONNECTOR", message, options)
    this.name = "ConnectorError"
  }
}

export class ConfigError extends FieldshiftError {
  constructor(message: string) {
    super("CONFIG", message)
    this.name = "ConfigError"
  }
}

export class IllegalTransitionError extends FieldshiftError {
  constructor(batchId: string, from: string, to: string) {
    super("ILLEGAL_TRANSITION", `${batchId}: cannot move from ${from} to ${to}`)
    this.name = "IllegalTransitionError"
  }
}

/**
 * Errors worth retrying at batch level
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof RateLimitError || error instanceof TransientError
}

/**
 * Normalize anything thrown into code/message/details for summaries
 */
export function describeError(error: unknown): { code: string; message: string; details: string[] } {
  if (error instanceof FieldshiftError) {
    return { code: error.code, message: error.message, details: error.details() }
  }
  if (error instanceof Error) {
    return { code: "UNEXPECTED", message: error.message, details: [] }
  }
  return { code: "UNEXPECTED", message: String(error), details: [] }
}
