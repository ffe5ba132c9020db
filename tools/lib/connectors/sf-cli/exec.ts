import { execFile } from "child_process"
import { z } from "zod"
import { AuthError, ConnectorError, RateLimitError, TransientError, type FieldshiftError } from "../../core/errors"

export interface CommandOutput {
  stdout: string
  stderr: string
  exitCode: number
}

export interface CommandOptions {
  timeoutMs: number
  cwd?: string
}

/**
 * Runs an external command. Injected so tests never spawn `sf`.
 */
export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandOutput>

const MAX_BUFFER = 64 * 1024 * 1024

export interface ExecFailure {
  killed?: boolean
  signal?: string | null
  code?: string | number | null
}

/**
 * Classify an execFile failure. Undefined means the command ran and exited
 * non-zero, which sf does with its JSON envelope on stdout.
 */
export function execFailure(
  command: string,
  args: readonly string[],
  error: ExecFailure,
  timeoutMs: number
): FieldshiftError | undefined {
  const label = `${command} ${args.slice(0, 3).join(" ")}`
  // execFile sets `killed` only when it sent the kill itself, i.e. on timeout
  if (error.killed) {
    return new TransientError(`${label} timed out after ${timeoutMs}ms`, { cause: error })
  }
  if (error.signal) {
    return new ConnectorError(`${label} was terminated by ${error.signal}`, { cause: error })
  }
  if (error.code === "ENOENT") {
    return new ConnectorError(`${command} not found on PATH. Install the Salesforce CLI and run 'sf org login web'.`, {
      cause: error,
    })
  }
  return undefined
}

export const execRunner: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { cwd: options.cwd, timeout: options.timeoutMs, maxBuffer: MAX_BUFFER, encoding: "utf-8" },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 })
          return
        }
        const failure = execFailure(command, args, error, options.timeoutMs)
        if (failure) {
          reject(failure)
          return
        }
        resolve({ stdout, stderr, exitCode: typeof error.code === "number" ? error.code : 1 })
      }
    )
  })

const SfEnvelope = z.object({
  status: z.number(),
  result: z.unknown().optional(),
  name: z.string().optional(),
  message: z.string().optional(),
})

const AUTH_ERRORS = [
  /NoOrgFound/i,
  /NamedOrgNotFound/i,
  /NoAuthInfoFound/i,
  /NoDefaultEnvError/i,
  /RefreshTokenAuthError/i,
  /INVALID_SESSION_ID/,
  /expired access\/refresh token/i,
]
const RATE_LIMIT_ERRORS = [/REQUEST_LIMIT_EXCEEDED/, /ConcurrentRequestLimit/i]
const TRANSIENT_ERRORS = [/ECONNRESET/, /ETIMEDOUT/, /ENOTFOUND/, /socket hang up/i, /GenericTimeout/i, /SERVER_UNAVAILABLE/]

/**
 * Map an sf error name and message onto the error taxonomy
 */
export function mapSfError(name: string, message: string): FieldshiftError {
  const text = `${name}: ${message}`
  if (AUTH_ERRORS.some((re) => re.test(text))) return new AuthError(text)
  if (RATE_LIMIT_ERRORS.some((re) => re.test(text))) return new RateLimitError(text)
  if (TRANSIENT_ERRORS.some((re) => re.test(text))) return new TransientError(text)
  return new ConnectorError(text)
}

export interface SfCallOptions {
  timeoutMs: number
  cwd?: string
  /** Accept a non-zero status when the envelope still carries a result (failed deploys do) */
  acceptFailedResult?: boolean
}

/**
 * Run `sf <args> --json` and validate the envelope's result against `schema`
 */
export async function runSf<T>(
  runner: CommandRunner,
  args: string[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: SfCallOptions
): Promise<T> {
  const output = await runner("sf", [...args, "--json"], { timeoutMs: options.timeoutMs, cwd: options.cwd })
  const command = `sf ${args.slice(0, 3).join(" ")}`

  let raw: unknown
  try {
    raw = JSON.parse(output.stdout)
  } catch (error) {
    const stderr = output.stderr.trim()
    throw new ConnectorError(`${command} returned invalid JSON${stderr ? `: ${stderr}` : ""}`, { cause: error })
  }

  const envelope = SfEnvelope.safeParse(raw)
  if (!envelope.success) {
    throw new ConnectorError(`${command} returned an unexpected response`, { cause: envelope.error })
  }

  const { status, result, name, message } = envelope.data
  if (status !== 0) {
    const failed = options.acceptFailedResult && result !== undefined ? schema.safeParse(result) : undefined
    if (failed?.success) return failed.data
    throw mapSfError(name ?? "UnknownError", message ?? `${command} failed with status ${status}`)
  }

  const parsed = schema.safeParse(result)
  if (!parsed.success) {
    throw new ConnectorError(`${command} result did not match the expected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`)
  }
  return parsed.data
}
