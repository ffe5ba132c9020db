import path from "path"
import { z } from "zod"
import { ConfigError } from "./core/errors"
import type { OrgContext } from "./connector"

export const DEFAULT_ORG_ENV = "FIELDSHIFT_DEFAULT_ORG"
export const DEFAULT_WORK_DIR = "report-migration"

const Env = z.object({
  [DEFAULT_ORG_ENV]: z.string().trim().min(1).optional().catch(undefined),
})

export interface WorkLayout {
  root: string
  retrieve: string // manifests and retrieve staging
  deploy: string // deploy payloads
  backup: string // <runId>/<report>.json
  runs: string // <runId>.json summaries
}

export interface ResolvedConfig {
  org: OrgContext
  work: WorkLayout
}

export function workLayout(root: string): WorkLayout {
  const abs = path.resolve(root)
  return {
    root: abs,
    retrieve: path.join(abs, "retrieve"),
    deploy: path.join(abs, "deploy"),
    backup: path.join(abs, "backup"),
    runs: path.join(abs, "runs"),
  }
}

/**
 * Combine flags with the environment. The only place the environment is read;
 * everything below receives the result.
 */
export function resolveConfig(
  flags: { org?: string; workDir?: string },
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const targetOrg = flags.org?.trim() || Env.parse(env)[DEFAULT_ORG_ENV]
  if (flags.workDir !== undefined && flags.workDir.trim() === "") {
    throw new ConfigError("--work-dir must not be empty")
  }
  return {
    org: targetOrg ? { targetOrg } : {},
    work: workLayout(flags.workDir ?? DEFAULT_WORK_DIR),
  }
}

/**
 * Parse a positive integer option such as --batch-size
 */
export function positiveInt(name: string, value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`)
  }
  return n
}
