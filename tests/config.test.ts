import { describe, test, expect } from "vitest"
import * as path from "path"
import { positiveInt, resolveConfig } from "../tools/lib/config"
import { ConfigError } from "../tools/lib/core/errors"

describe("resolveConfig", () => {
  test("--org wins over the environment", () => {
    expect(resolveConfig({ org: "prod" }, { FIELDSHIFT_DEFAULT_ORG: "dev" }).org).toEqual({ targetOrg: "prod" })
  })

  test("falls back to FIELDSHIFT_DEFAULT_ORG", () => {
    expect(resolveConfig({}, { FIELDSHIFT_DEFAULT_ORG: " dev " }).org).toEqual({ targetOrg: "dev" })
  })

  test("no org at all leaves the context empty", () => {
    expect(resolveConfig({}, { FIELDSHIFT_DEFAULT_ORG: "" }).org).toEqual({})
  })

  test("lays out the work directory", () => {
    const root = path.resolve("report-migration")
    expect(resolveConfig({}, {}).work).toEqual({
      root,
      retrieve: path.join(root, "retrieve"),
      deploy: path.join(root, "deploy"),
      backup: path.join(root, "backup"),
      runs: path.join(root, "runs"),
    })
  })

  test("rejects an empty work directory", () => {
    expect(() => resolveConfig({ workDir: " " }, {})).toThrow(ConfigError)
  })
})

describe("positiveInt", () => {
  test("parses positive integers only", () => {
    expect(positiveInt("--batch-size", "25")).toBe(25)
    expect(() => positiveInt("--batch-size", "-1")).toThrow('--batch-size must be a positive integer, got "-1"')
    expect(() => positiveInt("--batch-size", "abc")).toThrow(ConfigError)
  })
})
