import { describe, test, expect } from "vitest"
import { z } from "zod"
import { execFailure, mapSfError, runSf } from "../../tools/lib/connectors/sf-cli/exec"
import { buildPackageXml, reportFullName, soqlString } from "../../tools/lib/connectors/sf-cli/manifest"
import { AuthError, ConnectorError, RateLimitError, TransientError } from "../../tools/lib/core/errors"
import { fakeSf, fail, ok } from "../helpers/fake-sf"

const Display = z.object({ username: z.string() })

describe("mapSfError", () => {
  test("maps auth problems", () => {
    expect(mapSfError("NamedOrgNotFound", "No authorization information found for dev")).toBeInstanceOf(AuthError)
    expect(mapSfError("Error", "INVALID_SESSION_ID: Session expired or invalid")).toBeInstanceOf(AuthError)
  })

  test("maps rate limits and transient failures", () => {
    expect(mapSfError("Error", "REQUEST_LIMIT_EXCEEDED: TotalRequests Limit exceeded.")).toBeInstanceOf(RateLimitError)
    expect(mapSfError("Error", "socket hang up")).toBeInstanceOf(TransientError)
  })

  test("anything else is a connector error carrying name and message", () => {
    const error = mapSfError("DeployFailed", "boom")
    expect(error).toBeInstanceOf(ConnectorError)
    expect(error.message).toBe("DeployFailed: boom")
  })
})

describe("runSf", () => {
  test("appends --json and returns the validated result", async () => {
    const sf = fakeSf(() => ok({ username: "test@example.com", extra: 1 }))
    const result = await runSf(sf.runner, ["org", "display"], Display, { timeoutMs: 1000 })
    expect(result).toEqual({ username: "test@example.com" })
    expect(sf.calls[0]!.args).toEqual(["org", "display", "--json"])
    expect(sf.calls[0]!.options).toEqual({ timeoutMs: 1000, cwd: undefined })
  })

  test("invalid JSON is a connector error with stderr attached", async () => {
    const sf = fakeSf(() => ({ stdout: "Warning: update available", stderr: "oops\n", exitCode: 1 }))
    await expect(runSf(sf.runner, ["org", "display"], Display, { timeoutMs: 1000 })).rejects.toThrow(
      "sf org display returned invalid JSON: oops"
    )
  })

  test("a failed envelope maps to the error taxonomy", async () => {
    const sf = fakeSf(() => fail("NamedOrgNotFound", "No authorization information found for dev."))
    await expect(runSf(sf.runner, ["org", "display"], Display, { timeoutMs: 1000 })).rejects.toBeInstanceOf(AuthError)
  })

  test("a failed envelope with a usable result is accepted when asked", async () => {
    const sf = fakeSf(() => fail("DeployFailed", "Deploy failed.", { username: "test@example.com" }))
    const result = await runSf(sf.runner, ["org", "display"], Display, { timeoutMs: 1000, acceptFailedResult: true })
    expect(result).toEqual({ username: "test@example.com" })
  })

  test("a result of the wrong shape is a connector error", async () => {
    const sf = fakeSf(() => ok({ user: "x" }))
    await expect(runSf(sf.runner, ["org", "display"], Display, { timeoutMs: 1000 })).rejects.toBeInstanceOf(ConnectorError)
  })
})

describe("manifest", () => {
  test("lists escaped members of one type", () => {
    expect(buildPackageXml(["Sales/Won & Lost"])).toBe(
      [
        `<?xml version="1.0" encoding="UTF-8"?>`,
        `<Package xmlns="http://soap.sforce.com/2006/04/metadata">`,
        `    <types>`,
        `        <members>Sales/Won &amp; Lost</members>`,
        `        <name>Report</name>`,
        `    </types>`,
        `    <version>65.0</version>`,
        `</Package>`,
        ``,
      ].join("\n")
    )
  })

  test("names reports by folder developer name", () => {
    const folders = new Map([["Sales Reports", "Sales_Reports_2"]])
    expect(reportFullName({ DeveloperName: "Pipeline", FolderName: "Sales Reports" }, folders)).toBe("Sales_Reports_2/Pipeline")
    expect(reportFullName({ DeveloperName: "Won", FolderName: "Old Folder" }, folders)).toBe("Old_Folder/Won")
    expect(reportFullName({ DeveloperName: "Cases", FolderName: null }, folders)).toBe("unfiled$public/Cases")
    expect(reportFullName({ DeveloperName: "Cases", FolderName: "Public Reports" }, folders)).toBe("unfiled$public/Cases")
  })

  test("quotes SOQL strings", () => {
    expect(soqlString("O'Brien")).toBe("'O\\'Brien'")
    expect(soqlString("a\\b")).toBe("'a\\\\b'")
  })
})

describe("execFailure", () => {
  const args = ["project", "deploy", "start", "--async"]

  test("a kill sent by the timeout is transient", () => {
    const error = execFailure("sf", args, { killed: true, signal: "SIGTERM" }, 600000)
    expect(error).toBeInstanceOf(TransientError)
    expect(error?.message).toBe("sf project deploy start timed out after 600000ms")
  })

  test("a signal from outside is reported as such and not retried", () => {
    const error = execFailure("sf", args, { killed: false, signal: "SIGINT" }, 600000)
    expect(error).toBeInstanceOf(ConnectorError)
    expect(error?.message).toBe("sf project deploy start was terminated by SIGINT")
  })

  test("a missing binary is a connector error", () => {
    expect(execFailure("sf", args, { code: "ENOENT" }, 1000)?.message).toBe(
      "sf not found on PATH. Install the Salesforce CLI and run 'sf org login web'."
    )
  })

  test("a plain non-zero exit is left to the envelope", () => {
    expect(execFailure("sf", args, { code: 1, killed: false, signal: null }, 1000)).toBeUndefined()
  })
})
