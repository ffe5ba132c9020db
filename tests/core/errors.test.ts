import { describe, test, expect } from "vitest"
import {
  AuthError,
  ConnectorError,
  DeployValidationError,
  MalformedReportError,
  RateLimitError,
  TransientError,
  describeError,
  isRetryable,
} from "../../tools/lib/core/errors"

describe("isRetryable", () => {
  test("only rate limits and transient failures", () => {
    expect(isRetryable(new RateLimitError("slow down"))).toBe(true)
    expect(isRetryable(new TransientError("timeout"))).toBe(true)
    expect(isRetryable(new AuthError("expired"))).toBe(false)
    expect(isRetryable(new ConnectorError("bad"))).toBe(false)
    expect(isRetryable(new Error("bug"))).toBe(false)
  })
})

describe("describeError", () => {
  test("carries deploy component failures as details", () => {
    const error = new DeployValidationError("Deploy 0Af finished with status Failed", [
      { fullName: "Sales/Pipeline", problem: "Invalid field" },
    ])
    expect(describeError(error)).toEqual({
      code: "DEPLOY_VALIDATION",
      message: "Deploy 0Af finished with status Failed",
      details: ["Sales/Pipeline: Invalid field"],
    })
  })

  test("marks anything outside the taxonomy as unexpected", () => {
    expect(describeError(new TypeError("x is undefined"))).toEqual({
      code: "UNEXPECTED",
      message: "x is undefined",
      details: [],
    })
    expect(describeError("plain")).toEqual({ code: "UNEXPECTED", message: "plain", details: [] })
  })
})

describe("MalformedReportError", () => {
  test("names the report once attached", () => {
    const error = new MalformedReportError("<a> closed by </b>", 11)
    expect(error.message).toBe("<a> closed by </b> (offset 11)")
    const attached = error.forReport("Sales/Pipeline")
    expect(attached.message).toBe("Sales/Pipeline: <a> closed by </b> (offset 11)")
    expect(attached.reason).toBe("<a> closed by </b>")
  })
})
