import { describe, test, expect } from "vitest"
import { parseFieldReference, qualifiedName, sameField } from "../../tools/lib/core/field-ref"
import { ConfigError } from "../../tools/lib/core/errors"
import { ReplacementPlan } from "../../tools/lib/core/types"

describe("parseFieldReference", () => {
  test("splits object and field", () => {
    expect(parseFieldReference(" Account.Region__c ")).toEqual({ objectName: "Account", fieldName: "Region__c" })
  })

  test("rejects anything but Object.Field", () => {
    for (const input of ["Account", ".Region__c", "Account.", "Contact.Account.Name"]) {
      expect(() => parseFieldReference(input)).toThrow(ConfigError)
    }
  })

  test("rejects names that are not API names", () => {
    expect(() => parseFieldReference("Account.Region Name")).toThrow(
      'Invalid field reference "Account.Region Name": field name must be an API name'
    )
    expect(() => parseFieldReference("1Account.Name")).toThrow("object name must be an API name")
  })
})

describe("qualifiedName", () => {
  test("joins with a dot", () => {
    expect(qualifiedName({ objectName: "Opportunity", fieldName: "Amount" })).toBe("Opportunity.Amount")
  })
})

describe("sameField", () => {
  test("compares case-sensitively", () => {
    const a = parseFieldReference("Account.Region__c")
    expect(sameField(a, parseFieldReference("Account.Region__c"))).toBe(true)
    expect(sameField(a, parseFieldReference("Account.region__c"))).toBe(false)
  })
})

describe("ReplacementPlan", () => {
  const base = {
    oldField: { objectName: "Account", fieldName: "Old__c" },
    newField: { objectName: "Account", fieldName: "New__c" },
    batchSize: 10,
  }

  test("defaults dryRun and continueOnError to false", () => {
    expect(ReplacementPlan.parse(base)).toMatchObject({ dryRun: false, continueOnError: false })
  })

  test("requires a positive batch size", () => {
    expect(ReplacementPlan.safeParse({ ...base, batchSize: 0 }).success).toBe(false)
    expect(ReplacementPlan.safeParse({ ...base, batchSize: 2.5 }).success).toBe(false)
  })

  test("allows the same field name on another object", () => {
    const plan = ReplacementPlan.safeParse({ ...base, newField: { objectName: "Contact", fieldName: "Old__c" } })
    expect(plan.success).toBe(true)
  })
})
