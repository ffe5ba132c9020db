import { FieldReference } from "./types"
import { ConfigError } from "./errors"

/**
 * Parse "Object.Field" into a FieldReference
 */
export function parseFieldReference(input: string): FieldReference {
  const trimmed = input.trim()
  const dot = trimmed.indexOf(".")
  if (dot <= 0 || dot !== trimmed.lastIndexOf(".")) {
    throw new ConfigError(`Expected a field reference like Account.Field__c, got "${input}"`)
  }
  const parsed = FieldReference.safeParse({
    objectName: trimmed.slice(0, dot),
    fieldName: trimmed.slice(dot + 1),
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ConfigError(`Invalid field reference "${input}": ${issue?.message ?? "unknown problem"}`)
  }
  return parsed.data
}

export function qualifiedName(field: FieldReference): string {
  return `${field.objectName}.${field.fieldName}`
}

export function sameField(a: FieldReference, b: FieldReference): boolean {
  return a.objectName === b.objectName && a.fieldName === b.fieldName
}
