/**
 * rewriter.ts - Token-exact field reference substitution inside report markup
 *
 * Only character data of structural elements is searched. Free-text elements
 * (report name, description, ...) are left alone even when they mention the
 * field. The output is the input with the matched tokens spliced out, nothing
 * else: no reformatting, no re-serialization.
 */

import type { FieldReference, LineChange, ReplacementPlan } from "../core/types"
import { qualifiedName } from "../core/field-ref"
import { scanMarkup } from "./markup"

export interface RewriteResult {
  content: string
  referencesFound: number
  referencesReplaced: number
}

const FREE_TEXT_ELEMENTS = new Set(["name", "description", "title", "masterLabel", "label"])

// A token continues through identifier chars; a leading "." or "$" means it is
// the tail of a longer path (Contact.Account.Field__c)
const CONTINUES_BEFORE = /[A-Za-z0-9_$.]/
const CONTINUES_AFTER = /[A-Za-z0-9_]/

/**
 * Offsets of every token-exact reference to `field` in structural positions
 */
export function locateReferences(rawDefinition: string, field: FieldReference): number[] {
  const token = qualifiedName(field)
  const offsets: number[] = []

  for (const segment of scanMarkup(rawDefinition)) {
    if (segment.kind !== "text") continue
    if (segment.element !== null && FREE_TEXT_ELEMENTS.has(segment.element)) continue

    let from = segment.start
    while (from < segment.end) {
      const at = rawDefinition.indexOf(token, from)
      if (at === -1 || at + token.length > segment.end) break
      const before = at > 0 ? rawDefinition[at - 1] : undefined
      const after = rawDefinition[at + token.length]
      const bounded =
        (before === undefined || !CONTINUES_BEFORE.test(before)) &&
        (after === undefined || !CONTINUES_AFTER.test(after))
      if (bounded) offsets.push(at)
      from = at + token.length
    }
  }

  return offsets
}

/**
 * Count references without rewriting
 */
export function findReferences(rawDefinition: string, field: FieldReference): number {
  return locateReferences(rawDefinition, field).length
}

/**
 * Replace every reference to plan.oldField with plan.newField.
 *
 * Throws MalformedReportError when the markup cannot be scanned. Zero matches
 * returns the input unchanged.
 */
export function rewriteReferences(
  rawDefinition: string,
  plan: Pick<ReplacementPlan, "oldField" | "newField">
): RewriteResult {
  const offsets = locateReferences(rawDefinition, plan.oldField)
  if (offsets.length === 0) {
    return { content: rawDefinition, referencesFound: 0, referencesReplaced: 0 }
  }

  const oldToken = qualifiedName(plan.oldField)
  const newToken = qualifiedName(plan.newField)
  const parts: string[] = []
  let cursor = 0
  for (const offset of offsets) {
    parts.push(rawDefinition.slice(cursor, offset), newToken)
    cursor = offset + oldToken.length
  }
  parts.push(rawDefinition.slice(cursor))

  return {
    content: parts.join(""),
    referencesFound: offsets.length,
    referencesReplaced: offsets.length,
  }
}

/**
 * Lines that differ between two versions of a definition
 */
export function describeChanges(before: string, after: string): LineChange[] {
  const oldLines = before.split("\n")
  const newLines = after.split("\n")
  const changes: LineChange[] = []
  const count = Math.max(oldLines.length, newLines.length)

  for (let i = 0; i < count; i++) {
    const a = oldLines[i] ?? ""
    const b = newLines[i] ?? ""
    if (a !== b) {
      changes.push({ line: i + 1, before: a.trim(), after: b.trim() })
    }
  }
  return changes
}
