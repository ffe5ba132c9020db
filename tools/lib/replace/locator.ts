import type { FieldReference, ReportDescriptor } from "../core/types"
import type { OrgConnector } from "../connector"
import { NotFoundError } from "../core/errors"
import { qualifiedName } from "../core/field-ref"

/**
 * Find the reports that may reference `field`, ordered by report id.
 *
 * The field, and the replacement `target` when given, are checked against the
 * org schema first, before anything else happens. Connectors that can search report bodies narrow the set; otherwise
 * every report is a candidate and the rewriter reports zero matches for the
 * ones that do not use the field.
 */
export async function locateReports(
  connector: OrgConnector,
  field: FieldReference,
  options: { target?: FieldReference } = {}
): Promise<ReportDescriptor[]> {
  await requireField(connector, field)
  if (options.target) await requireField(connector, options.target)

  const found = connector.searchReports ? await connector.searchReports(field) : await connector.listReports()

  const byId = new Map<string, ReportDescriptor>()
  for (const report of found) {
    if (byId.has(report.reportId)) continue
    // Identifiers only: content is fetched per batch
    byId.set(report.reportId, {
      reportId: report.reportId,
      fullName: report.fullName,
      storagePath: report.storagePath,
    })
  }

  return [...byId.values()].sort((a, b) => compareIds(a.reportId, b.reportId))
}

// Code-unit order, independent of locale
function compareIds(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export async function requireField(connector: OrgConnector, field: FieldReference): Promise<void> {
  if (!(await connector.fieldExists(field))) {
    throw new NotFoundError(`Field ${qualifiedName(field)} does not exist in the org schema`)
  }
}
