export const API_VERSION = "65.0"

export const UNFILED_FOLDER = "unfiled$public"
const PUBLIC_FOLDER_LABEL = "Public Reports"

function escapeXml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;")
}

/**
 * package.xml listing `members` of one metadata type
 */
export function buildPackageXml(members: readonly string[], type = "Report"): string {
  const lines = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<Package xmlns="http://soap.sforce.com/2006/04/metadata">`,
    `    <types>`,
    ...members.map((m) => `        <members>${escapeXml(m)}</members>`),
    `        <name>${type}</name>`,
    `    </types>`,
    `    <version>${API_VERSION}</version>`,
    `</Package>`,
  ]
  return lines.join("\n") + "\n"
}

export interface ReportRow {
  DeveloperName: string
  FolderName: string | null
}

/**
 * Metadata API name for a report: `<folder developer name>/<report developer name>`.
 * `folders` maps folder labels to developer names.
 */
export function reportFullName(report: ReportRow, folders: ReadonlyMap<string, string>): string {
  const label = report.FolderName
  if (!label || label === PUBLIC_FOLDER_LABEL) {
    return `${UNFILED_FOLDER}/${report.DeveloperName}`
  }
  const folder = folders.get(label) ?? label.replace(/ /g, "_")
  return `${folder}/${report.DeveloperName}`
}

/** Quote a value for a SOQL string literal */
export function soqlString(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`
}
