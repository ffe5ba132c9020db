import fs from "fs"
import path from "path"
import type { FieldMetadataRow } from "../core/types"
import type { FieldDescription, FieldMetadataSource } from "../connector"
import { silentLogger, type AppLogger } from "../logger"

export const CSV_HEADER = ["Object", "Full Name", "Namespace", "DeveloperName", "Label", "Type", "Description", "Formula"]

export interface ExtractOptions {
  maxFields?: number // applies to listed fields, not to an explicit `fields` list
  fields?: string[] // only these, in this order
  logger?: AppLogger
}

/**
 * Describe the fields of one object. Fields without metadata are skipped.
 */
export async function extractFields(
  source: FieldMetadataSource,
  objectName: string,
  options: ExtractOptions = {}
): Promise<FieldMetadataRow[]> {
  const log = options.logger ?? silentLogger
  let names: string[]
  if (options.fields && options.fields.length > 0) {
    names = options.fields
  } else {
    names = await source.listFields(objectName)
    if (options.maxFields !== undefined) names = names.slice(0, options.maxFields)
  }

  const rows: FieldMetadataRow[] = []
  for (const name of names) {
    const description = await source.describeField(objectName, name)
    if (!description) {
      log.warn(`No metadata for ${objectName}.${name}, skipping`)
      continue
    }
    rows.push(toRow(description))
  }
  return rows
}

function toRow(field: FieldDescription): FieldMetadataRow {
  return {
    object: field.objectName,
    fullName: field.fullName,
    namespace: field.namespacePrefix ?? "",
    developerName: field.developerName,
    label: field.label,
    type: field.dataType,
    description: field.description ?? "",
    formula: field.formula ?? "",
  }
}

function csvCell(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export function toCsv(rows: readonly FieldMetadataRow[]): string {
  const lines = [CSV_HEADER.join(",")]
  for (const row of rows) {
    lines.push(
      [row.object, row.fullName, row.namespace, row.developerName, row.label, row.type, row.description, row.formula]
        .map(csvCell)
        .join(",")
    )
  }
  return lines.join("\n") + "\n"
}

export function csvFileName(objectName: string): string {
  return `${objectName}_field_metadata.csv`
}

/**
 * Write the CSV for one object and return its path
 */
export function writeFieldCsv(rows: readonly FieldMetadataRow[], objectName: string, outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true })
  const file = path.join(outputDir, csvFileName(objectName))
  fs.writeFileSync(file, toCsv(rows))
  return file
}
