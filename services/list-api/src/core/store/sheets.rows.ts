// services/list-api/src/core/store/sheets.rows.ts
import { CANONICAL_COLUMNS, type CanonicalColumn, type Table } from '../list/list.types.js'
import { isUrgency, normalizeRow, rowToCells } from '../list/list.rows.js'
import type { SheetsCellValue } from '../sheets/sheets.protocol.js'

export type DecodedTable = {
  table: Table
  /** Data rows dropped because Item Needed was blank. */
  skipped: number
}

function cellText(v: SheetsCellValue | undefined): string {
  if (v === null || v === undefined) return ''
  return String(v)
}

function cellBool(v: SheetsCellValue | undefined): boolean {
  if (typeof v === 'boolean') return v
  if (typeof v === 'string') return v.trim().toLowerCase() === 'true'
  return false
}

function isBlankRow(row: SheetsCellValue[]): boolean {
  return row.every((v) => cellText(v).trim() === '')
}

/**
 * Header row -> lookup of a canonical column's index (-1 when absent).
 * Matching is by label, so hand-reordered columns still decode.
 */
export function headerIndex(header: SheetsCellValue[]): (col: CanonicalColumn) => number {
  const labels = header.map((v) => cellText(v).trim())
  return (col) => labels.indexOf(col)
}

/**
 * Decode a values grid whose first row is the header.
 * Missing cells default like normalizeRow(); unknown urgency becomes "Now".
 */
export function tableFromValues(values: SheetsCellValue[][]): DecodedTable {
  const [header, ...body] = values
  if (!header) return { table: [], skipped: 0 }

  const idx = headerIndex(header)
  const at = (row: SheetsCellValue[], col: CanonicalColumn): SheetsCellValue | undefined => {
    const i = idx(col)
    return i >= 0 ? row[i] : undefined
  }

  const table: Table = []
  let skipped = 0

  for (const row of body) {
    if (isBlankRow(row)) continue

    const urgency = cellText(at(row, 'Urgency')).trim()
    const decoded = normalizeRow({
      dateAdded: cellText(at(row, 'Date Added')),
      itemNeeded: cellText(at(row, 'Item Needed')),
      quantity: cellText(at(row, 'Quantity')),
      whereToGet: cellText(at(row, 'Where to Get')),
      urgency: isUrgency(urgency) ? urgency : undefined,
      completed: cellBool(at(row, 'Completed')),
    })

    if (!decoded.itemNeeded.trim()) {
      skipped++
      continue
    }
    table.push(decoded)
  }

  return { table, skipped }
}

/** Header row followed by one row per entry, canonical column order. */
export function tableToValues(table: Table): SheetsCellValue[][] {
  return [[...CANONICAL_COLUMNS], ...table.map(rowToCells)]
}
