// services/list-api/src/core/list/list.csv.ts
import { CANONICAL_COLUMNS, type Table } from './list.types.js'
import { rowToCells } from './list.rows.js'

export const CSV_FILE_NAME = 'grocery_list.csv'

const NEEDS_QUOTING = /[",\r\n]/

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value
  return `"${value.replace(/"/g, '""')}"`
}

/**
 * Header line plus one line per row, "\n"-terminated. Returns null for an empty table.
 */
export function tableToCsv(table: Table): string | null {
  if (table.length === 0) return null

  const lines = [CANONICAL_COLUMNS.map(escapeCsvField).join(',')]
  for (const row of table) {
    lines.push(rowToCells(row).map((cell) => escapeCsvField(String(cell))).join(','))
  }
  return lines.join('\n') + '\n'
}
