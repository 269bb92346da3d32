// services/list-api/src/core/list/list.rows.ts
import { DEFAULT_URGENCY, URGENCIES, type Row, type Table, type Urgency } from './list.types.js'

export type RowInput = Partial<Row>

export type RowCells = [string, string, string, string, Urgency, boolean]

export function isUrgency(v: unknown): v is Urgency {
  return typeof v === 'string' && (URGENCIES as readonly string[]).includes(v)
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

export function formatDateAdded(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ${pad2(d.getHours())}:${pad2(d.getMinutes())}`
}

/**
 * Fill every canonical column: missing text -> "", missing completed -> false,
 * missing or unknown urgency -> "Now".
 */
export function normalizeRow(input: RowInput): Row {
  return {
    dateAdded: typeof input.dateAdded === 'string' ? input.dateAdded : '',
    itemNeeded: typeof input.itemNeeded === 'string' ? input.itemNeeded : '',
    quantity: typeof input.quantity === 'string' ? input.quantity : '',
    whereToGet: typeof input.whereToGet === 'string' ? input.whereToGet : '',
    urgency: isUrgency(input.urgency) ? input.urgency : DEFAULT_URGENCY,
    completed: input.completed === true,
  }
}

export function normalizeTable(table: readonly RowInput[]): Table {
  return table.map(normalizeRow)
}

export function cloneTable(table: readonly Row[]): Table {
  return table.map((r) => ({ ...r }))
}

/** Cells in CANONICAL_COLUMNS order. */
export function rowToCells(row: Row): RowCells {
  return [row.dateAdded, row.itemNeeded, row.quantity, row.whereToGet, row.urgency, row.completed]
}
