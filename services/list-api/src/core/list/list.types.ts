// services/list-api/src/core/list/list.types.ts

export const URGENCIES = ['Now', 'Soon', 'Yesterday!'] as const

export type Urgency = (typeof URGENCIES)[number]

export const DEFAULT_URGENCY: Urgency = 'Now'

/**
 * Sheet header labels, in the fixed order used for storage and export.
 */
export const CANONICAL_COLUMNS = [
  'Date Added',
  'Item Needed',
  'Quantity',
  'Where to Get',
  'Urgency',
  'Completed',
] as const

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number]

export type Row = {
  /** Local time, "YYYY-MM-DD HH:mm". */
  dateAdded: string
  itemNeeded: string
  quantity: string
  whereToGet: string
  urgency: Urgency
  completed: boolean
}

/**
 * Rows in insertion order. A row's identity is its index.
 */
export type Table = Row[]

export type ListFilter = {
  urgencies: Urgency[]
  showCompleted: boolean
  searchText: string
}

/**
 * Subset of a Table. `positions[i]` is the Table index of `rows[i]`.
 */
export type FilteredView = {
  filter: ListFilter
  rows: Row[]
  positions: number[]
}

export interface ListStore {
  readonly kind: 'sheets' | 'memory'
  load(): Promise<Table>
  save(table: Table): Promise<void>
}

export type LoggerLike = {
  debug(msg: string, extra?: Record<string, unknown>): void
  info(msg: string, extra?: Record<string, unknown>): void
  warn(msg: string, extra?: Record<string, unknown>): void
  error(msg: string, extra?: Record<string, unknown>): void
}

export const noopLogger: LoggerLike = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
