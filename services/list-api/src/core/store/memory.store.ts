// services/list-api/src/core/store/memory.store.ts
import { noopLogger, type ListStore, type LoggerLike, type Table } from '../list/list.types.js'
import { cloneTable, normalizeTable } from '../list/list.rows.js'

/**
 * In-process store with the same contract as SheetsListStore.
 * Used when Sheets is disabled (local development) and by tests.
 */
export class MemoryListStore implements ListStore {
  readonly kind = 'memory' as const

  private table: Table
  private readonly log: LoggerLike

  loads = 0
  saves = 0

  constructor(opts: { initial?: Table; logger?: LoggerLike } = {}) {
    this.table = normalizeTable(opts.initial ?? [])
    this.log = opts.logger ?? noopLogger
  }

  async load(): Promise<Table> {
    this.loads++
    return cloneTable(this.table)
  }

  async save(table: Table): Promise<void> {
    this.saves++
    this.table = normalizeTable(table)
    this.log.debug(`kind=store-saved store=memory rows=${table.length}`)
  }

  snapshot(): Table {
    return cloneTable(this.table)
  }
}
