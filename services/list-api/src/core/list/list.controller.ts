// services/list-api/src/core/list/list.controller.ts
import {
  DEFAULT_URGENCY,
  noopLogger,
  type FilteredView,
  type ListFilter,
  type ListStore,
  type LoggerLike,
  type Row,
  type Table,
  type Urgency,
} from './list.types.js'
import { PersistenceError, PreconditionError, ValidationError, messageOf } from './list.errors.js'
import { cloneTable, formatDateAdded, normalizeRow, type RowInput } from './list.rows.js'
import { computeFilteredView } from './list.filter.js'
import { tableToCsv } from './list.csv.js'
import { Mutex } from './list.lock.js'

export type ListControllerState = 'uninitialized' | 'ready'

export type ListStatus = {
  state: ListControllerState
  rowCount: number
  /** True while the most recent save attempt failed. */
  pendingSync: boolean
  lastSavedAt: string | null
  lastSyncError: string | null
}

export type AddItemInput = {
  itemNeeded: string
  quantity?: string
  whereToGet?: string
  urgency?: Urgency
}

/**
 * ListController
 *
 * Owns the canonical Table of one session:
 * - initialize() is the only Uninitialized -> Ready transition
 * - every mutation updates memory first, then saves the whole Table
 * - operations run one at a time (mutex), so a read after a write sees it
 *
 * A failed save does NOT roll memory back. The row stays, pendingSync is set,
 * and the next successful save (any mutation, or sync()) reconciles the store.
 *
 * Logging format convention: "key=value key=value".
 */
export class ListController {
  private readonly store: ListStore
  private readonly log: LoggerLike
  private readonly now: () => Date
  private readonly sessionId: string
  private readonly mutex = new Mutex()

  private table: Table | null = null
  private initializing: Promise<void> | null = null

  private pendingSync = false
  private lastSavedAt: string | null = null
  private lastSyncError: string | null = null

  constructor(opts: { store: ListStore; logger?: LoggerLike; now?: () => Date; sessionId?: string }) {
    this.store = opts.store
    this.log = opts.logger ?? noopLogger
    this.now = opts.now ?? (() => new Date())
    this.sessionId = opts.sessionId ?? 'default'
  }

  isReady(): boolean {
    return this.table !== null
  }

  status(): ListStatus {
    return {
      state: this.table ? 'ready' : 'uninitialized',
      rowCount: this.table?.length ?? 0,
      pendingSync: this.pendingSync,
      lastSavedAt: this.lastSavedAt,
      lastSyncError: this.lastSyncError,
    }
  }

  /**
   * Load the Table once per session. Idempotent; concurrent callers share one load.
   * On failure the controller stays uninitialized and a later call retries.
   */
  async initialize(): Promise<void> {
    if (this.table) return
    if (this.initializing) return await this.initializing

    this.initializing = (async () => {
      try {
        const loaded = await this.store.load()
        this.table = cloneTable(loaded)
        this.log.info(`kind=list-initialized session=${this.sessionId} store=${this.store.kind} rows=${loaded.length}`)
      } catch (err) {
        this.log.error(`kind=list-initialize-failed session=${this.sessionId} err=${JSON.stringify(messageOf(err))}`)
        throw err instanceof PersistenceError ? err : new PersistenceError('load', err)
      } finally {
        this.initializing = null
      }
    })()

    return await this.initializing
  }

  getTable(): Table {
    return cloneTable(this.requireTable('getTable'))
  }

  async createNewList(): Promise<void> {
    this.requireTable('createNewList')
    await this.mutex.runExclusive(async () => {
      this.table = []
      this.log.info(`kind=list-cleared session=${this.sessionId}`)
      await this.persist('createNewList')
    })
  }

  async addItem(input: AddItemInput): Promise<Row> {
    this.requireTable('addItem')

    const itemNeeded = input.itemNeeded.trim()
    if (!itemNeeded) {
      throw new ValidationError('Item Needed is required.')
    }

    return await this.mutex.runExclusive(async () => {
      const table = this.requireTable('addItem')
      const row: Row = {
        dateAdded: formatDateAdded(this.now()),
        itemNeeded,
        quantity: (input.quantity ?? '').trim(),
        whereToGet: (input.whereToGet ?? '').trim(),
        urgency: input.urgency ?? DEFAULT_URGENCY,
        completed: false,
      }
      table.push(row)
      this.log.info(`kind=list-item-added session=${this.sessionId} index=${table.length - 1} item=${JSON.stringify(itemNeeded)}`)

      await this.persist('addItem')
      return { ...row }
    })
  }

  computeFilteredView(filter: ListFilter): FilteredView {
    return computeFilteredView(this.requireTable('computeFilteredView'), filter)
  }

  /**
   * Write edited rows back by position. Each edited row replaces the whole
   * Table row at view.positions[i], dateAdded included: the last full-view
   * write wins, there is no per-cell diff.
   *
   * All checks run before anything is written, so a rejected edit leaves the
   * Table untouched.
   */
  async applyEdits(view: FilteredView, editedRows: readonly RowInput[]): Promise<void> {
    this.requireTable('applyEdits')

    await this.mutex.runExclusive(async () => {
      const table = this.requireTable('applyEdits')

      if (editedRows.length !== view.positions.length) {
        throw new ValidationError(
          `edited rows (${editedRows.length}) do not match the view (${view.positions.length})`
        )
      }

      const replacements = editedRows.map(normalizeRow)
      replacements.forEach((row, i) => {
        const position = view.positions[i]
        if (position === undefined || position < 0 || position >= table.length) {
          throw new ValidationError(`row ${i} points at position ${String(position)} which is no longer in the list`)
        }
        if (!row.itemNeeded.trim()) {
          throw new ValidationError(`row ${i}: Item Needed is required.`)
        }
      })

      replacements.forEach((row, i) => {
        const position = view.positions[i]
        if (position !== undefined) table[position] = row
      })
      this.log.info(`kind=list-edits-applied session=${this.sessionId} rows=${replacements.length}`)

      await this.persist('applyEdits')
    })
  }

  exportCsv(): string | null {
    return tableToCsv(this.requireTable('exportCsv'))
  }

  /**
   * Save the current Table again; the manual retry after a PersistenceError.
   */
  async sync(): Promise<ListStatus> {
    this.requireTable('sync')
    await this.mutex.runExclusive(async () => {
      await this.persist('sync')
    })
    return this.status()
  }

  private requireTable(operation: string): Table {
    if (!this.table) throw new PreconditionError(operation)
    return this.table
  }

  private async persist(operation: string): Promise<void> {
    const table = this.requireTable(operation)
    try {
      await this.store.save(cloneTable(table))
    } catch (err) {
      this.pendingSync = true
      this.lastSyncError = messageOf(err)
      this.log.error(
        `kind=list-save-failed session=${this.sessionId} op=${operation} rows=${table.length} err=${JSON.stringify(this.lastSyncError)}`
      )
      throw err instanceof PersistenceError ? err : new PersistenceError('save', err)
    }

    this.pendingSync = false
    this.lastSyncError = null
    this.lastSavedAt = this.now().toISOString()
    this.log.debug(`kind=list-saved session=${this.sessionId} op=${operation} rows=${table.length}`)
  }
}
