// services/list-api/src/core/store/sheets.store.ts
import { noopLogger, type ListStore, type LoggerLike, type Table } from '../list/list.types.js'
import { PersistenceError, messageOf } from '../list/list.errors.js'
import { cloneTable, normalizeTable } from '../list/list.rows.js'
import { Mutex } from '../list/list.lock.js'
import type { SheetsGateway } from '../sheets/sheets.gateway.js'
import { tableFromValues, tableToValues } from './sheets.rows.js'

const READ_RANGE = 'A1:Z'
const CLEAR_RANGE = 'A:Z'
const WRITE_START = 'A1'

type LoadCacheEntry = {
  table: Table
  fetchedAt: number // epoch ms
}

/**
 * SheetsListStore
 *
 * Store adapter over one worksheet tab:
 * - load(): header-mapped decode, cached for ttlMs (0 disables)
 * - save(): normalize, then replace the whole tab (header + rows)
 * - a successful save drops the load cache
 *
 * Loads and saves are serialized in-process, so no session interleaves a
 * clear with another session's write or read. Across processes the last full write wins.
 */
export class SheetsListStore implements ListStore {
  readonly kind = 'sheets' as const

  private readonly gateway: SheetsGateway
  private readonly ttlMs: number
  private readonly log: LoggerLike
  private readonly now: () => number
  private readonly sheetLock = new Mutex()

  private cache: LoadCacheEntry | null = null

  constructor(opts: { gateway: SheetsGateway; ttlMs?: number; logger?: LoggerLike; now?: () => number }) {
    this.gateway = opts.gateway
    this.ttlMs = Math.max(0, opts.ttlMs ?? opts.gateway.getConfig().loadCacheTtlMs)
    this.log = opts.logger ?? noopLogger
    this.now = opts.now ?? Date.now
  }

  async load(): Promise<Table> {
    const cached = this.cachedTable(this.now())
    if (cached) return cached

    // same lock as save(): no read of a half-replaced tab, no caching of rows a save replaced
    return await this.sheetLock.runExclusive(async () => {
      const now = this.now()
      const hit = this.cachedTable(now)
      if (hit) return hit

      let decoded: ReturnType<typeof tableFromValues>
      try {
        decoded = tableFromValues(await this.gateway.readRange(READ_RANGE))
      } catch (err) {
        this.log.error(`kind=store-load-failed err=${JSON.stringify(messageOf(err))}`)
        throw new PersistenceError('load', err)
      }

      if (decoded.skipped > 0) {
        this.log.warn(`kind=store-load-rows-skipped reason=blank-item count=${decoded.skipped}`)
      }
      this.log.info(`kind=store-loaded rows=${decoded.table.length}`)

      if (this.ttlMs > 0) {
        this.cache = { table: cloneTable(decoded.table), fetchedAt: now }
      }
      return decoded.table
    })
  }

  async save(table: Table): Promise<void> {
    const values = tableToValues(normalizeTable(table))

    await this.sheetLock.runExclusive(async () => {
      try {
        const res = await this.gateway.replaceRange(CLEAR_RANGE, WRITE_START, values)
        this.log.info(`kind=store-saved rows=${table.length} dryRun=${res.dryRunSkipped}`)
      } catch (err) {
        this.log.error(`kind=store-save-failed rows=${table.length} err=${JSON.stringify(messageOf(err))}`)
        throw new PersistenceError('save', err)
      }
      this.invalidate()
    })
  }

  private cachedTable(now: number): Table | null {
    const hit = this.cache
    if (!hit || now - hit.fetchedAt >= this.ttlMs) return null
    this.log.debug(`kind=store-load-cache-hit ageMs=${now - hit.fetchedAt} rows=${hit.table.length}`)
    return cloneTable(hit.table)
  }

  invalidate(): void {
    this.cache = null
  }
}
