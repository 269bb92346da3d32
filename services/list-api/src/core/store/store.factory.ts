// services/list-api/src/core/store/store.factory.ts
import type { ListStore, LoggerLike } from '../list/list.types.js'
import { validateSheetsConfig, type SheetsConfig } from '../sheets/sheets.config.js'
import { GoogleSheetsValuesClient } from '../sheets/sheets.client.js'
import { SheetsGateway } from '../sheets/sheets.gateway.js'
import type { SheetsValuesClient } from '../sheets/sheets.protocol.js'
import { MemoryListStore } from './memory.store.js'
import { SheetsListStore } from './sheets.store.js'

/**
 * Pick the store for a config:
 * - SHEETS_ENABLED=false -> memory
 * - enabled but invalid  -> memory (errors logged)
 * - otherwise            -> sheets
 *
 * `client` replaces the googleapis client (tests).
 */
export function createListStore(opts: {
  config: SheetsConfig
  logger: LoggerLike
  client?: SheetsValuesClient
}): ListStore {
  const { config: cfg, logger: log } = opts

  if (!cfg.enabled) {
    log.info('kind=store-selected store=memory reason=sheets-disabled')
    return new MemoryListStore({ logger: log })
  }

  const v = validateSheetsConfig(cfg)
  if (!v.ok) {
    log.error(`kind=sheets-config-invalid errors=${JSON.stringify(v.errors)}`)
    log.warn('kind=store-selected store=memory reason=sheets-config-invalid')
    return new MemoryListStore({ logger: log })
  }

  const gateway = new SheetsGateway({
    client: opts.client ?? new GoogleSheetsValuesClient(cfg),
    config: cfg,
    logger: log,
  })

  log.info(`kind=store-selected store=sheets tab=${cfg.tab} dryRun=${cfg.dryRun} cacheTtlMs=${cfg.loadCacheTtlMs}`)
  return new SheetsListStore({ gateway, ttlMs: cfg.loadCacheTtlMs, logger: log })
}
