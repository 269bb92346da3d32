// services/list-api/src/plugins/groceryList.ts
import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { LogChannel, type LoggerBundle } from '@grocery-sheets/logging'

import type { ListStore } from '../core/list/list.types.js'
import { ListSessions } from '../core/sessions/list-sessions.js'
import { buildSheetsConfigFromEnv, type SheetsConfig } from '../core/sheets/sheets.config.js'
import type { SheetsValuesClient } from '../core/sheets/sheets.protocol.js'
import { createListStore } from '../core/store/store.factory.js'
import { readServerConfigFromEnv } from '../core/serverConfig.js'

declare module 'fastify' {
  interface FastifyInstance {
    listSessions: ListSessions
    sheetsConfig: SheetsConfig
  }
}

export type GroceryListPluginOptions = {
  /** The app's logger; the plugin logs on its channels. */
  logger: LoggerBundle
  env?: NodeJS.ProcessEnv
  /** Use this store instead of the one chosen from config. */
  store?: ListStore
  /** Use this client for the Sheets store instead of googleapis. */
  sheetsClient?: SheetsValuesClient
  /** Clock for sessions and row timestamps (epoch ms). */
  now?: () => number
}

const PRUNE_INTERVAL_MS = 60_000

/**
 * groceryList plugin
 *
 * - builds the store (Sheets or memory) from env
 * - decorates app with { listSessions, sheetsConfig }
 * - prunes idle sessions once a minute
 *
 * Logging: never log credentials, only presence flags.
 */
const plugin: FastifyPluginAsync<GroceryListPluginOptions> = async (app: FastifyInstance, opts) => {
  const env = opts.env ?? process.env
  const { channel } = opts.logger
  const logApp = channel(LogChannel.app)
  const logSheets = channel(LogChannel.google_sheets)
  const logSessions = channel(LogChannel.sessions)
  const logList = channel(LogChannel.list)

  const sheetsCfg = buildSheetsConfigFromEnv(env)
  const serverCfg = readServerConfigFromEnv(env)

  logApp.info(
    [
      'kind=grocery-list-config-loaded',
      `sheetsEnabled=${sheetsCfg.enabled}`,
      `sheetsDryRun=${sheetsCfg.dryRun}`,
      `sheetsTab=${sheetsCfg.tab}`,
      `spreadsheetIdPresent=${Boolean(sheetsCfg.spreadsheetId)}`,
      `serviceAccountEmailPresent=${Boolean(sheetsCfg.serviceAccountEmail)}`,
      `privateKeyPresent=${Boolean(sheetsCfg.privateKey)}`,
      `sessionIdleTtlMs=${serverCfg.sessions.idleTtlMs}`,
      `sessionMax=${serverCfg.sessions.maxEntries}`,
    ].join(' ')
  )

  const store = opts.store ?? createListStore({ config: sheetsCfg, logger: logSheets, client: opts.sheetsClient })

  const sessions = new ListSessions({
    store,
    idleTtlMs: serverCfg.sessions.idleTtlMs,
    maxEntries: serverCfg.sessions.maxEntries,
    logger: logSessions,
    controllerLogger: logList,
    now: opts.now,
  })

  app.decorate('listSessions', sessions)
  app.decorate('sheetsConfig', sheetsCfg)

  const pruneTimer = setInterval(() => {
    const removed = sessions.prune()
    if (removed > 0) logSessions.info(`kind=sessions-pruned removed=${removed} live=${sessions.size()}`)
  }, PRUNE_INTERVAL_MS)
  pruneTimer.unref()

  app.addHook('onClose', async () => {
    clearInterval(pruneTimer)
    logApp.info(`kind=grocery-list-onClose sessions=${sessions.size()}`)
  })
}

export default fp(plugin, { name: 'grocery-list-plugin' })
