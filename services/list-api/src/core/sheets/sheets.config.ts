// services/list-api/src/core/sheets/sheets.config.ts
import { asBool, asInt, asString, clampInt } from '../env.js'

export type SheetsConfig = {
  enabled: boolean
  dryRun: boolean

  spreadsheetId: string | null
  serviceAccountEmail: string | null
  privateKey: string | null

  /** Worksheet tab holding the list. */
  tab: string

  loadCacheTtlMs: number
  timeoutMs: number
}

const SHEET_URL_ID = /\/spreadsheets\/d\/([A-Za-z0-9_-]+)/

/**
 * Accepts a bare spreadsheet id or a full "docs.google.com/spreadsheets/d/<id>/edit" URL.
 */
export function parseSpreadsheetId(raw: string | undefined): string | null {
  const v = (raw ?? '').trim()
  if (!v) return null
  const m = SHEET_URL_ID.exec(v)
  if (m) return m[1] ?? null
  return /^[A-Za-z0-9_-]+$/.test(v) ? v : null
}

/**
 * Build SheetsConfig from environment.
 *
 * Does NOT throw. Auth fields stay nullable; call `validateSheetsConfig(cfg)`
 * before constructing a Sheets-backed store.
 */
export function buildSheetsConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SheetsConfig {
  return {
    enabled: asBool(env.SHEETS_ENABLED, false),
    dryRun: asBool(env.SHEETS_DRY_RUN, true),
    spreadsheetId: parseSpreadsheetId(env.GOOGLE_SHEETS_SPREADSHEET_ID ?? env.GOOGLE_SHEETS_URL),
    serviceAccountEmail: (env.GOOGLE_SERVICE_ACCOUNT_EMAIL ?? '').trim() || null,
    privateKey: (env.GOOGLE_PRIVATE_KEY ?? '').trim() || null,
    tab: asString(env.SHEETS_TAB, 'Sheet1'),
    loadCacheTtlMs: clampInt(asInt(env.SHEETS_LOAD_CACHE_TTL_MS, 60_000), 0, 86_400_000),
    timeoutMs: clampInt(asInt(env.SHEETS_TIMEOUT_MS, 30_000), 1_000, 600_000),
  }
}

export type SheetsConfigValidation = { ok: true } | { ok: false; errors: string[] }

export function validateSheetsConfig(cfg: SheetsConfig): SheetsConfigValidation {
  const errors: string[] = []

  if (!cfg.enabled) return { ok: true }

  if (!cfg.spreadsheetId) errors.push('GOOGLE_SHEETS_SPREADSHEET_ID is required when SHEETS_ENABLED=true')
  if (!cfg.serviceAccountEmail) errors.push('GOOGLE_SERVICE_ACCOUNT_EMAIL is required when SHEETS_ENABLED=true')
  if (!cfg.privateKey) errors.push('GOOGLE_PRIVATE_KEY is required when SHEETS_ENABLED=true')
  if (cfg.tab.includes('!')) errors.push(`SHEETS_TAB must not contain "!" (got ${cfg.tab})`)

  return errors.length ? { ok: false, errors } : { ok: true }
}
