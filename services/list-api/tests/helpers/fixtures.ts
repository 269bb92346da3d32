import type { Row } from '../../src/core/list/list.types.js'
import type { SheetsConfig } from '../../src/core/sheets/sheets.config.js'

export function row(overrides: Partial<Row> = {}): Row {
  return {
    dateAdded: '2024-03-01 09:15',
    itemNeeded: 'Bread',
    quantity: '',
    whereToGet: '',
    urgency: 'Now',
    completed: false,
    ...overrides,
  }
}

export function sheetsConfig(overrides: Partial<SheetsConfig> = {}): SheetsConfig {
  return {
    enabled: true,
    dryRun: false,
    spreadsheetId: 'test-sheet-id',
    serviceAccountEmail: 'lists@example.test',
    privateKey: 'test-private-key',
    tab: 'Sheet1',
    loadCacheTtlMs: 60_000,
    timeoutMs: 5_000,
    ...overrides,
  }
}

export const HEADER = ['Date Added', 'Item Needed', 'Quantity', 'Where to Get', 'Urgency', 'Completed']
