// services/list-api/src/core/sheets/sheets.gateway.ts
import type { SheetsConfig } from './sheets.config.js'
import type { SheetsCellValue, SheetsValuesClient, ValuesUpdateResult } from './sheets.protocol.js'

export type GatewayLogger = {
  debug(msg: string, extra?: Record<string, unknown>): void
  info(msg: string, extra?: Record<string, unknown>): void
  warn(msg: string, extra?: Record<string, unknown>): void
}

const noopLog: GatewayLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
}

/**
 * SheetsGateway
 *
 * Tab-scoped read/replace primitives over a SheetsValuesClient:
 * - ranges are given relative to the configured tab ("A1:Z")
 * - reads return unformatted cell values with dates as formatted strings
 * - writes use RAW input so text round-trips unchanged
 * - dryRun skips clear + write and reports dryRunSkipped=true
 *
 * No caching here; the store owns its load cache.
 */
export class SheetsGateway {
  private readonly client: SheetsValuesClient
  private readonly cfg: SheetsConfig
  private readonly log: GatewayLogger

  constructor(opts: { client: SheetsValuesClient; config: SheetsConfig; logger?: GatewayLogger }) {
    this.client = opts.client
    this.cfg = opts.config
    this.log = opts.logger ?? noopLog
  }

  getConfig(): SheetsConfig {
    return this.cfg
  }

  /** "A1:Z" -> "'Sheet1'!A1:Z" */
  a1(cells: string): string {
    return `${quoteSheetName(this.cfg.tab)}!${cells}`
  }

  async readRange(cells: string): Promise<SheetsCellValue[][]> {
    const range = this.a1(cells)
    const res = await this.client.valuesGet({
      range,
      valueRenderOption: 'UNFORMATTED_VALUE',
      dateTimeRenderOption: 'FORMATTED_STRING',
    })
    this.log.debug(`kind=sheets-read range=${range} rows=${res.values.length}`)
    return res.values
  }

  /**
   * Clear `clearCells`, then write `values` starting at `startCell`.
   * Not atomic on the Sheets side: a failure between the two calls leaves the tab cleared.
   */
  async replaceRange(clearCells: string, startCell: string, values: SheetsCellValue[][]): Promise<ValuesUpdateResult> {
    const clearRange = this.a1(clearCells)
    const writeRange = this.a1(startCell)

    if (this.cfg.dryRun) {
      this.log.info(`kind=sheets-write-skipped reason=dryRun range=${writeRange} rows=${values.length}`)
      return { updatedRange: writeRange, updatedRows: 0, updatedCells: 0, dryRunSkipped: true }
    }

    await this.client.valuesClear({ range: clearRange })
    const res = await this.client.valuesUpdate({ range: writeRange, values, valueInputOption: 'RAW' })

    this.log.debug(
      `kind=sheets-write range=${res.updatedRange ?? writeRange} rows=${res.updatedRows ?? 0} cells=${res.updatedCells ?? 0}`
    )
    return { ...res, dryRunSkipped: false }
  }
}

export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`
}
