// services/list-api/src/core/sheets/sheets.client.ts
import { google, type sheets_v4 } from 'googleapis'

import type { SheetsConfig } from './sheets.config.js'
import {
  toCellValue,
  type SheetsCellValue,
  type SheetsDateTimeRenderOption,
  type SheetsValueInputOption,
  type SheetsValueRenderOption,
  type SheetsValuesClient,
  type ValuesGetResult,
  type ValuesUpdateResult,
} from './sheets.protocol.js'

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets']

type Connection = { api: sheets_v4.Sheets; spreadsheetId: string }

/**
 * GoogleSheetsValuesClient
 *
 * Service-account (JWT) access to one spreadsheet. The API client is built
 * lazily on first use, so a service with Sheets disabled never touches auth.
 * Every request carries cfg.timeoutMs.
 */
export class GoogleSheetsValuesClient implements SheetsValuesClient {
  private readonly cfg: SheetsConfig
  private conn: Connection | null = null

  constructor(cfg: SheetsConfig) {
    this.cfg = cfg
  }

  private connect(): Connection {
    if (this.conn) return this.conn

    const { spreadsheetId, serviceAccountEmail, privateKey } = this.cfg
    if (!spreadsheetId || !serviceAccountEmail || !privateKey) {
      throw new Error('missing spreadsheetId/serviceAccountEmail/privateKey')
    }

    const auth = new google.auth.JWT({
      email: serviceAccountEmail,
      // env files often carry the key with escaped newlines
      key: privateKey.replace(/\\n/g, '\n'),
      scopes: SCOPES,
    })

    this.conn = { api: google.sheets({ version: 'v4', auth }), spreadsheetId }
    return this.conn
  }

  async valuesGet(params: {
    range: string
    valueRenderOption?: SheetsValueRenderOption
    dateTimeRenderOption?: SheetsDateTimeRenderOption
  }): Promise<ValuesGetResult> {
    const { api, spreadsheetId } = this.connect()

    const resp = await api.spreadsheets.values.get(
      {
        spreadsheetId,
        range: params.range,
        majorDimension: 'ROWS',
        valueRenderOption: params.valueRenderOption,
        dateTimeRenderOption: params.dateTimeRenderOption,
      },
      { timeout: this.cfg.timeoutMs }
    )

    const rows: unknown[][] = resp.data.values ?? []
    return {
      range: resp.data.range ?? params.range,
      values: rows.map((row) => row.map(toCellValue)),
    }
  }

  async valuesClear(params: { range: string }): Promise<void> {
    const { api, spreadsheetId } = this.connect()
    await api.spreadsheets.values.clear(
      { spreadsheetId, range: params.range, requestBody: {} },
      { timeout: this.cfg.timeoutMs }
    )
  }

  async valuesUpdate(params: {
    range: string
    values: SheetsCellValue[][]
    valueInputOption: SheetsValueInputOption
  }): Promise<Omit<ValuesUpdateResult, 'dryRunSkipped'>> {
    const { api, spreadsheetId } = this.connect()

    const resp = await api.spreadsheets.values.update(
      {
        spreadsheetId,
        range: params.range,
        valueInputOption: params.valueInputOption,
        requestBody: { values: params.values },
      },
      { timeout: this.cfg.timeoutMs }
    )

    return {
      updatedRange: resp.data.updatedRange ?? undefined,
      updatedRows: resp.data.updatedRows ?? undefined,
      updatedCells: resp.data.updatedCells ?? undefined,
    }
  }
}
