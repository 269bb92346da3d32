// services/list-api/src/core/sheets/sheets.protocol.ts

export type SheetsCellValue = string | number | boolean | null

export type SheetsValueRenderOption = 'FORMATTED_VALUE' | 'UNFORMATTED_VALUE' | 'FORMULA'
export type SheetsDateTimeRenderOption = 'SERIAL_NUMBER' | 'FORMATTED_STRING'
export type SheetsValueInputOption = 'RAW' | 'USER_ENTERED'

/**
 * NOTE: The Sheets API omits empty trailing rows/columns in its response.
 * Callers should not rely on fixed-width arrays.
 */
export type ValuesGetResult = {
  range: string
  values: SheetsCellValue[][]
}

export type ValuesUpdateResult = {
  updatedRange?: string
  updatedRows?: number
  updatedCells?: number
  dryRunSkipped: boolean
}

/**
 * The slice of the Sheets v4 values API the list store needs.
 * Implemented by GoogleSheetsValuesClient; tests substitute an in-memory fake.
 */
export interface SheetsValuesClient {
  valuesGet(params: {
    range: string
    valueRenderOption?: SheetsValueRenderOption
    dateTimeRenderOption?: SheetsDateTimeRenderOption
  }): Promise<ValuesGetResult>

  valuesClear(params: { range: string }): Promise<void>

  valuesUpdate(params: {
    range: string
    values: SheetsCellValue[][]
    valueInputOption: SheetsValueInputOption
  }): Promise<Omit<ValuesUpdateResult, 'dryRunSkipped'>>
}

export function toCellValue(v: unknown): SheetsCellValue {
  if (v === null || v === undefined) return null
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v
  return String(v)
}
