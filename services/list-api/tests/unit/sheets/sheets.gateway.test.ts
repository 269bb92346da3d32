import { describe, expect, it, vi } from 'vitest'
import { quoteSheetName, SheetsGateway } from '../../../src/core/sheets/sheets.gateway.js'
import { FakeSheetsClient } from '../../helpers/fakeSheetsClient.js'
import { sheetsConfig } from '../../helpers/fixtures.js'

describe('quoteSheetName', () => {
  it('wraps the name in single quotes and doubles embedded ones', () => {
    expect(quoteSheetName('Sheet1')).toBe("'Sheet1'")
    expect(quoteSheetName("Sam's list")).toBe("'Sam''s list'")
  })
})

describe('SheetsGateway', () => {
  it('scopes ranges to the configured tab', () => {
    const gateway = new SheetsGateway({ client: new FakeSheetsClient(), config: sheetsConfig({ tab: 'Weekly shop' }) })
    expect(gateway.a1('A1:Z')).toBe("'Weekly shop'!A1:Z")
  })

  it('reads unformatted values with formatted dates', async () => {
    const client = new FakeSheetsClient([['Item Needed'], ['Milk']])
    const spy = vi.spyOn(client, 'valuesGet')
    const gateway = new SheetsGateway({ client, config: sheetsConfig() })

    const values = await gateway.readRange('A1:Z')

    expect(values).toEqual([['Item Needed'], ['Milk']])
    expect(spy).toHaveBeenCalledWith({
      range: "'Sheet1'!A1:Z",
      valueRenderOption: 'UNFORMATTED_VALUE',
      dateTimeRenderOption: 'FORMATTED_STRING',
    })
  })

  it('clears then writes raw values', async () => {
    const client = new FakeSheetsClient([['old']])
    const update = vi.spyOn(client, 'valuesUpdate')
    const gateway = new SheetsGateway({ client, config: sheetsConfig() })

    const res = await gateway.replaceRange('A:Z', 'A1', [['Item Needed'], ['Milk']])

    expect(client.calls.map((c) => c.op)).toEqual(['clear', 'update'])
    expect(update).toHaveBeenCalledWith({
      range: "'Sheet1'!A1",
      values: [['Item Needed'], ['Milk']],
      valueInputOption: 'RAW',
    })
    expect(res).toEqual({ updatedRange: "'Sheet1'!A1", updatedRows: 2, updatedCells: 2, dryRunSkipped: false })
    expect(client.grid).toEqual([['Item Needed'], ['Milk']])
  })

  it('does not clear when a dry run skips the write', async () => {
    const client = new FakeSheetsClient([['old']])
    const gateway = new SheetsGateway({ client, config: sheetsConfig({ dryRun: true }) })

    const res = await gateway.replaceRange('A:Z', 'A1', [['new']])

    expect(res).toEqual({ updatedRange: "'Sheet1'!A1", updatedRows: 0, updatedCells: 0, dryRunSkipped: true })
    expect(client.calls).toEqual([])
    expect(client.grid).toEqual([['old']])
  })

  it('propagates client failures', async () => {
    const client = new FakeSheetsClient()
    client.failures.clear = new Error('unavailable')
    const gateway = new SheetsGateway({ client, config: sheetsConfig() })

    await expect(gateway.replaceRange('A:Z', 'A1', [['x']])).rejects.toThrow('unavailable')
    expect(client.count('update')).toBe(0)
  })
})
