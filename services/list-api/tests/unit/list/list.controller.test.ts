import { describe, expect, it } from 'vitest'
import { ListController } from '../../../src/core/list/list.controller.js'
import { PersistenceError, PreconditionError, ValidationError } from '../../../src/core/list/list.errors.js'
import { URGENCIES, type Table } from '../../../src/core/list/list.types.js'
import { MemoryListStore } from '../../../src/core/store/memory.store.js'
import { row } from '../../helpers/fixtures.js'

const fixedNow = () => new Date(2024, 2, 5, 14, 7)

class FlakyStore extends MemoryListStore {
  failLoads = false
  failSaves = false

  override async load(): Promise<Table> {
    if (this.failLoads) throw new Error('sheet unreachable')
    return await super.load()
  }

  override async save(table: Table): Promise<void> {
    if (this.failSaves) throw new Error('sheet unreachable')
    await super.save(table)
  }
}

async function ready(initial: Table = []) {
  const store = new FlakyStore({ initial })
  const list = new ListController({ store, now: fixedNow })
  await list.initialize()
  return { store, list }
}

describe('ListController before initialize', () => {
  it('rejects every operation with PreconditionError', async () => {
    const list = new ListController({ store: new MemoryListStore() })

    expect(list.isReady()).toBe(false)
    expect(() => list.getTable()).toThrow(PreconditionError)
    expect(() => list.exportCsv()).toThrow(PreconditionError)
    expect(() =>
      list.computeFilteredView({ urgencies: [...URGENCIES], showCompleted: true, searchText: '' })
    ).toThrow(PreconditionError)
    await expect(list.addItem({ itemNeeded: 'Milk' })).rejects.toBeInstanceOf(PreconditionError)
    await expect(list.createNewList()).rejects.toBeInstanceOf(PreconditionError)
    await expect(list.sync()).rejects.toBeInstanceOf(PreconditionError)
    await expect(
      list.applyEdits({ filter: { urgencies: [], showCompleted: true, searchText: '' }, rows: [], positions: [] }, [])
    ).rejects.toBeInstanceOf(PreconditionError)
  })

  it('reports the uninitialized state', () => {
    const list = new ListController({ store: new MemoryListStore() })
    expect(list.status()).toEqual({
      state: 'uninitialized',
      rowCount: 0,
      pendingSync: false,
      lastSavedAt: null,
      lastSyncError: null,
    })
  })
})

describe('ListController.initialize', () => {
  it('loads from the store once per session', async () => {
    const store = new MemoryListStore({ initial: [row({ itemNeeded: 'Rice' })] })
    const list = new ListController({ store })

    await Promise.all([list.initialize(), list.initialize()])
    await list.initialize()

    expect(store.loads).toBe(1)
    expect(list.getTable().map((r) => r.itemNeeded)).toEqual(['Rice'])
    expect(list.status().state).toBe('ready')
  })

  it('stays uninitialized when the load fails and retries on the next call', async () => {
    const store = new FlakyStore()
    store.failLoads = true
    const list = new ListController({ store })

    await expect(list.initialize()).rejects.toBeInstanceOf(PersistenceError)
    expect(list.isReady()).toBe(false)

    store.failLoads = false
    await list.initialize()
    expect(list.isReady()).toBe(true)
  })
})

describe('ListController.addItem', () => {
  it('appends a new row and persists the whole table', async () => {
    const { store, list } = await ready()

    const added = await list.addItem({ itemNeeded: 'Milk', quantity: '2 gallons', whereToGet: 'Walmart', urgency: 'Now' })

    const expected = {
      dateAdded: '2024-03-05 14:07',
      itemNeeded: 'Milk',
      quantity: '2 gallons',
      whereToGet: 'Walmart',
      urgency: 'Now',
      completed: false,
    }
    expect(added).toEqual(expected)
    expect(list.getTable()).toEqual([expected])
    expect(store.snapshot()).toEqual([expected])
    expect(store.saves).toBe(1)
  })

  it('filters the scenario row by urgency', async () => {
    const { list } = await ready()
    await list.addItem({ itemNeeded: 'Milk', quantity: '2 gallons', whereToGet: 'Walmart', urgency: 'Now' })

    const now = list.computeFilteredView({ urgencies: ['Now'], showCompleted: true, searchText: '' })
    const soon = list.computeFilteredView({ urgencies: ['Soon'], showCompleted: true, searchText: '' })

    expect(now.rows.map((r) => r.itemNeeded)).toEqual(['Milk'])
    expect(now.positions).toEqual([0])
    expect(soon.rows).toEqual([])
  })

  it('trims input and defaults optional fields', async () => {
    const { list } = await ready()

    const added = await list.addItem({ itemNeeded: '  Eggs  ', quantity: ' 12 ' })

    expect(added.itemNeeded).toBe('Eggs')
    expect(added.quantity).toBe('12')
    expect(added.whereToGet).toBe('')
    expect(added.urgency).toBe('Now')
  })

  it('keeps insertion order', async () => {
    const { list } = await ready([row({ itemNeeded: 'Bread' })])

    await list.addItem({ itemNeeded: 'Apples', urgency: 'Soon' })
    await list.addItem({ itemNeeded: 'Coffee', urgency: 'Yesterday!' })

    expect(list.getTable().map((r) => r.itemNeeded)).toEqual(['Bread', 'Apples', 'Coffee'])
  })

  it('rejects a blank item without touching the table', async () => {
    const { store, list } = await ready([row()])

    await expect(list.addItem({ itemNeeded: '   ' })).rejects.toBeInstanceOf(ValidationError)

    expect(list.getTable()).toHaveLength(1)
    expect(store.saves).toBe(0)
  })

  it('keeps the row in memory when the save fails', async () => {
    const { store, list } = await ready()
    store.failSaves = true

    await expect(list.addItem({ itemNeeded: 'Milk' })).rejects.toThrow('save failed: sheet unreachable')

    expect(list.getTable().map((r) => r.itemNeeded)).toEqual(['Milk'])
    expect(list.status()).toMatchObject({ pendingSync: true, lastSyncError: 'sheet unreachable', rowCount: 1 })
    expect(store.snapshot()).toEqual([])
  })
})

describe('ListController.sync', () => {
  it('reconciles the store after a failed save', async () => {
    const { store, list } = await ready()
    store.failSaves = true
    await expect(list.addItem({ itemNeeded: 'Milk' })).rejects.toBeInstanceOf(PersistenceError)

    store.failSaves = false
    const status = await list.sync()

    expect(status.pendingSync).toBe(false)
    expect(status.lastSyncError).toBeNull()
    expect(status.lastSavedAt).toBe(fixedNow().toISOString())
    expect(store.snapshot().map((r) => r.itemNeeded)).toEqual(['Milk'])
  })
})

describe('ListController.createNewList', () => {
  it('empties the table and persists immediately', async () => {
    const { store, list } = await ready([row(), row({ itemNeeded: 'Jam' })])

    await list.createNewList()

    expect(list.getTable()).toEqual([])
    expect(store.snapshot()).toEqual([])
    expect(store.saves).toBe(1)
  })
})

describe('ListController.computeFilteredView', () => {
  it('returns identical results for identical arguments', async () => {
    const { list } = await ready([row({ itemNeeded: 'Milk' }), row({ itemNeeded: 'Tea', completed: true })])
    const filter = { urgencies: [...URGENCIES], showCompleted: false, searchText: 'm' }

    expect(list.computeFilteredView(filter)).toEqual(list.computeFilteredView(filter))
  })
})

describe('ListController.applyEdits', () => {
  const initial = () => [
    row({ itemNeeded: 'Milk', urgency: 'Now', dateAdded: '2024-03-01 08:00' }),
    row({ itemNeeded: 'Tea', urgency: 'Soon', dateAdded: '2024-03-01 08:05' }),
    row({ itemNeeded: 'Soap', urgency: 'Now', dateAdded: '2024-03-01 08:10' }),
  ]

  it('overwrites whole rows at the view positions and persists', async () => {
    const { store, list } = await ready(initial())
    const view = list.computeFilteredView({ urgencies: ['Now'], showCompleted: true, searchText: '' })
    expect(view.positions).toEqual([0, 2])

    await list.applyEdits(view, [
      { ...view.rows[0], completed: true },
      { ...view.rows[1], itemNeeded: 'Hand soap', dateAdded: '1999-01-01 00:00' },
    ])

    const table = list.getTable()
    expect(table[0]).toMatchObject({ itemNeeded: 'Milk', completed: true })
    expect(table[1]).toMatchObject({ itemNeeded: 'Tea', urgency: 'Soon' })
    expect(table[2]).toMatchObject({ itemNeeded: 'Hand soap', dateAdded: '1999-01-01 00:00' })
    expect(store.snapshot()).toEqual(table)
  })

  it('fills fields missing from an edited row with defaults', async () => {
    const { list } = await ready(initial())
    const view = list.computeFilteredView({ urgencies: ['Soon'], showCompleted: true, searchText: '' })

    await list.applyEdits(view, [{ itemNeeded: 'Green tea' }])

    expect(list.getTable()[1]).toEqual({
      dateAdded: '',
      itemNeeded: 'Green tea',
      quantity: '',
      whereToGet: '',
      urgency: 'Now',
      completed: false,
    })
  })

  it('rejects a row count that does not match the view', async () => {
    const { store, list } = await ready(initial())
    const view = list.computeFilteredView({ urgencies: ['Now'], showCompleted: true, searchText: '' })

    await expect(list.applyEdits(view, [view.rows[0]])).rejects.toBeInstanceOf(ValidationError)

    expect(list.getTable()).toEqual(initial())
    expect(store.saves).toBe(0)
  })

  it('rejects an edit that blanks Item Needed without writing any row', async () => {
    const { list } = await ready(initial())
    const view = list.computeFilteredView({ urgencies: ['Now'], showCompleted: true, searchText: '' })

    await expect(
      list.applyEdits(view, [{ ...view.rows[0], quantity: '3' }, { ...view.rows[1], itemNeeded: ' ' }])
    ).rejects.toThrow('row 1: Item Needed is required.')

    expect(list.getTable()).toEqual(initial())
  })

  it('rejects a view taken before the list was cleared', async () => {
    const { list } = await ready(initial())
    const view = list.computeFilteredView({ urgencies: ['Now'], showCompleted: true, searchText: '' })
    await list.createNewList()

    await expect(list.applyEdits(view, view.rows)).rejects.toBeInstanceOf(ValidationError)
    expect(list.getTable()).toEqual([])
  })
})

describe('ListController.exportCsv', () => {
  it('returns null for an empty list', async () => {
    const { list } = await ready()
    expect(list.exportCsv()).toBeNull()
  })

  it('exports the full table, not a filtered view', async () => {
    const { list } = await ready([row({ itemNeeded: 'Milk' }), row({ itemNeeded: 'Tea', completed: true })])
    list.computeFilteredView({ urgencies: [], showCompleted: false, searchText: 'zzz' })

    const lines = (list.exportCsv() ?? '').trimEnd().split('\n')

    expect(lines).toEqual([
      'Date Added,Item Needed,Quantity,Where to Get,Urgency,Completed',
      '2024-03-01 09:15,Milk,,,Now,false',
      '2024-03-01 09:15,Tea,,,Now,true',
    ])
  })
})

describe('ListController.getTable', () => {
  it('returns a copy', async () => {
    const { list } = await ready([row({ itemNeeded: 'Milk' })])

    const copy = list.getTable()
    copy[0].itemNeeded = 'Changed'
    copy.push(row())

    expect(list.getTable()).toEqual([row({ itemNeeded: 'Milk' })])
  })
})
