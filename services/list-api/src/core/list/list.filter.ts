// services/list-api/src/core/list/list.filter.ts
import { URGENCIES, type FilteredView, type ListFilter, type Table } from './list.types.js'

export const DEFAULT_FILTER: ListFilter = {
  urgencies: [...URGENCIES],
  showCompleted: true,
  searchText: '',
}

/**
 * Pure derivation; the table is not touched.
 *
 * Applied in order: urgency membership (empty set selects nothing), completed
 * visibility, then case-insensitive substring search on itemNeeded or
 * whereToGet (blank search matches everything).
 */
export function computeFilteredView(table: Table, filter: ListFilter): FilteredView {
  const urgencies = new Set(filter.urgencies)
  const needle = filter.searchText.trim().toLowerCase()

  const rows: FilteredView['rows'] = []
  const positions: number[] = []

  table.forEach((row, index) => {
    if (!urgencies.has(row.urgency)) return
    if (!filter.showCompleted && row.completed) return
    if (
      needle &&
      !row.itemNeeded.toLowerCase().includes(needle) &&
      !row.whereToGet.toLowerCase().includes(needle)
    ) {
      return
    }
    rows.push({ ...row })
    positions.push(index)
  })

  return {
    filter: { urgencies: [...urgencies], showCompleted: filter.showCompleted, searchText: filter.searchText },
    rows,
    positions,
  }
}
