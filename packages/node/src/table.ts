/**
 * @loopsheet/node - Grid to Records
 */

import type { CellValue, TableRow } from '@loopsheet/core'

/**
 * Turn a grid whose first row is the header into keyed records.
 *
 * - Header names are trimmed; columns without a name are dropped
 * - Rows shorter than the header are padded with empty strings
 * - Blank rows are kept so the note parser can reject them
 */
export function recordsFromGrid(grid: ReadonlyArray<ReadonlyArray<CellValue>>): TableRow[] {
  if (grid.length === 0) return []

  const [header, ...body] = grid
  const keys = header.map(cell => (cell === null || cell === undefined ? '' : String(cell).trim()))

  return body.map(cells => {
    const record: Record<string, CellValue> = {}
    keys.forEach((key, column) => {
      if (!key) return
      const value = cells[column]
      record[key] = value === null || value === undefined ? '' : value
    })
    return record
  })
}
