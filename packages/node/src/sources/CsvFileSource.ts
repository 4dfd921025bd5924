/**
 * @loopsheet/node - CSV File Source
 */

import * as fs from 'fs'
import * as path from 'path'
import type { TableRow, TableSource } from '@loopsheet/core'
import { parseCsv } from '../csv'
import { recordsFromGrid } from '../table'

/**
 * Reads notes from a local CSV file whose first line is the header.
 * The file is read again on every fetch, so edits are picked up on the
 * next refresh.
 *
 * @example
 * ```typescript
 * const source = new CsvFileSource('./notes.csv')
 * const rows = await source.fetchRows()
 * ```
 */
export class CsvFileSource implements TableSource {
  private readonly filePath: string

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath)
  }

  async fetchRows(signal?: AbortSignal): Promise<TableRow[]> {
    const text = await fs.promises.readFile(this.filePath, { encoding: 'utf-8', signal })
    return recordsFromGrid(parseCsv(text))
  }

  describe(): string {
    return this.filePath
  }
}
