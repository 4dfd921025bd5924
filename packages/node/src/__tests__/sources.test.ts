/**
 * @loopsheet/node - Table Source Tests
 */

import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { CsvFileSource } from '../sources/CsvFileSource'
import { GoogleSheetSource, parseSpreadsheetId } from '../sources/GoogleSheetSource'
import type { FetchLike } from '../sources/GoogleSheetSource'

// =============================================================================
// Test Utilities
// =============================================================================

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'loopsheet-sources-test-'))
}

interface RecordedRequest {
  url: string
  headers?: Record<string, string>
  signal?: AbortSignal
}

function createFakeFetch(status: number, body: unknown, statusText: string = 'OK') {
  const requests: RecordedRequest[] = []
  const fetch: FetchLike = async (url, init) => {
    requests.push({ url, headers: init?.headers, signal: init?.signal })
    return {
      ok: status >= 200 && status < 300,
      status,
      statusText,
      json: async () => body
    }
  }
  return { fetch, requests }
}

// =============================================================================
// CsvFileSource
// =============================================================================

describe('CsvFileSource', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = createTempDir()
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('reads rows keyed by the header line', async () => {
    const file = path.join(tempDir, 'notes.csv')
    fs.writeFileSync(file, 'pitch,loop,comment\n60,1,kick\n\n62,0.5\n')

    const rows = await new CsvFileSource(file).fetchRows()

    expect(rows).toEqual([
      { pitch: '60', loop: '1', comment: 'kick' },
      { pitch: '', loop: '', comment: '' },
      { pitch: '62', loop: '0.5', comment: '' }
    ])
  })

  it('sees edits on the next fetch', async () => {
    const file = path.join(tempDir, 'notes.csv')
    fs.writeFileSync(file, 'pitch\n60\n')
    const source = new CsvFileSource(file)

    await source.fetchRows()
    fs.writeFileSync(file, 'pitch\n62\n')

    await expect(source.fetchRows()).resolves.toEqual([{ pitch: '62' }])
  })

  it('describes itself by absolute path', () => {
    const file = path.join(tempDir, 'notes.csv')
    expect(new CsvFileSource(file).describe()).toBe(path.resolve(file))
  })

  it('rejects when the file is missing', async () => {
    const source = new CsvFileSource(path.join(tempDir, 'missing.csv'))
    await expect(source.fetchRows()).rejects.toThrow('ENOENT')
  })

  it('rejects when aborted', async () => {
    const file = path.join(tempDir, 'notes.csv')
    fs.writeFileSync(file, 'pitch\n60\n')
    const controller = new AbortController()
    controller.abort()

    await expect(new CsvFileSource(file).fetchRows(controller.signal))
      .rejects.toMatchObject({ name: 'AbortError' })
  })
})

// =============================================================================
// GoogleSheetSource
// =============================================================================

describe('GoogleSheetSource', () => {
  it('reads unformatted values with an API key', async () => {
    const { fetch, requests } = createFakeFetch(200, {
      range: 'Sheet1!A1:Z3',
      majorDimension: 'ROWS',
      values: [
        ['pitch', 'loop', 'velocity'],
        [60, 1.5, 100],
        [62]
      ]
    })
    const source = new GoogleSheetSource({
      spreadsheetId: 'sheet-id',
      credentials: { apiKey: 'test-key' },
      fetch
    })

    const rows = await source.fetchRows()

    expect(rows).toEqual([
      { pitch: 60, loop: 1.5, velocity: 100 },
      { pitch: 62, loop: '', velocity: '' }
    ])
    expect(requests).toHaveLength(1)
    expect(requests[0].url).toBe(
      'https://sheets.googleapis.com/v4/spreadsheets/sheet-id/values/A%3AZ' +
      '?valueRenderOption=UNFORMATTED_VALUE&key=test-key'
    )
    expect(requests[0].headers).toEqual({ Accept: 'application/json' })
  })

  it('sends an access token as a bearer header', async () => {
    const { fetch, requests } = createFakeFetch(200, { values: [['pitch']] })
    const source = new GoogleSheetSource({
      spreadsheetId: 'sheet-id',
      range: 'Notes!A1:G',
      credentials: { accessToken: 'test-token' },
      fetch
    })

    await expect(source.fetchRows()).resolves.toEqual([])
    expect(requests[0].url).toBe(
      'https://sheets.googleapis.com/v4/spreadsheets/sheet-id/values/Notes!A1%3AG' +
      '?valueRenderOption=UNFORMATTED_VALUE'
    )
    expect(requests[0].headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-token'
    })
  })

  it('passes the abort signal to fetch', async () => {
    const { fetch, requests } = createFakeFetch(200, {})
    const controller = new AbortController()
    const source = new GoogleSheetSource({
      spreadsheetId: 'sheet-id',
      credentials: { apiKey: 'test-key' },
      fetch
    })

    await source.fetchRows(controller.signal)

    expect(requests[0].signal).toBe(controller.signal)
  })

  it('returns no rows for an empty sheet', async () => {
    const { fetch } = createFakeFetch(200, { range: 'Sheet1!A1:Z1000', majorDimension: 'ROWS' })
    const source = new GoogleSheetSource({ spreadsheetId: 'sheet-id', credentials: { apiKey: 'test-key' }, fetch })

    await expect(source.fetchRows()).resolves.toEqual([])
  })

  it('reports the API error message', async () => {
    const { fetch } = createFakeFetch(403, {
      error: { code: 403, message: 'The caller does not have permission', status: 'PERMISSION_DENIED' }
    }, 'Forbidden')
    const source = new GoogleSheetSource({ spreadsheetId: 'sheet-id', credentials: { apiKey: 'test-key' }, fetch })

    await expect(source.fetchRows()).rejects.toThrow(
      'Sheets API responded 403: The caller does not have permission'
    )
  })

  it('falls back to the status text', async () => {
    const { fetch } = createFakeFetch(500, {}, 'Internal Server Error')
    const source = new GoogleSheetSource({ spreadsheetId: 'sheet-id', credentials: { apiKey: 'test-key' }, fetch })

    await expect(source.fetchRows()).rejects.toThrow('Sheets API responded 500: Internal Server Error')
  })

  it('rejects a malformed response', async () => {
    const { fetch } = createFakeFetch(200, { values: 'nope' })
    const source = new GoogleSheetSource({ spreadsheetId: 'sheet-id', credentials: { apiKey: 'test-key' }, fetch })

    await expect(source.fetchRows()).rejects.toThrow(/^Unexpected Sheets API response: /)
  })

  it('describes itself by spreadsheet URL', () => {
    const source = new GoogleSheetSource({ spreadsheetId: 'sheet-id', credentials: { apiKey: 'test-key' } })
    expect(source.describe()).toBe('https://docs.google.com/spreadsheets/d/sheet-id')
  })
})

describe('parseSpreadsheetId', () => {
  it('extracts the id from a spreadsheet URL', () => {
    expect(parseSpreadsheetId('https://docs.google.com/spreadsheets/d/1AbC-_x/edit#gid=0')).toBe('1AbC-_x')
  })

  it('returns a bare id trimmed', () => {
    expect(parseSpreadsheetId(' 1AbC ')).toBe('1AbC')
  })
})
