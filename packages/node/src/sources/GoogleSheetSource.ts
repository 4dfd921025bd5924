/**
 * @loopsheet/node - Google Sheets Source
 *
 * Polls one range of a spreadsheet through the Sheets API v4
 * `spreadsheets.values.get` endpoint.
 */

import { z } from 'zod'
import type { TableRow, TableSource } from '@loopsheet/core'
import { recordsFromGrid } from '../table'

// =============================================================================
// Types
// =============================================================================

/**
 * API key or OAuth access token for the Sheets API.
 * The access token wins when both are present.
 */
export interface SheetCredentials {
  apiKey?: string
  accessToken?: string
}

/** The part of a fetch response this source reads. */
export interface FetchResponseLike {
  ok: boolean
  status: number
  statusText: string
  json(): Promise<unknown>
}

/** Minimal fetch signature, so tests can pass a stand-in. */
export type FetchLike = (
  url: string,
  init?: { headers?: Record<string, string>; signal?: AbortSignal }
) => Promise<FetchResponseLike>

export interface GoogleSheetSourceOptions {
  /** Spreadsheet id, as found in its URL */
  spreadsheetId: string

  /** A1 range to read; the first row is the header (default: 'A:Z') */
  range?: string

  credentials: SheetCredentials

  /** Defaults to the global fetch */
  fetch?: FetchLike
}

// =============================================================================
// Response Schemas
// =============================================================================

const SHEETS_API_BASE = 'https://sheets.googleapis.com/v4/spreadsheets'

export const DEFAULT_RANGE = 'A:Z'

const ValueRangeSchema = z.object({
  range: z.string().optional(),
  majorDimension: z.string().optional(),
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).optional()
})

const ApiErrorSchema = z.object({
  error: z.object({
    message: z.string()
  })
})

// =============================================================================
// GoogleSheetSource
// =============================================================================

export class GoogleSheetSource implements TableSource {
  private readonly spreadsheetId: string
  private readonly range: string
  private readonly credentials: SheetCredentials
  private readonly fetchFn: FetchLike

  constructor(options: GoogleSheetSourceOptions) {
    this.spreadsheetId = options.spreadsheetId
    this.range = options.range ?? DEFAULT_RANGE
    this.credentials = options.credentials
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init))
  }

  async fetchRows(signal?: AbortSignal): Promise<TableRow[]> {
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (this.credentials.accessToken) {
      headers.Authorization = `Bearer ${this.credentials.accessToken}`
    }

    const response = await this.fetchFn(this.requestUrl(), { headers, signal })
    const body: unknown = await response.json()

    if (!response.ok) {
      const apiError = ApiErrorSchema.safeParse(body)
      const detail = apiError.success ? apiError.data.error.message : response.statusText
      throw new Error(`Sheets API responded ${response.status}: ${detail}`)
    }

    const parsed = ValueRangeSchema.safeParse(body)
    if (!parsed.success) {
      throw new Error(`Unexpected Sheets API response: ${parsed.error.issues[0].message}`)
    }

    return recordsFromGrid(parsed.data.values ?? [])
  }

  /** Spreadsheet URL, for logs. */
  describe(): string {
    return `https://docs.google.com/spreadsheets/d/${this.spreadsheetId}`
  }

  /**
   * values.get URL with unformatted values, so numeric cells arrive as numbers.
   */
  requestUrl(): string {
    const id = encodeURIComponent(this.spreadsheetId)
    const range = encodeURIComponent(this.range)
    let url = `${SHEETS_API_BASE}/${id}/values/${range}?valueRenderOption=UNFORMATTED_VALUE`
    if (!this.credentials.accessToken && this.credentials.apiKey) {
      url += `&key=${encodeURIComponent(this.credentials.apiKey)}`
    }
    return url
  }
}

/**
 * Accept a spreadsheet id or a full spreadsheet URL.
 */
export function parseSpreadsheetId(input: string): string {
  const match = /\/spreadsheets\/d\/([A-Za-z0-9_-]+)/.exec(input)
  return match ? match[1] : input.trim()
}
