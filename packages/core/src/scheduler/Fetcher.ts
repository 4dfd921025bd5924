/**
 * @loopsheet/core - Fetcher
 *
 * Keeps the START half of the schedule in sync with the table.
 *
 * Every cycle:
 * 1. fetch all rows from the source
 * 2. parse each row; bad rows are logged and skipped
 * 3. merge: drop every queued START, keep every queued STOP
 * 4. insert one START per note at its next start time
 *
 * Steps 3 and 4 run synchronously, after the fetch has completed, so the
 * Dispatcher never sees a half-merged queue. STOPs survive the merge: a note
 * that is sounding is always released, even if its row changed or vanished.
 */

import { SourceFetchError } from '../errors'
import { formatNote, noteFromRecord } from '../note/Note'
import type { Note, NoteParseOptions } from '../note/Note'
import type { EventQueue } from '../queue/EventQueue'
import type { Clock, TableRow, TableSource } from '../types'
import { silentLogger } from '../util/logger'
import type { Logger } from '../util/logger'
import { sleep } from '../util/sleep'
import { isStopEvent } from './Dispatcher'
import { nextStartTime } from './timing'

// =============================================================================
// Constants
// =============================================================================

/** Default refresh interval in seconds */
export const DEFAULT_RECEIVE_INTERVAL = 2.0

// =============================================================================
// Types
// =============================================================================

export interface FetcherOptions extends NoteParseOptions {
  clock: Clock

  /** Seconds between refreshes (default: 2) */
  receiveInterval?: number

  logger?: Logger
}

/**
 * Summary of one successful refresh.
 */
export interface RefreshReport {
  /** Rows returned by the source */
  rows: number
  /** Rows parsed into notes (one START each) */
  notes: number
  /** Rows rejected by the parser */
  rejected: number
  /** START events dropped by the merge */
  removedStarts: number
  /** Time spent parsing and merging, in milliseconds */
  elapsedMs: number
}

// =============================================================================
// Fetcher
// =============================================================================

export class Fetcher {
  private readonly clock: Clock
  private readonly receiveInterval: number
  private readonly logger: Logger
  private readonly parseOptions: NoteParseOptions

  private notes: readonly Note[] = []
  private refreshRequested = false
  private wake: (() => void) | null = null

  constructor(
    private readonly queue: EventQueue,
    private readonly source: TableSource,
    options: FetcherOptions
  ) {
    this.clock = options.clock
    this.receiveInterval = options.receiveInterval ?? DEFAULT_RECEIVE_INTERVAL
    this.logger = options.logger ?? silentLogger
    this.parseOptions = { defaultChannel: options.defaultChannel }
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Run one fetch-parse-merge cycle.
   *
   * @returns Report of the cycle, or null if the source could not be read
   *   (the queue is left untouched in that case)
   */
  async refresh(signal?: AbortSignal): Promise<RefreshReport | null> {
    let rows: TableRow[]
    try {
      rows = await this.source.fetchRows(signal)
    } catch (error) {
      if (signal?.aborted) return null
      const fetchError = error instanceof SourceFetchError
        ? error
        : new SourceFetchError(this.source.describe(), { cause: error })
      this.logger.warn(`${fetchError.message}; retrying in ${this.receiveInterval}s`)
      return null
    }
    if (signal?.aborted) return null

    const parseStart = performance.now()
    const notes: Note[] = []
    let rejected = 0

    rows.forEach((row, index) => {
      const result = noteFromRecord(row, this.parseOptions)
      if (result.ok) {
        notes.push(result.note)
      } else {
        rejected++
        // header is row 1
        this.logger.debug(`Skipping row ${index + 2}: ${result.error.message}`)
      }
    })

    const removed = this.queue.drainAndFilter(isStopEvent)
    const now = this.clock.now()
    for (const note of notes) {
      const fireTime = nextStartTime(note, now)
      this.queue.insert({ kind: 'start', fireTime, note })
      this.logger.debug(`Note added @ ${fireTime.toFixed(3)}: ${formatNote(note)}`)
    }
    this.notes = notes

    const elapsedMs = performance.now() - parseStart
    this.logger.info(
      `Table parsed in ${elapsedMs.toFixed(3)} ms ` +
      `(${notes.length} notes, ${rejected} rows skipped)`
    )

    return {
      rows: rows.length,
      notes: notes.length,
      rejected,
      removedStarts: removed.length,
      elapsedMs
    }
  }

  /**
   * Refresh every `receiveInterval` seconds until `signal` aborts.
   * Fetch failures are logged and never end the loop.
   */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      this.refreshRequested = false
      await this.refresh(signal)
      if (signal?.aborted) break
      if (!this.refreshRequested) {
        await this.waitForNextCycle(signal)
      }
    }
  }

  /**
   * Refresh as soon as possible instead of waiting out the interval.
   */
  requestRefresh(): void {
    this.refreshRequested = true
    this.wake?.()
  }

  /**
   * Notes produced by the last successful refresh.
   */
  getNotes(): readonly Note[] {
    return this.notes
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async waitForNextCycle(signal?: AbortSignal): Promise<void> {
    const early = new AbortController()
    const onAbort = (): void => early.abort()
    signal?.addEventListener('abort', onAbort, { once: true })
    this.wake = onAbort

    try {
      await sleep(this.receiveInterval * 1000, early.signal)
    } finally {
      this.wake = null
      signal?.removeEventListener('abort', onAbort)
    }
  }
}
