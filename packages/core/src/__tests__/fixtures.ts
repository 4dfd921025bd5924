/**
 * Shared test doubles for the scheduler tests.
 */

import type { Clock, MidiMessage, MidiSink, TableRow, TableSource } from '../types'
import type { Logger } from '../util/logger'

// =============================================================================
// Mock Sink
// =============================================================================

export interface RecordedMessage {
  time: number
  message: MidiMessage
}

/**
 * Sink that records every message with the clock time it was sent at.
 */
export function createRecordingSink(clock: Clock): MidiSink & {
  recorded: RecordedMessage[]
  messages(): MidiMessage[]
} {
  return {
    recorded: [],

    emit(message: MidiMessage): void {
      this.recorded.push({ time: clock.now(), message })
    },

    messages(): MidiMessage[] {
      return this.recorded.map(r => r.message)
    }
  }
}

// =============================================================================
// Mock Source
// =============================================================================

/**
 * Source whose rows can be swapped between refreshes.
 */
export function createMutableSource(initial: TableRow[] = []): TableSource & {
  rows: TableRow[]
  calls: number
} {
  return {
    rows: initial,
    calls: 0,

    async fetchRows(): Promise<TableRow[]> {
      this.calls++
      return this.rows
    },

    describe(): string {
      return 'test-source'
    }
  }
}

// =============================================================================
// Mock Logger
// =============================================================================

export function createRecordingLogger(): Logger & {
  lines: Record<'debug' | 'info' | 'warn' | 'error', string[]>
} {
  const lines = { debug: [] as string[], info: [] as string[], warn: [] as string[], error: [] as string[] }
  const logger = {
    lines,
    debug: (message: string) => { lines.debug.push(message) },
    info: (message: string) => { lines.info.push(message) },
    warn: (message: string) => { lines.warn.push(message) },
    error: (message: string) => { lines.error.push(message) },
    child: (): Logger => logger
  }
  return logger
}

/**
 * Random source that replays `values` in a loop.
 */
export function sequenceRandom(values: number[]): () => number {
  let index = 0
  return () => values[index++ % values.length]
}
