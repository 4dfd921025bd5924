/**
 * @loopsheet/core - Runtime Type Definitions
 *
 * Contracts shared by the scheduler and its external collaborators
 * (table sources and MIDI sinks).
 */

import type { Note } from './note/Note'

// =============================================================================
// Table Source
// =============================================================================

/** Raw cell value as delivered by a source. */
export type CellValue = string | number | boolean | null | undefined

/**
 * One table row, keyed by the header row's column names.
 */
export type TableRow = Readonly<Record<string, CellValue>>

/**
 * Something that can be polled for the current contents of a table.
 */
export interface TableSource {
  /** Fetch every data row of the table (header excluded). */
  fetchRows(signal?: AbortSignal): Promise<TableRow[]>

  /** Human readable identifier for logs. */
  describe(): string
}

// =============================================================================
// MIDI Sink
// =============================================================================

/** MIDI status base for note-on messages */
export const NOTE_ON = 144

/** MIDI status base for note-off messages */
export const NOTE_OFF = 128

/**
 * A raw 3-byte channel message: [status + channel - 1, pitch, value].
 */
export type MidiMessage = readonly [status: number, pitch: number, value: number]

/**
 * Output collaborator. No acknowledgement or backpressure.
 * Implementations throw a SinkError when a message cannot be delivered.
 */
export interface MidiSink {
  emit(message: MidiMessage): void
}

// =============================================================================
// Scheduled Events
// =============================================================================

/** What a scheduled event does when it fires. */
export type EventKind = 'start' | 'stop'

/**
 * A note onset. Firing it may sound the note and always renews the loop.
 */
export interface StartEvent {
  readonly kind: 'start'
  /** Seconds since session start */
  readonly fireTime: number
  readonly note: Note
}

/**
 * A note release. Carries the Note captured when the note-on was sent.
 */
export interface StopEvent {
  readonly kind: 'stop'
  /** Seconds since session start */
  readonly fireTime: number
  readonly note: Note
  /** Identifies the note-on this event releases */
  readonly voice: number
}

export type ScheduledEvent = StartEvent | StopEvent

// =============================================================================
// Time
// =============================================================================

/**
 * Source of elapsed time, in seconds since the session started.
 */
export interface Clock {
  now(): number
}
