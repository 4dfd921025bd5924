/**
 * @loopsheet/core - Note Model
 *
 * A Note is one table row: a pitch that sounds every `loop` seconds,
 * `onset` seconds into each cycle, for `duration` seconds, with a chance of
 * `probability` per cycle.
 *
 * Rows arrive as loosely typed records (header name -> cell). The schema
 * below lists every field with its type, range and default; parsing never
 * throws and reports the first offending field.
 */

import { z } from 'zod'
import { NoteParseError } from '../errors'
import type { CellValue } from '../types'

// =============================================================================
// Types
// =============================================================================

export interface Note {
  /** MIDI note number (0-127) */
  readonly pitch: number
  /** MIDI channel (1-16) */
  readonly channel: number
  /** Loop period in seconds (at least MIN_LOOP) */
  readonly loop: number
  /** Offset within one loop cycle, in seconds */
  readonly onset: number
  /** Seconds between note-on and note-off */
  readonly duration: number
  /** Note velocity (0-127) */
  readonly velocity: number
  /** Chance (0-1) that a cycle sounds */
  readonly probability: number
}

/** Names of the fields a row may carry. */
export type NoteField = keyof Note

export interface NoteParseOptions {
  /** Channel used when a row leaves `channel` empty (1-16, default: 1) */
  defaultChannel?: number
}

export type NoteParseResult =
  | { ok: true; note: Note }
  | { ok: false; error: NoteParseError }

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_CHANNEL = 1

/** Shortest loop period in seconds */
export const MIN_LOOP = 0.001

export const NOTE_DEFAULTS = {
  loop: 1.0,
  onset: 0.0,
  duration: 0.1,
  velocity: 64,
  probability: 1.0
} as const

// =============================================================================
// Schema
// =============================================================================

/**
 * Empty cells mean "use the default", not zero.
 */
function blankToUndefined(value: unknown): unknown {
  if (value === null || value === undefined) return undefined
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed === '' ? undefined : trimmed
  }
  return value
}

const numeric = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .finite('must be a finite number')

const integer = numeric.int('must be an integer')

function field<S extends z.ZodTypeAny>(schema: S) {
  return z.preprocess(blankToUndefined, schema)
}

function createNoteSchema(defaultChannel: number) {
  return z.object({
    pitch: field(
      integer.min(0, 'must be between 0 and 127').max(127, 'must be between 0 and 127')
        .optional()
        .refine((v): v is number => v !== undefined, 'is required')
    ),
    channel: field(
      integer.min(1, 'must be between 1 and 16').max(16, 'must be between 1 and 16')
        .default(defaultChannel)
    ),
    loop: field(
      numeric.positive('must be greater than zero')
        .min(MIN_LOOP, `must be at least ${MIN_LOOP}`)
        .default(NOTE_DEFAULTS.loop)
    ),
    onset: field(numeric.default(NOTE_DEFAULTS.onset)),
    duration: field(numeric.nonnegative('must not be negative').default(NOTE_DEFAULTS.duration)),
    velocity: field(
      numeric.min(0, 'must be between 0 and 127').max(127, 'must be between 0 and 127')
        .default(NOTE_DEFAULTS.velocity)
    ),
    probability: field(
      numeric.min(0, 'must be between 0 and 1').max(1, 'must be between 0 and 1')
        .default(NOTE_DEFAULTS.probability)
    )
  })
}

const schemaCache = new Map<number, ReturnType<typeof createNoteSchema>>()

function noteSchema(defaultChannel: number): ReturnType<typeof createNoteSchema> {
  let schema = schemaCache.get(defaultChannel)
  if (!schema) {
    schema = createNoteSchema(defaultChannel)
    schemaCache.set(defaultChannel, schema)
  }
  return schema
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse one table row into a Note.
 *
 * Unknown columns are ignored; empty cells take the defaults. A row with no
 * values at all is rejected even though every field but `pitch` has one.
 *
 * @example
 * ```typescript
 * const result = noteFromRecord({ pitch: '60', loop: '2', velocity: '' })
 * if (result.ok) console.log(result.note.loop) // 2
 * ```
 */
export function noteFromRecord(
  record: Readonly<Record<string, CellValue>>,
  options: NoteParseOptions = {}
): NoteParseResult {
  const defaultChannel = options.defaultChannel ?? DEFAULT_CHANNEL
  if (!Number.isInteger(defaultChannel) || defaultChannel < 1 || defaultChannel > 16) {
    return fail(new NoteParseError(`default channel must be 1-16, got ${defaultChannel}`, 'channel'))
  }

  if (Object.values(record).every(value => blankToUndefined(value) === undefined)) {
    return fail(new NoteParseError('row is empty'))
  }

  const parsed = noteSchema(defaultChannel).safeParse(record)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const name = issue?.path[0]
    return fail(new NoteParseError(
      issue?.message ?? 'invalid row',
      typeof name === 'string' ? name : undefined
    ))
  }

  const { pitch, channel, loop, onset, duration, velocity, probability } = parsed.data
  return {
    ok: true,
    note: Object.freeze({ pitch, channel, loop, onset, duration, velocity, probability })
  }
}

/**
 * Build a Note from already-typed values, applying defaults.
 * Throws NoteParseError when a value is out of range.
 */
export function createNote(
  fields: { pitch: number } & Partial<Omit<Note, 'pitch'>>,
  options: NoteParseOptions = {}
): Note {
  const result = noteFromRecord(fields, options)
  if (!result.ok) throw result.error
  return result.note
}

/**
 * Single-line description for logs.
 */
export function formatNote(note: Note): string {
  return `pitch=${note.pitch} ch=${note.channel} loop=${note.loop} onset=${note.onset} ` +
    `dur=${note.duration} vel=${note.velocity} p=${note.probability}`
}

function fail(error: NoteParseError): NoteParseResult {
  return { ok: false, error }
}
