/**
 * @loopsheet/core - Errors
 *
 * Every failure the scheduler can report has its own class so callers can
 * tell row-local problems from cycle-level and fatal ones.
 */

/**
 * A table row that could not be turned into a Note.
 * Row-local: the row is skipped and the cycle continues.
 */
export class NoteParseError extends Error {
  constructor(
    public readonly reason: string,
    public readonly field?: string
  ) {
    super(field ? `${field}: ${reason}` : reason)
    this.name = 'NoteParseError'
  }
}

/**
 * The table source could not be read.
 * Cycle-level: the refresh is skipped and retried on the next interval.
 */
export class SourceFetchError extends Error {
  constructor(
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to fetch rows from ${source}: ${describeCause(options?.cause)}`, options)
    this.name = 'SourceFetchError'
  }
}

/**
 * The MIDI sink rejected a message. Fatal to the session.
 */
export class SinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SinkError'
  }
}

/**
 * The event queue reached a state the merge protocol should make impossible,
 * e.g. a STOP for a voice that never sounded.
 */
export class QueueInvariantError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'QueueInvariantError'
  }
}

/**
 * Invalid process configuration (flags or secrets file).
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return cause === undefined ? 'unknown error' : String(cause)
}
