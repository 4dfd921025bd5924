// =============================================================================
// @loopsheet/core - Public API
// Note model, event queue, Fetcher/Dispatcher scheduler, session controller
// =============================================================================

// --- Note Model ---
export {
  noteFromRecord,
  createNote,
  formatNote,
  NOTE_DEFAULTS,
  DEFAULT_CHANNEL,
  MIN_LOOP
} from './note/Note'
export type { Note, NoteField, NoteParseOptions, NoteParseResult } from './note/Note'

// --- Event Queue ---
export { EventQueue } from './queue/EventQueue'

// --- Scheduler ---
export { Dispatcher, DEFAULT_SEND_INTERVAL, isStopEvent } from './scheduler/Dispatcher'
export type { DispatcherOptions, StepResult } from './scheduler/Dispatcher'
export { Fetcher, DEFAULT_RECEIVE_INTERVAL } from './scheduler/Fetcher'
export type { FetcherOptions, RefreshReport } from './scheduler/Fetcher'
export { nextStartTime, loopPhase, noteOnMessage, noteOffMessage } from './scheduler/timing'

// --- Session ---
export { LoopSession } from './engine/LoopSession'
export type { LoopSessionOptions } from './engine/LoopSession'
export { createLoggingSink, describeMessage } from './engine/sinks'

// --- Runtime Interfaces ---
export { NOTE_ON, NOTE_OFF } from './types'
export type {
  CellValue,
  TableRow,
  TableSource,
  MidiMessage,
  MidiSink,
  EventKind,
  StartEvent,
  StopEvent,
  ScheduledEvent,
  Clock
} from './types'

// --- Errors ---
export {
  NoteParseError,
  SourceFetchError,
  SinkError,
  QueueInvariantError,
  ConfigError
} from './errors'

// --- Utilities ---
export { MinHeap } from './util/heap'
export { MonotonicClock, ManualClock } from './util/clock'
export { sleep } from './util/sleep'
export { createConsoleLogger, silentLogger, formatTime } from './util/logger'
export type { Logger, ConsoleLoggerOptions } from './util/logger'
