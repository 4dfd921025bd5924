/**
 * @loopsheet/core - Dispatcher
 *
 * Fires due events in time order and derives the events that follow them.
 *
 * Per event kind:
 * - STOP, due: note-off, always. Nothing follows.
 * - START, due: one draw against the note's probability. A hit sends note-on
 *   and schedules the matching STOP at `fireTime + duration`. Hit or miss, the
 *   next START goes in at `fireTime + loop`, so the loop keeps its phase.
 * - Not due: back into the queue unchanged; the run loop sleeps for the poll
 *   interval and tries again.
 */

import { QueueInvariantError, SinkError } from '../errors'
import type { EventQueue } from '../queue/EventQueue'
import type { Clock, MidiMessage, MidiSink, ScheduledEvent, StartEvent, StopEvent } from '../types'
import { formatNote } from '../note/Note'
import { silentLogger } from '../util/logger'
import type { Logger } from '../util/logger'
import { sleep } from '../util/sleep'
import { noteOffMessage, noteOnMessage } from './timing'

// =============================================================================
// Constants
// =============================================================================

/** Default poll interval in seconds */
export const DEFAULT_SEND_INTERVAL = 0.002

/** Events fired back to back before the run loop yields */
const MAX_BURST = 256

// =============================================================================
// Types
// =============================================================================

export interface DispatcherOptions {
  clock: Clock

  /** Seconds to sleep when the earliest event is not due (default: 0.002) */
  sendInterval?: number

  /** Uniform random source in [0, 1) for probability draws (default: Math.random) */
  random?: () => number

  logger?: Logger
}

/**
 * Outcome of one dispatcher step.
 * - 'empty': nothing scheduled
 * - 'waiting': earliest event is in the future
 * - 'fired': an event fired
 */
export type StepResult = 'empty' | 'waiting' | 'fired'

// =============================================================================
// Dispatcher
// =============================================================================

export class Dispatcher {
  private readonly clock: Clock
  private readonly sendInterval: number
  private readonly random: () => number
  private readonly logger: Logger

  // Voices with a note-on sent and no note-off yet
  private sounding = new Set<number>()
  private nextVoice = 0

  constructor(
    private readonly queue: EventQueue,
    private readonly sink: MidiSink,
    options: DispatcherOptions
  ) {
    this.clock = options.clock
    this.sendInterval = options.sendInterval ?? DEFAULT_SEND_INTERVAL
    this.random = options.random ?? Math.random
    this.logger = options.logger ?? silentLogger
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Handle the earliest event.
   *
   * Checking, taking the event out, firing it and inserting what follows
   * happen in one synchronous call, so a concurrent merge never sees an
   * event that is neither queued nor fired. An event that is not due stays
   * where it is and keeps its place among equal fire times.
   */
  step(): StepResult {
    const next = this.queue.peek()
    if (next === undefined) return 'empty'
    if (this.clock.now() < next.fireTime) return 'waiting'

    const event = this.queue.tryPopMin()
    if (event === undefined) return 'empty'

    if (event.kind === 'stop') {
      this.fireStop(event)
    } else {
      this.fireStart(event)
    }
    return 'fired'
  }

  /**
   * Dispatch until `signal` aborts. Rejects with the sink's error if a message
   * cannot be sent.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const pollMs = this.sendInterval * 1000
    let burst = 0

    while (!signal?.aborted) {
      switch (this.step()) {
        case 'empty':
          burst = 0
          await this.queue.whenNotEmpty(signal)
          break
        case 'waiting':
          burst = 0
          await sleep(pollMs, signal)
          break
        case 'fired':
          // A long backlog must not starve the fetcher or signal handlers
          if (++burst >= MAX_BURST) {
            burst = 0
            await sleep(0, signal)
          }
          break
      }
    }
  }

  /**
   * Send note-off for every pending STOP right away, in fire order.
   * STARTs stay queued. Used when a session stops.
   *
   * @returns Number of note-offs sent
   */
  releaseAll(): number {
    const stops = this.queue.drainAndFilter(event => event.kind !== 'stop')
    let released = 0
    for (const event of stops) {
      if (event.kind !== 'stop') continue
      this.fireStop(event)
      released++
    }
    return released
  }

  /**
   * Number of notes currently sounding.
   */
  getSoundingCount(): number {
    return this.sounding.size
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private fireStop(event: StopEvent): void {
    if (!this.sounding.delete(event.voice)) {
      throw new QueueInvariantError(
        `STOP for voice ${event.voice} (${formatNote(event.note)}) has no matching note-on`
      )
    }
    this.send(noteOffMessage(event.note))
  }

  private fireStart(event: StartEvent): void {
    const { note, fireTime } = event

    if (this.random() < note.probability) {
      const voice = this.nextVoice++
      this.send(noteOnMessage(note))
      this.sounding.add(voice)
      this.queue.insert({ kind: 'stop', fireTime: fireTime + note.duration, note, voice })
    }

    this.queue.insert({ kind: 'start', fireTime: fireTime + note.loop, note })
    this.logger.debug(`Note added @ ${(fireTime + note.loop).toFixed(3)}: ${formatNote(note)}`)
  }

  private send(message: MidiMessage): void {
    try {
      this.sink.emit(message)
    } catch (error) {
      if (error instanceof SinkError) throw error
      throw new SinkError(`MIDI sink failed to send [${message.join(', ')}]`, { cause: error })
    }
    this.logger.debug(`MIDI out: [${message.join(', ')}]`)
  }
}

/**
 * Kind predicate used by the merge protocol.
 */
export function isStopEvent(event: ScheduledEvent): event is StopEvent {
  return event.kind === 'stop'
}
