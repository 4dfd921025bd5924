/**
 * @loopsheet/core - LoopSession
 *
 * Main controller: one clock, one queue, a Fetcher and a Dispatcher running
 * side by side until stopped.
 *
 * Usage:
 * ```typescript
 * const session = new LoopSession({ source, sink, receiveInterval: 2 })
 * process.on('SIGINT', () => session.stop())
 * await session.run()
 * ```
 */

import { EventQueue } from '../queue/EventQueue'
import { Dispatcher, DEFAULT_SEND_INTERVAL } from '../scheduler/Dispatcher'
import { Fetcher, DEFAULT_RECEIVE_INTERVAL } from '../scheduler/Fetcher'
import type { Clock, MidiSink, TableSource } from '../types'
import { MonotonicClock } from '../util/clock'
import { silentLogger } from '../util/logger'
import type { Logger } from '../util/logger'

// =============================================================================
// Types
// =============================================================================

export interface LoopSessionOptions {
  /** Where note definitions come from */
  source: TableSource

  /** Where MIDI messages go */
  sink: MidiSink

  /** Seconds between table refreshes (default: 2) */
  receiveInterval?: number

  /** Dispatcher poll interval in seconds (default: 0.002) */
  sendInterval?: number

  /** Channel for rows without one (default: 1) */
  defaultChannel?: number

  /** Time source (default: a MonotonicClock started with the session) */
  clock?: Clock

  /** Random source for probability draws (default: Math.random) */
  random?: () => number

  logger?: Logger
}

// =============================================================================
// LoopSession
// =============================================================================

export class LoopSession {
  private readonly queue = new EventQueue()
  private readonly fetcher: Fetcher
  private readonly dispatcher: Dispatcher
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly source: TableSource

  private controller: AbortController | null = null

  constructor(options: LoopSessionOptions) {
    this.clock = options.clock ?? new MonotonicClock()
    this.logger = options.logger ?? silentLogger
    this.source = options.source

    this.fetcher = new Fetcher(this.queue, options.source, {
      clock: this.clock,
      receiveInterval: options.receiveInterval ?? DEFAULT_RECEIVE_INTERVAL,
      defaultChannel: options.defaultChannel,
      logger: this.logger.child('Fetcher')
    })

    this.dispatcher = new Dispatcher(this.queue, options.sink, {
      clock: this.clock,
      sendInterval: options.sendInterval ?? DEFAULT_SEND_INTERVAL,
      random: options.random,
      logger: this.logger.child('Dispatcher')
    })
  }

  // ===========================================================================
  // Playback Control
  // ===========================================================================

  /**
   * Run the Fetcher and the Dispatcher until `stop()` is called.
   *
   * On a clean stop every sounding note is released before the promise
   * resolves. If the sink fails, the Fetcher is cancelled and the promise
   * rejects with the sink's error.
   */
  async run(): Promise<void> {
    if (this.controller) {
      throw new Error('LoopSession is already running')
    }

    const controller = new AbortController()
    this.controller = controller
    const { signal } = controller

    this.logger.info(`Source: ${this.source.describe()}`)
    this.logger.info('Listening...')

    try {
      // Whichever loop ends first takes the other one down with it
      const [fetched, dispatched] = await Promise.allSettled([
        this.fetcher.run(signal).finally(() => controller.abort()),
        this.dispatcher.run(signal).finally(() => controller.abort())
      ])
      if (dispatched.status === 'rejected') throw dispatched.reason
      if (fetched.status === 'rejected') throw fetched.reason

      const released = this.dispatcher.releaseAll()
      if (released > 0) {
        this.logger.info(`Released ${released} sounding note${released === 1 ? '' : 's'}`)
      }
    } finally {
      this.controller = null
    }
  }

  /**
   * Stop both loops at their next suspension point.
   */
  stop(): void {
    this.controller?.abort()
  }

  /**
   * Check if the session is running.
   */
  isRunning(): boolean {
    return this.controller !== null
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  getQueue(): EventQueue {
    return this.queue
  }

  getFetcher(): Fetcher {
    return this.fetcher
  }

  getDispatcher(): Dispatcher {
    return this.dispatcher
  }
}
