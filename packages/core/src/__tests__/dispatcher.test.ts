/**
 * Dispatcher tests: firing rules, loop renewal, probability gate and
 * failure handling. Time is driven by a ManualClock.
 */

import { Dispatcher } from '../scheduler/Dispatcher'
import { EventQueue } from '../queue/EventQueue'
import { ManualClock } from '../util/clock'
import { createNote } from '../note/Note'
import { QueueInvariantError, SinkError } from '../errors'
import type { ScheduledEvent } from '../types'
import { createRecordingSink, sequenceRandom } from './fixtures'

// =============================================================================
// Setup
// =============================================================================

function setup(random: () => number = () => 0) {
  const clock = new ManualClock()
  const queue = new EventQueue()
  const sink = createRecordingSink(clock)
  const dispatcher = new Dispatcher(queue, sink, { clock, random, sendInterval: 0.001 })
  return { clock, queue, sink, dispatcher }
}

function drainAll(queue: EventQueue): ScheduledEvent[] {
  return queue.drainAndFilter(() => false)
}

const C4 = createNote({ pitch: 60, loop: 1, duration: 0.5 })

// =============================================================================
// step()
// =============================================================================

describe('Dispatcher', () => {
  describe('step()', () => {
    it('reports an empty queue', () => {
      const { dispatcher } = setup()
      expect(dispatcher.step()).toBe('empty')
    })

    it('puts back events that are not due', () => {
      const { queue, sink, dispatcher } = setup()
      const event: ScheduledEvent = { kind: 'start', fireTime: 1, note: C4 }
      queue.insert(event)

      expect(dispatcher.step()).toBe('waiting')
      expect(queue.size()).toBe(1)
      expect(queue.peek()).toBe(event)
      expect(sink.recorded).toEqual([])
    })

    it('sounds a due START and schedules its STOP and the next START', () => {
      const { queue, sink, dispatcher } = setup()
      queue.insert({ kind: 'start', fireTime: 0, note: C4 })

      expect(dispatcher.step()).toBe('fired')
      expect(sink.messages()).toEqual([[144, 60, 64]])
      expect(dispatcher.getSoundingCount()).toBe(1)

      const pending = drainAll(queue)
      expect(pending.map(e => [e.kind, e.fireTime])).toEqual([
        ['stop', 0.5],
        ['start', 1]
      ])
      expect(pending[0].note).toBe(C4)
    })

    it('renews the loop without a STOP when the draw misses', () => {
      const { queue, sink, dispatcher } = setup(() => 0.9)
      const note = createNote({ pitch: 60, probability: 0.5 })
      queue.insert({ kind: 'start', fireTime: 0, note })

      expect(dispatcher.step()).toBe('fired')
      expect(sink.recorded).toEqual([])

      const pending = drainAll(queue)
      expect(pending.map(e => [e.kind, e.fireTime])).toEqual([['start', 1]])
    })

    it('releases a STOP regardless of the probability draw', () => {
      const random = sequenceRandom([0, 0.99])
      const { clock, queue, sink, dispatcher } = setup(random)
      const note = createNote({ pitch: 64, probability: 0.5, duration: 0.25 })
      queue.insert({ kind: 'start', fireTime: 0, note })

      dispatcher.step()
      clock.set(0.25)
      expect(dispatcher.step()).toBe('fired')

      expect(sink.messages()).toEqual([[144, 64, 64], [128, 64, 64]])
      expect(dispatcher.getSoundingCount()).toBe(0)
    })

    it('keeps first-in first-out order for ties after an early poll', () => {
      const { clock, queue, sink, dispatcher } = setup()
      queue.insert({ kind: 'start', fireTime: 1, note: C4 })
      queue.insert({ kind: 'start', fireTime: 1, note: createNote({ pitch: 62 }) })

      clock.set(0.5)
      expect(dispatcher.step()).toBe('waiting')

      clock.set(1)
      dispatcher.step()
      dispatcher.step()

      expect(sink.messages()).toEqual([[144, 60, 64], [144, 62, 64]])
    })

    it('fires an event exactly at its fire time', () => {
      const { clock, queue, sink, dispatcher } = setup()
      clock.set(2)
      queue.insert({ kind: 'start', fireTime: 2, note: C4 })

      expect(dispatcher.step()).toBe('fired')
      expect(sink.recorded).toEqual([{ time: 2, message: [144, 60, 64] }])
    })
  })

  // ===========================================================================
  // Loop Behaviour
  // ===========================================================================

  describe('loop behaviour', () => {
    it('keeps loop phase independent of probability outcomes', () => {
      const random = sequenceRandom([0.1, 0.8, 0.6, 0.2, 0.95])
      const { clock, queue, dispatcher } = setup(random)
      const note = createNote({ pitch: 60, loop: 0.75, onset: 0.1, duration: 0.2, probability: 0.5 })
      const first = 0.1
      queue.insert({ kind: 'start', fireTime: first, note })

      const startTimes: number[] = []
      while (startTimes.length < 12) {
        const next = queue.peek()
        if (!next) throw new Error('queue ran dry')
        clock.set(next.fireTime)
        if (next.kind === 'start') startTimes.push(next.fireTime)
        dispatcher.step()
      }

      startTimes.forEach((time, n) => {
        expect(time).toBeCloseTo(first + n * note.loop, 9)
      })
    })

    it('never sounds a note with probability 0 and never leaks a STOP', () => {
      const { clock, queue, sink, dispatcher } = setup(() => 0)
      const note = createNote({ pitch: 60, probability: 0 })
      queue.insert({ kind: 'start', fireTime: 0, note })

      for (let cycle = 0; cycle < 10; cycle++) {
        clock.set(cycle)
        expect(dispatcher.step()).toBe('fired')
        expect(queue.size()).toBe(1)
      }

      expect(sink.recorded).toEqual([])
      expect(dispatcher.getSoundingCount()).toBe(0)
      expect(queue.peek()).toEqual({ kind: 'start', fireTime: 10, note })
    })

    it('sounds a note with probability 1 once per cycle', () => {
      const { clock, queue, sink, dispatcher } = setup(() => 0.999999)
      queue.insert({ kind: 'start', fireTime: 0, note: C4 })

      for (let cycle = 0; cycle < 4; cycle++) {
        clock.set(cycle)
        dispatcher.step()
        clock.set(cycle + 0.5)
        dispatcher.step()
      }

      expect(sink.recorded.map(r => [r.time, r.message[0]])).toEqual([
        [0, 144], [0.5, 128],
        [1, 144], [1.5, 128],
        [2, 144], [2.5, 128],
        [3, 144], [3.5, 128]
      ])
    })

    it('fires everything that is due in time order', () => {
      const { clock, queue, sink, dispatcher } = setup()
      const a = createNote({ pitch: 60, loop: 4, duration: 0.5 })
      const b = createNote({ pitch: 62, loop: 4, duration: 0.1 })
      queue.insert({ kind: 'start', fireTime: 0.2, note: b })
      queue.insert({ kind: 'start', fireTime: 0, note: a })

      clock.set(1)
      while (dispatcher.step() === 'fired') {
        // drain everything due
      }

      expect(sink.messages()).toEqual([
        [144, 60, 64],
        [144, 62, 64],
        [128, 62, 64],
        [128, 60, 64]
      ])
    })
  })

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe('failures', () => {
    it('throws QueueInvariantError for a STOP that never sounded', () => {
      const { queue, dispatcher } = setup()
      queue.insert({ kind: 'stop', fireTime: 0, note: C4, voice: 42 })

      expect(() => dispatcher.step()).toThrow(QueueInvariantError)
    })

    it('wraps sink failures in SinkError', () => {
      const { queue } = setup()
      const cause = new Error('port closed')
      const dispatcher = new Dispatcher(queue, { emit: () => { throw cause } }, {
        clock: new ManualClock()
      })
      queue.insert({ kind: 'start', fireTime: 0, note: C4 })

      let caught: unknown
      try {
        dispatcher.step()
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(SinkError)
      expect(caught instanceof SinkError && caught.cause).toBe(cause)
    })
  })

  // ===========================================================================
  // releaseAll()
  // ===========================================================================

  describe('releaseAll()', () => {
    it('sends pending note-offs now and keeps STARTs', () => {
      const { queue, sink, dispatcher } = setup()
      queue.insert({ kind: 'start', fireTime: 0, note: C4 })
      dispatcher.step()

      expect(dispatcher.releaseAll()).toBe(1)
      expect(sink.messages()).toEqual([[144, 60, 64], [128, 60, 64]])
      expect(dispatcher.getSoundingCount()).toBe(0)
      expect(drainAll(queue).map(e => e.kind)).toEqual(['start'])
    })

    it('returns 0 when nothing is sounding', () => {
      const { dispatcher } = setup()
      expect(dispatcher.releaseAll()).toBe(0)
    })
  })

  // ===========================================================================
  // run()
  // ===========================================================================

  describe('run()', () => {
    it('returns at once for an aborted signal', async () => {
      const { dispatcher } = setup()
      const controller = new AbortController()
      controller.abort()

      await expect(dispatcher.run(controller.signal)).resolves.toBeUndefined()
    })

    it('dispatches due events until aborted', async () => {
      const clock = new ManualClock()
      const queue = new EventQueue()
      const controller = new AbortController()
      const messages: number[][] = []
      const dispatcher = new Dispatcher(queue, {
        emit(message) {
          messages.push([...message])
          controller.abort()
        }
      }, { clock, random: () => 0, sendInterval: 0.001 })

      const running = dispatcher.run(controller.signal)
      queue.insert({ kind: 'start', fireTime: 0, note: C4 })
      await running

      expect(messages).toEqual([[144, 60, 64]])
      expect(queue.size()).toBe(2)
    })

    it('yields to timers while working through a long backlog', async () => {
      const clock = new ManualClock(10000)
      const queue = new EventQueue()
      const controller = new AbortController()
      const dispatcher = new Dispatcher(queue, { emit() {} }, { clock, random: () => 0 })
      queue.insert({ kind: 'start', fireTime: 0, note: createNote({ pitch: 60, loop: 0.001, probability: 0 }) })

      setTimeout(() => controller.abort(), 5)
      await dispatcher.run(controller.signal)

      expect(queue.size()).toBe(1)
      expect(queue.peek()?.fireTime).toBeLessThan(10000)
    })

    it('rejects when the sink fails', async () => {
      const queue = new EventQueue()
      const dispatcher = new Dispatcher(queue, { emit: () => { throw new Error('unplugged') } }, {
        clock: new ManualClock(),
        random: () => 0
      })
      queue.insert({ kind: 'start', fireTime: 0, note: C4 })

      await expect(dispatcher.run()).rejects.toThrow(SinkError)
    })
  })
})
