/**
 * @loopsheet/core - Event Queue
 *
 * Time-ordered multiset of scheduled events, shared by the Fetcher and the
 * Dispatcher. It is their only point of contact.
 *
 * Every mutating operation is synchronous, so on a single event loop none of
 * them can interleave with another. The only suspending operations are
 * `whenNotEmpty` and `popMin`, which wait for an insert.
 */

import { MinHeap } from '../util/heap'
import type { ScheduledEvent } from '../types'

// =============================================================================
// Heap Entries
// =============================================================================

interface QueueEntry {
  event: ScheduledEvent
  /** Insertion counter, breaks fire-time ties FIFO */
  order: number
}

/**
 * Primary: fireTime (ascending)
 * Secondary: insertion order (ascending)
 */
function entryComparator(a: QueueEntry, b: QueueEntry): number {
  const timeDiff = a.event.fireTime - b.event.fireTime
  if (timeDiff !== 0) return timeDiff
  return a.order - b.order
}

// =============================================================================
// EventQueue
// =============================================================================

export class EventQueue {
  private heap = new MinHeap<QueueEntry>(entryComparator)
  private nextOrder = 0
  private waiters = new Set<() => void>()

  /**
   * Add an event. Wakes every caller waiting on an empty queue.
   */
  insert(event: ScheduledEvent): void {
    this.heap.push({ event, order: this.nextOrder++ })
    this.wakeWaiters()
  }

  /**
   * Remove and return the earliest event, or undefined when empty.
   */
  tryPopMin(): ScheduledEvent | undefined {
    return this.heap.pop()?.event
  }

  /**
   * Remove and return the earliest event, waiting for one if the queue is
   * empty. Resolves undefined if `signal` aborts first.
   */
  async popMin(signal?: AbortSignal): Promise<ScheduledEvent | undefined> {
    for (;;) {
      const event = this.tryPopMin()
      if (event !== undefined) return event
      if (signal?.aborted) return undefined
      await this.whenNotEmpty(signal)
    }
  }

  /**
   * Earliest event without removing it.
   */
  peek(): ScheduledEvent | undefined {
    return this.heap.peek()?.event
  }

  size(): number {
    return this.heap.size()
  }

  isEmpty(): boolean {
    return this.heap.isEmpty()
  }

  /**
   * Resolve once the queue holds at least one event, or when `signal` aborts.
   */
  whenNotEmpty(signal?: AbortSignal): Promise<void> {
    if (!this.heap.isEmpty() || signal?.aborted) return Promise.resolve()

    return new Promise(resolve => {
      const wake = (): void => {
        this.waiters.delete(wake)
        signal?.removeEventListener('abort', wake)
        resolve()
      }
      this.waiters.add(wake)
      signal?.addEventListener('abort', wake, { once: true })
    })
  }

  /**
   * Remove every event, put back those matching `predicate` and return the
   * rest in fire order.
   *
   * Retained events keep their relative order. Runs in one synchronous step:
   * no insert or pop can observe a partially drained queue.
   */
  drainAndFilter(predicate: (event: ScheduledEvent) => boolean): ScheduledEvent[] {
    const entries = this.heap.drain()
    const discarded: ScheduledEvent[] = []

    for (const entry of entries) {
      if (predicate(entry.event)) {
        this.heap.push(entry)
      } else {
        discarded.push(entry.event)
      }
    }

    return discarded
  }

  /**
   * Remove everything.
   */
  clear(): void {
    this.heap.drain()
  }

  private wakeWaiters(): void {
    for (const wake of [...this.waiters]) {
      wake()
    }
  }
}
