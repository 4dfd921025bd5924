/**
 * @loopsheet/core - Clocks
 */

import type { Clock } from '../types'

/**
 * Monotonic clock reporting seconds since it was created.
 * Uses performance.now(), like the MIDI backend's timing reference.
 */
export class MonotonicClock implements Clock {
  private readonly startTime: number = performance.now()

  now(): number {
    return (performance.now() - this.startTime) / 1000
  }
}

/**
 * Clock that only moves when told to. Drives the scheduler in tests and
 * offline renders.
 */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current
  }

  set(seconds: number): void {
    this.current = seconds
  }

  advance(seconds: number): void {
    this.current += seconds
  }
}
