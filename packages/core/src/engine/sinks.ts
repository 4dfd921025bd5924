/**
 * @loopsheet/core - Built-in Sinks
 */

import type { MidiMessage, MidiSink } from '../types'
import { NOTE_ON } from '../types'
import type { Logger } from '../util/logger'

/**
 * Human readable form of a note message, e.g. `ON  ch1 60 vel 64`.
 */
export function describeMessage(message: MidiMessage): string {
  const [status, pitch, value] = message
  const type = (status & 0xf0) === NOTE_ON ? 'ON ' : 'OFF'
  const channel = (status & 0x0f) + 1
  return `${type} ch${channel} ${pitch} vel ${value}`
}

/**
 * Sink that writes every message to a logger instead of a MIDI port.
 * Used for dry runs.
 */
export function createLoggingSink(logger: Logger): MidiSink {
  return {
    emit(message) {
      logger.info(describeMessage(message))
    }
  }
}
