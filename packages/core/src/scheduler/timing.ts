/**
 * @loopsheet/core - Timing & Message Utilities
 */

import type { Note } from '../note/Note'
import { NOTE_OFF, NOTE_ON } from '../types'
import type { MidiMessage } from '../types'

/**
 * Position of the onset within one loop cycle, in [0, loop).
 * Negative onsets wrap around.
 */
export function loopPhase(note: Pick<Note, 'loop' | 'onset'>): number {
  const phase = note.onset % note.loop
  return phase < 0 ? phase + note.loop : phase
}

/**
 * Earliest start time at or after `t`: the smallest `k * loop + phase >= t`
 * for integer k. The schedule only ever looks forward, whatever the note's
 * loop and onset were on the previous cycle.
 *
 * @param note - Note to schedule
 * @param t - Seconds since session start
 */
export function nextStartTime(note: Pick<Note, 'loop' | 'onset'>, t: number): number {
  let fireTime = Math.floor(t / note.loop) * note.loop + loopPhase(note)
  while (fireTime < t) {
    fireTime += note.loop
  }
  return fireTime
}

/**
 * Clamp to a MIDI data byte.
 */
function dataByte(value: number): number {
  return Math.max(0, Math.min(127, Math.round(value)))
}

function channelMessage(base: number, note: Note): MidiMessage {
  return [base + note.channel - 1, dataByte(note.pitch), dataByte(note.velocity)]
}

/**
 * Note-on message for a note.
 */
export function noteOnMessage(note: Note): MidiMessage {
  return channelMessage(NOTE_ON, note)
}

/**
 * Note-off message for a note. Carries the note's velocity as release
 * velocity.
 */
export function noteOffMessage(note: Note): MidiMessage {
  return channelMessage(NOTE_OFF, note)
}
