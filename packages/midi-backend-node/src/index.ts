/**
 * @loopsheet/midi-backend-node
 *
 * Node.js MIDI output using jzz library.
 * Implements MidiSink from @loopsheet/core.
 */

export { NodeMIDISink } from './NodeMIDISink'
export type { MIDIDevice, NodeMIDISinkOptions } from './NodeMIDISink'
