/**
 * @loopsheet/midi-backend-node
 *
 * Node.js MIDI output using the jzz library.
 * Implements the MidiSink interface from @loopsheet/core.
 *
 * Requirements:
 * - Node.js 20+
 * - jzz package installed
 * - a MIDI output port (hardware, or a virtual bus such as IAC Driver or
 *   loopMIDI that a DAW listens to)
 */

import JZZ from 'jzz'
import { SinkError, silentLogger } from '@loopsheet/core'
import type { Logger, MidiMessage, MidiSink } from '@loopsheet/core'

// =============================================================================
// Local Type Definitions
// =============================================================================

/**
 * MIDI device information.
 */
export interface MIDIDevice {
  id: string
  name: string
  manufacturer?: string
}

/**
 * Options for creating a NodeMIDISink.
 */
export interface NodeMIDISinkOptions {
  logger?: Logger
}

/** The parts of a jzz output port this sink uses. */
interface MidiOutPort {
  send(message: number[]): unknown
  close(): unknown
}

/** The parts of the jzz engine this sink uses. */
interface MidiEngine {
  info(): unknown
  openMidiOut(target: number | string): unknown
}

// =============================================================================
// Constants
// =============================================================================

/** Control change status base */
const MIDI_CONTROL_CHANGE = 0xB0

/** CC 123 = All Notes Off */
const ALL_NOTES_OFF = 123

// =============================================================================
// jzz Narrowing
// =============================================================================

// jzz's engine and port typings differ between releases; only the calls
// below are relied on

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null
}

function isMidiEngine(value: unknown): value is MidiEngine {
  return isRecord(value) &&
    typeof value.info === 'function' &&
    typeof value.openMidiOut === 'function'
}

function isMidiOutPort(value: unknown): value is MidiOutPort {
  return isRecord(value) &&
    typeof value.send === 'function' &&
    typeof value.close === 'function'
}

/**
 * Output descriptions from the engine's info() report.
 */
function readOutputs(engine: MidiEngine): MIDIDevice[] {
  const info = engine.info()
  if (!isRecord(info) || !Array.isArray(info.outputs)) return []

  return info.outputs.map((output: unknown, index: number) => {
    const name = isRecord(output) && typeof output.name === 'string' && output.name
      ? output.name
      : `Output ${index}`
    const manufacturer = isRecord(output) && typeof output.manufacturer === 'string' && output.manufacturer
      ? output.manufacturer
      : undefined
    return { id: String(index), name, manufacturer }
  })
}

// =============================================================================
// NodeMIDISink
// =============================================================================

/**
 * MIDI sink using the jzz library.
 *
 * Features:
 * - jzz library integration for cross-platform MIDI
 * - Output selection by index or name
 * - All Notes Off on every channel when disposed
 * - Send failures surface as SinkError
 *
 * @example
 * ```typescript
 * const sink = new NodeMIDISink()
 * await sink.init()
 * await sink.selectOutput('IAC Driver Bus 1')
 * sink.emit([144, 60, 64])
 * ```
 */
export class NodeMIDISink implements MidiSink {
  // jzz state
  private engine: MidiEngine | null = null
  private output: MidiOutPort | null = null

  private readonly logger: Logger

  // State
  private disposed: boolean = false
  private initialized: boolean = false

  // Selected output info
  private selectedDevice: MIDIDevice | null = null

  constructor(options: NodeMIDISinkOptions = {}) {
    this.logger = options.logger ?? silentLogger
  }

  // ===========================================================================
  // Static Methods
  // ===========================================================================

  /**
   * Check if Node.js MIDI is supported (always true in Node.js environment).
   */
  static async isSupported(): Promise<boolean> {
    return typeof process !== 'undefined' && process.versions?.node !== undefined
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start the jzz MIDI engine.
   *
   * @param output - Output to open (index or name); the first output when omitted
   * @returns True if an output is open
   */
  async init(output?: string): Promise<boolean> {
    if (this.initialized) return this.output !== null

    const outputs = await this.listOutputs()
    this.initialized = true

    if (outputs.length === 0) {
      this.logger.warn('No MIDI outputs available')
      return false
    }

    const selected = await this.selectOutput(output ?? outputs[0].id)
    if (selected && this.selectedDevice) {
      this.logger.info(`Using output "${this.selectedDevice.name}"`)
    } else {
      this.logger.warn(`MIDI output "${output}" not found`)
    }
    return selected
  }

  /**
   * Silence every channel and close the port.
   */
  dispose(): void {
    if (this.disposed) return

    if (this.output) {
      try {
        for (let channel = 0; channel < 16; channel++) {
          this.output.send([MIDI_CONTROL_CHANGE | channel, ALL_NOTES_OFF, 0])
        }
        this.output.close()
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        this.logger.warn(`Failed to close MIDI output: ${message}`)
      }
    }

    this.output = null
    this.engine = null
    this.selectedDevice = null
    this.disposed = true
  }

  // ===========================================================================
  // MidiSink Implementation
  // ===========================================================================

  /**
   * Send one message to the selected output.
   * Throws SinkError when no output is open or the port rejects the message.
   */
  emit(message: MidiMessage): void {
    if (this.disposed) {
      throw new SinkError('MIDI sink has been disposed')
    }
    if (!this.output) {
      throw new SinkError('No MIDI output selected')
    }

    try {
      this.output.send([...message])
    } catch (error) {
      throw new SinkError(
        `Failed to send [${message.join(', ')}] to "${this.selectedDevice?.name ?? 'unknown'}"`,
        { cause: error }
      )
    }
  }

  // ===========================================================================
  // MIDI-Specific Methods
  // ===========================================================================

  /**
   * List available MIDI outputs.
   */
  async listOutputs(): Promise<MIDIDevice[]> {
    const engine = await this.getEngine()
    return engine ? readOutputs(engine) : []
  }

  /**
   * Select a MIDI output by index or by name.
   */
  async selectOutput(target: string): Promise<boolean> {
    const engine = await this.getEngine()
    if (!engine) return false

    const outputs = readOutputs(engine)
    const device = outputs.find(o => o.id === target) ?? outputs.find(o => o.name === target)
    if (!device) return false

    try {
      const port = engine.openMidiOut(parseInt(device.id, 10))
      if (!isMidiOutPort(port)) {
        this.logger.warn(`jzz returned no usable port for "${device.name}"`)
        return false
      }
      this.output = port
      this.selectedDevice = device
      return true
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger.warn(`Failed to open MIDI output "${device.name}": ${message}`)
      return false
    }
  }

  /**
   * Get the currently selected MIDI output.
   */
  getSelectedOutput(): MIDIDevice | null {
    return this.selectedDevice
  }

  /**
   * Check if sink is ready to emit.
   */
  isReady(): boolean {
    return this.initialized && !this.disposed && this.output !== null
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async getEngine(): Promise<MidiEngine | null> {
    if (this.engine) return this.engine

    try {
      const engine: unknown = await JZZ()
      if (!isMidiEngine(engine)) {
        this.logger.warn('jzz returned an unexpected engine object')
        return null
      }
      this.engine = engine
      return engine
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger.warn(`JZZ initialization failed: ${message}`)
      return null
    }
  }
}
