/**
 * @drumgrid/midi-backend-node
 *
 * Live MIDI output for Node.js using the jzz library.
 * Implements the LiveSink contract of @drumgrid/core.
 *
 * Requirements:
 * - Node.js 20+
 * - jzz package installed
 */

import type { DisposableLiveSink } from '@drumgrid/core'
import {
  CC_ALL_NOTES_OFF,
  PERCUSSION_CHANNEL,
  controlChange,
  noteOff,
  noteOn
} from '@drumgrid/core'
import JZZ from 'jzz'

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
 * Options for creating a NodeMIDIOutput.
 */
export interface NodeMIDIOutputOptions {
  /** Output to open on init, by name; falls back to the first output */
  preferredOutput?: string
  /** Log the available outputs on init (default: true) */
  logOutputs?: boolean
}

// The parts of the jzz engine and port this backend touches.
interface MidiEngine {
  info(): unknown
  openMidiOut(index: number): unknown
}

interface MidiOutputPort {
  send(data: number[]): unknown
  close(): unknown
}

// =============================================================================
// Type Guards
// =============================================================================

function isMidiEngine(value: unknown): value is MidiEngine {
  return typeof value === 'object' && value !== null &&
    'info' in value && typeof value.info === 'function' &&
    'openMidiOut' in value && typeof value.openMidiOut === 'function'
}

function isOutputPort(value: unknown): value is MidiOutputPort {
  return typeof value === 'object' && value !== null &&
    'send' in value && typeof value.send === 'function' &&
    'close' in value && typeof value.close === 'function'
}

function readOutputs(info: unknown): MIDIDevice[] {
  if (typeof info !== 'object' || info === null || !('outputs' in info)) return []
  const outputs = info.outputs
  if (!Array.isArray(outputs)) return []

  return outputs.map((output: unknown, index: number): MIDIDevice => {
    const name = readString(output, 'name')
    const manufacturer = readString(output, 'manufacturer')
    return {
      id: String(index),
      name: name || `Output ${index}`,
      manufacturer: manufacturer || undefined
    }
  })
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'string' ? field : undefined
}

// =============================================================================
// NodeMIDIOutput
// =============================================================================

/**
 * Node.js MIDI output using jzz.
 *
 * Opens the first available output on `init()` unless a preferred one is
 * named. While no port is open every send is dropped, so the sequencer runs
 * the same with or without a device.
 */
export class NodeMIDIOutput implements DisposableLiveSink {
  // jzz state
  private midi: MidiEngine | null = null
  private midiOutput: MidiOutputPort | null = null

  private readonly options: Required<NodeMIDIOutputOptions>

  // State
  private disposed: boolean = false
  private initialized: boolean = false

  // Selected output info
  private selectedDevice: MIDIDevice | null = null

  constructor(options: NodeMIDIOutputOptions = {}) {
    this.options = {
      preferredOutput: options.preferredOutput ?? '',
      logOutputs: options.logOutputs ?? true
    }
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
   * Start the jzz engine and open an output.
   *
   * @returns True if an output is open
   */
  async init(): Promise<boolean> {
    if (this.initialized) return this.midiOutput !== null

    try {
      const outputs = await this.listOutputs()

      if (this.options.logOutputs) {
        if (outputs.length === 0) {
          console.warn('NodeMIDIOutput: No MIDI outputs available')
        } else {
          console.log('NodeMIDIOutput: Available MIDI outputs:')
          for (const output of outputs) {
            console.log(`  ${output.id}: ${output.name}`)
          }
        }
      }

      const preferred = outputs.find(o => o.name === this.options.preferredOutput)
      const target = preferred ?? outputs[0]
      if (target) {
        const opened = await this.selectOutput(target.id)
        if (opened) console.log(`NodeMIDIOutput: Using output "${target.name}"`)
      }
    } catch (err) {
      console.warn('NodeMIDIOutput: JZZ initialization failed:', err)
    }

    this.initialized = true
    return this.midiOutput !== null
  }

  /**
   * Silence the percussion channel and close the port.
   */
  dispose(): void {
    if (this.disposed) return

    this.send(controlChange(PERCUSSION_CHANNEL, CC_ALL_NOTES_OFF, 0))
    this.closePort()

    this.midi = null
    this.selectedDevice = null
    this.disposed = true
  }

  // ===========================================================================
  // LiveSink Implementation
  // ===========================================================================

  sendNoteOn(channel: number, note: number, velocity: number): void {
    this.send(noteOn(channel, note, velocity))
  }

  sendNoteOff(channel: number, note: number, velocity: number): void {
    this.send(noteOff(channel, note, velocity))
  }

  // ===========================================================================
  // Device Selection
  // ===========================================================================

  /**
   * List available MIDI outputs.
   */
  async listOutputs(): Promise<MIDIDevice[]> {
    const midi = await this.engine()
    if (!midi) return []
    return readOutputs(midi.info())
  }

  /**
   * Open a MIDI output by device ID, closing the current one.
   */
  async selectOutput(deviceId: string): Promise<boolean> {
    if (this.disposed) return false

    const midi = await this.engine()
    if (!midi) return false

    const device = readOutputs(midi.info()).find(o => o.id === deviceId)
    if (!device) return false

    try {
      const port: unknown = midi.openMidiOut(parseInt(deviceId, 10))
      if (!isOutputPort(port)) {
        console.warn(`NodeMIDIOutput: Output "${device.name}" did not open`)
        return false
      }
      this.closePort()
      this.midiOutput = port
      this.selectedDevice = device
      return true
    } catch (err) {
      console.warn('NodeMIDIOutput: Failed to open MIDI output:', err)
      return false
    }
  }

  getSelectedOutput(): MIDIDevice | null {
    return this.selectedDevice
  }

  getOutputName(): string | null {
    return this.selectedDevice?.name ?? null
  }

  /**
   * True while an output is open.
   */
  isReady(): boolean {
    return this.initialized && !this.disposed && this.midiOutput !== null
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async engine(): Promise<MidiEngine | null> {
    if (this.midi) return this.midi
    if (this.disposed) return null

    try {
      // The engine is a thenable that resolves once jzz has scanned ports.
      const engine = await Promise.resolve<unknown>(JZZ())
      if (!isMidiEngine(engine)) {
        console.warn('NodeMIDIOutput: JZZ returned an unusable engine')
        return null
      }
      this.midi = engine
      return engine
    } catch (err) {
      console.warn('NodeMIDIOutput: JZZ unavailable:', err)
      return null
    }
  }

  private send(message: Uint8Array): void {
    if (!this.midiOutput || this.disposed) return
    try {
      this.midiOutput.send(Array.from(message))
    } catch (err) {
      console.warn('NodeMIDIOutput: send failed:', err)
    }
  }

  private closePort(): void {
    if (!this.midiOutput) return
    try {
      this.midiOutput.close()
    } catch (err) {
      console.warn('NodeMIDIOutput: close failed:', err)
    }
    this.midiOutput = null
  }
}
