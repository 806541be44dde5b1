// =============================================================================
// drumgrid - DrumMachine
// =============================================================================
// Headless drum machine: owns the pattern, clock and emitter, and exposes
// what a grid front end needs (cell toggles with preview, transport, export).

import {
  DEFAULT_BPM,
  DEFAULT_FILENAME,
  DEFAULT_GATE_MS,
  DEFAULT_TICKS_PER_BEAT,
  GROUP_SIZE
} from '../constants'
import { PlaybackClock } from '../clock/PlaybackClock'
import type { ClockState, ClockStepListener } from '../clock/PlaybackClock'
import { renderPatternAscii } from '../debug/ascii'
import { TriggerEmitter } from '../emitter/TriggerEmitter'
import { MissingFileSinkError } from '../errors'
import { encodePattern, exportPattern } from '../export/midi'
import type { MidiEncodeResult, MidiExportResult } from '../export/types'
import { Pattern } from '../pattern/Pattern'
import type { FileSink, LiveSink } from '../runtime/types'
import { validate } from '../validation/runtime'
import { createDrumVoiceTable } from '../voices/gm'
import type { DrumVoice } from '../voices/gm'
import type { VoiceTable } from '../voices/VoiceTable'

// =============================================================================
// Types
// =============================================================================

/**
 * A live sink that holds a device and must be released.
 */
export interface DisposableLiveSink extends LiveSink {
  dispose(): void
}

export interface DrumMachineOptions<V extends string> {
  /** Voice table (rows, in order) */
  voices: VoiceTable<V>
  /** Groups created up front (default: 1) */
  groups?: number
  /** Steps per group (default: 16) */
  groupSize?: number
  /** Tempo in BPM (default: 120) */
  bpm?: number
  /** Export file name (default: 'drum_output.mid') */
  filename?: string
  /** File resolution (default: 480) */
  ticksPerBeat?: number
  /** Live note length in ms (default: 100) */
  gateMs?: number
  /** Live output; omit to run silently */
  liveSink?: LiveSink | DisposableLiveSink | null
  /** Export destination */
  fileSink?: FileSink | null
}

function isDisposable(sink: LiveSink): sink is DisposableLiveSink {
  return 'dispose' in sink && typeof sink.dispose === 'function'
}

// =============================================================================
// DrumMachine
// =============================================================================

/**
 * @example
 * ```typescript
 * const machine = DrumMachine.create({ liveSink: output, fileSink: new NodeFileSink() })
 * machine.setCell('kick', 0, true)
 * machine.play()
 * await machine.export()
 * ```
 */
export class DrumMachine<V extends string = string> {
  readonly pattern: Pattern<V>
  readonly clock: PlaybackClock<V>
  readonly emitter: TriggerEmitter

  private liveSink: LiveSink | null
  private fileSink: FileSink | null
  private _filename: string
  private readonly ticksPerBeat: number
  private disposed = false

  constructor(options: DrumMachineOptions<V>) {
    const groups = options.groups ?? 1
    validate.nonNegativeInteger('groups', groups)
    this.ticksPerBeat = options.ticksPerBeat ?? DEFAULT_TICKS_PER_BEAT
    validate.ticksPerBeat(this.ticksPerBeat)

    this.pattern = new Pattern(options.voices, { groupSize: options.groupSize ?? GROUP_SIZE })
    for (let i = 0; i < groups; i++) this.pattern.addGroup()

    this.liveSink = options.liveSink ?? null
    this.fileSink = options.fileSink ?? null
    this.emitter = new TriggerEmitter({
      sink: this.liveSink,
      gateMs: options.gateMs ?? DEFAULT_GATE_MS
    })
    this.clock = new PlaybackClock(this.pattern, this.emitter, { bpm: options.bpm ?? DEFAULT_BPM })
    this._filename = options.filename ?? DEFAULT_FILENAME
  }

  /**
   * Machine on the General MIDI nine-voice kit.
   */
  static create(options: Omit<DrumMachineOptions<DrumVoice>, 'voices'> = {}): DrumMachine<DrumVoice> {
    return new DrumMachine({ ...options, voices: createDrumVoiceTable() })
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get bpm(): number {
    return this.clock.bpm
  }

  get filename(): string {
    return this._filename
  }

  get state(): ClockState {
    return this.clock.state
  }

  get position(): number {
    return this.clock.position
  }

  // ===========================================================================
  // Editing
  // ===========================================================================

  /**
   * Set one cell. Switching a cell on previews its voice at once,
   * whether or not the clock is running.
   */
  setCell(voice: V, step: number, on: boolean): void {
    this.pattern.toggle(voice, step, on)
    if (on) {
      this.emitter.trigger(this.pattern.voices.noteFor(voice))
    }
  }

  isActive(voice: V, step: number): boolean {
    return this.pattern.isActive(voice, step)
  }

  addGroup(): number {
    return this.pattern.addGroup()
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  /**
   * @returns True if playback is running afterwards
   */
  play(bpm?: number): boolean {
    return this.clock.start(bpm)
  }

  pause(): void {
    this.clock.pause()
  }

  stop(): void {
    this.clock.stop()
  }

  setBpm(bpm: number): void {
    this.clock.setTempo(bpm)
  }

  onStep(listener: ClockStepListener<V>): () => void {
    return this.clock.onStep(listener)
  }

  // ===========================================================================
  // Output
  // ===========================================================================

  setLiveSink(sink: LiveSink | null): void {
    this.liveSink = sink
    this.emitter.setSink(sink)
  }

  setFileSink(sink: FileSink | null): void {
    this.fileSink = sink
  }

  setFilename(filename: string): void {
    this._filename = filename
  }

  encode(): MidiEncodeResult {
    return encodePattern(this.pattern, { bpm: this.bpm, ticksPerBeat: this.ticksPerBeat })
  }

  /**
   * Encode the pattern and write it through the file sink.
   *
   * @throws MissingFileSinkError if no file sink is configured
   */
  async export(filename: string = this._filename): Promise<MidiExportResult> {
    if (!this.fileSink) {
      throw new MissingFileSinkError()
    }
    return exportPattern(
      this.pattern,
      { filename, bpm: this.bpm, ticksPerBeat: this.ticksPerBeat },
      this.fileSink
    )
  }

  render(): string {
    return renderPatternAscii(this.pattern, {
      cursor: this.state === 'stopped' ? undefined : this.position
    })
  }

  /**
   * Stop playback, release pending notes and the live sink.
   */
  dispose(): void {
    if (this.disposed) return
    this.clock.stop()
    this.emitter.dispose()
    if (this.liveSink && isDisposable(this.liveSink)) {
      this.liveSink.dispose()
    }
    this.liveSink = null
    this.disposed = true
  }
}
