// =============================================================================
// drumgrid - Trigger Emitter
// =============================================================================
// Turns "note is triggered" into a note-on/note-off pair, either sent to the
// live sink right away or returned as delta-timed events for file export.

import {
  DEFAULT_GATE_MS,
  PERCUSSION_CHANNEL,
  PLACEHOLDER_NOTE,
  PLACEHOLDER_VELOCITY,
  TRIGGER_VELOCITY
} from '../constants'
import type { LiveSink } from '../runtime/types'
import { validate } from '../validation/runtime'

// =============================================================================
// Types
// =============================================================================

export interface TriggerEmitterOptions {
  /** Live sink; null leaves the emitter silent */
  sink?: LiveSink | null
  /** Milliseconds between a live note-on and its note-off (default: 100) */
  gateMs?: number
}

/**
 * A note message tagged with its delta-time in file ticks.
 */
export interface TimedNoteEvent {
  type: 'note_on' | 'note_off'
  /** Ticks since the previous event in the track */
  delta: number
  /** MIDI channel (0-15) */
  channel: number
  note: number
  velocity: number
}

interface PendingNoteOff {
  timeout: ReturnType<typeof setTimeout>
  note: number
}

// =============================================================================
// TriggerEmitter
// =============================================================================

export class TriggerEmitter {
  private sink: LiveSink | null
  private readonly gateMs: number
  private pending = new Set<PendingNoteOff>()

  constructor(options: TriggerEmitterOptions = {}) {
    this.sink = options.sink ?? null
    this.gateMs = options.gateMs ?? DEFAULT_GATE_MS
    validate.nonNegativeInteger('gateMs', this.gateMs)
  }

  // ===========================================================================
  // Live Mode
  // ===========================================================================

  /**
   * Replace the live sink. Pending note-offs go to the old sink first.
   */
  setSink(sink: LiveSink | null): void {
    this.flush()
    this.sink = sink
  }

  hasSink(): boolean {
    return this.sink !== null
  }

  /** Note-offs waiting for their gate to elapse. */
  get pendingCount(): number {
    return this.pending.size
  }

  /**
   * Send note-on now and note-off after the gate.
   * Does nothing while no sink is attached.
   */
  trigger(note: number): void {
    if (!this.sink) return

    this.send('on', note)

    if (this.gateMs === 0) {
      this.send('off', note)
      return
    }

    const entry: PendingNoteOff = {
      note,
      timeout: setTimeout(() => {
        this.pending.delete(entry)
        this.send('off', note)
      }, this.gateMs)
    }
    this.pending.add(entry)
  }

  /**
   * Send every pending note-off immediately.
   */
  flush(): void {
    const entries = [...this.pending]
    this.pending.clear()
    for (const entry of entries) {
      clearTimeout(entry.timeout)
      this.send('off', entry.note)
    }
  }

  dispose(): void {
    this.flush()
    this.sink = null
  }

  // Sink errors are logged and dropped.
  private send(kind: 'on' | 'off', note: number): void {
    const sink = this.sink
    if (!sink) return
    try {
      if (kind === 'on') {
        sink.sendNoteOn(PERCUSSION_CHANNEL, note, TRIGGER_VELOCITY)
      } else {
        sink.sendNoteOff(PERCUSSION_CHANNEL, note, TRIGGER_VELOCITY)
      }
    } catch (err) {
      console.warn(`TriggerEmitter: note ${kind} ${note} failed:`, err)
    }
  }

  // ===========================================================================
  // Export Mode
  // ===========================================================================

  /**
   * Events for one step of an exported track.
   *
   * The first event of the step carries the whole step length and the rest
   * carry 0. A step without notes still advances the timeline through a
   * placeholder note-off.
   */
  stepEvents(notes: readonly number[], ticksPerStep: number): TimedNoteEvent[] {
    if (notes.length === 0) {
      return [{
        type: 'note_off',
        delta: ticksPerStep,
        channel: PERCUSSION_CHANNEL,
        note: PLACEHOLDER_NOTE,
        velocity: PLACEHOLDER_VELOCITY
      }]
    }

    const events: TimedNoteEvent[] = []
    for (const note of notes) {
      events.push({
        type: 'note_on',
        delta: events.length === 0 ? ticksPerStep : 0,
        channel: PERCUSSION_CHANNEL,
        note,
        velocity: TRIGGER_VELOCITY
      })
      events.push({
        type: 'note_off',
        delta: 0,
        channel: PERCUSSION_CHANNEL,
        note,
        velocity: TRIGGER_VELOCITY
      })
    }
    return events
  }
}
