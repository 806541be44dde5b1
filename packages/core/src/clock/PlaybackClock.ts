// =============================================================================
// drumgrid - Playback Clock
// =============================================================================
// Periodic step scheduler. Each tick triggers the active voices of the
// cursor's step and moves the cursor one step, wrapping at the pattern end.
//
// Ticks are chained with setTimeout rather than setInterval so that a tempo
// change applies from the next tick without touching the pending one.

import { DEFAULT_BPM, STEPS_PER_BEAT } from '../constants'
import type { TriggerEmitter } from '../emitter/TriggerEmitter'
import type { Pattern } from '../pattern/Pattern'
import { validate } from '../validation/runtime'

// =============================================================================
// Types
// =============================================================================

export type ClockState = 'stopped' | 'playing' | 'paused'

export interface ClockStep<V extends string> {
  /** Step that was just played */
  step: number
  /** Voices triggered on that step, in table order */
  voices: V[]
}

export type ClockStepListener<V extends string> = (step: ClockStep<V>) => void

export interface PlaybackClockOptions {
  /** Initial tempo (default: 120) */
  bpm?: number
}

/**
 * Step interval in whole milliseconds: one sixteenth note at `bpm`.
 */
export function stepIntervalMs(bpm: number): number {
  return Math.floor(60_000 / (bpm * STEPS_PER_BEAT))
}

// =============================================================================
// PlaybackClock
// =============================================================================

export class PlaybackClock<V extends string = string> {
  private _state: ClockState = 'stopped'
  private cursor = 0
  private _bpm: number
  private timeoutId: ReturnType<typeof setTimeout> | null = null
  // Bumped on every stop/pause; a callback from an older run is ignored.
  private generation = 0
  private listeners = new Set<ClockStepListener<V>>()

  constructor(
    private readonly pattern: Pattern<V>,
    private readonly emitter: TriggerEmitter,
    options: PlaybackClockOptions = {}
  ) {
    this._bpm = options.bpm ?? DEFAULT_BPM
    validate.bpm(this._bpm)
  }

  get state(): ClockState {
    return this._state
  }

  /** Step the next tick will play. */
  get position(): number {
    return this.cursor
  }

  get bpm(): number {
    return this._bpm
  }

  get intervalMs(): number {
    return stepIntervalMs(this._bpm)
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  /**
   * Begin (or resume) ticking. Does nothing on an empty pattern.
   * While already playing, only the tempo is updated.
   *
   * @returns True if the clock is playing afterwards
   */
  start(bpm: number = this._bpm): boolean {
    validate.bpm(bpm)
    if (this.pattern.totalSteps === 0) return this._state === 'playing'

    this._bpm = bpm
    if (this._state === 'playing') return true

    this._state = 'playing'
    this.scheduleNext(this.generation)
    return true
  }

  /**
   * Change the tempo. The pending tick keeps its interval; the new one
   * applies from the tick after it.
   */
  setTempo(bpm: number): void {
    validate.bpm(bpm)
    this._bpm = bpm
  }

  pause(): void {
    if (this._state !== 'playing') return
    this.cancelTimer()
    this._state = 'paused'
  }

  stop(): void {
    this.cancelTimer()
    this._state = 'stopped'
    this.cursor = 0
    this.emitter.flush()
  }

  onStep(listener: ClockStepListener<V>): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private scheduleNext(generation: number): void {
    this.timeoutId = setTimeout(() => {
      this.timeoutId = null
      if (generation !== this.generation || this._state !== 'playing') return
      this.tick()
      this.scheduleNext(generation)
    }, this.intervalMs)
  }

  private cancelTimer(): void {
    this.generation++
    if (this.timeoutId !== null) {
      clearTimeout(this.timeoutId)
      this.timeoutId = null
    }
  }

  private tick(): void {
    const totalSteps = this.pattern.totalSteps
    if (totalSteps === 0) return

    const step = this.cursor % totalSteps
    const voices = this.pattern.activeVoicesAt(step)

    for (const voice of voices) {
      this.emitter.trigger(this.pattern.voices.noteFor(voice))
    }

    this.cursor = (step + 1) % totalSteps

    for (const listener of this.listeners) {
      try {
        listener({ step, voices })
      } catch (err) {
        console.warn('PlaybackClock: step listener failed:', err)
      }
    }
  }
}
