// =============================================================================
// drumgrid - Pattern Store
// =============================================================================
// Voice x step grid of on/off flags. Every voice row always has the same
// length; `addGroup()` is the only operation that changes it.

import { GROUP_SIZE } from '../constants'
import { OutOfRangeError } from '../errors'
import { validate } from '../validation/runtime'
import type { VoiceTable } from '../voices/VoiceTable'

// =============================================================================
// Types
// =============================================================================

export interface PatternOptions {
  /** Steps appended by each `addGroup()` (default: 16) */
  groupSize?: number
}

export type PatternChange<V extends string> =
  | { kind: 'toggle'; voice: V; step: number; on: boolean }
  | { kind: 'group'; totalSteps: number }
  | { kind: 'clear' }

export type PatternListener<V extends string> = (change: PatternChange<V>) => void

// =============================================================================
// Pattern
// =============================================================================

export class Pattern<V extends string = string> {
  readonly groupSize: number

  // One row per voice, in table order. Replaced wholesale on addGroup.
  private rows: Uint8Array[]
  private length = 0
  private listeners = new Set<PatternListener<V>>()

  constructor(
    readonly voices: VoiceTable<V>,
    options: PatternOptions = {}
  ) {
    const groupSize = options.groupSize ?? GROUP_SIZE
    validate.positiveInteger('groupSize', groupSize)
    this.groupSize = groupSize
    this.rows = voices.voices.map(() => new Uint8Array(0))
  }

  get totalSteps(): number {
    return this.length
  }

  get groupCount(): number {
    return this.totalSteps / this.groupSize
  }

  /**
   * Append one group of off steps to every voice.
   *
   * @returns The new total step count
   */
  addGroup(): number {
    const length = this.totalSteps + this.groupSize
    this.rows = this.rows.map(row => {
      const grown = new Uint8Array(length)
      grown.set(row)
      return grown
    })
    this.length = length
    this.notify({ kind: 'group', totalSteps: length })
    return length
  }

  toggle(voice: V, step: number, on: boolean): void {
    const row = this.rowFor(voice, step)
    row[step] = on ? 1 : 0
    this.notify({ kind: 'toggle', voice, step, on })
  }

  isActive(voice: V, step: number): boolean {
    return this.rowFor(voice, step)[step] === 1
  }

  /**
   * Active voices of one step, in voice table order.
   */
  activeVoicesAt(step: number): V[] {
    this.checkStep(step)
    const active: V[] = []
    this.voices.voices.forEach((voice, index) => {
      if (this.rows[index][step] === 1) active.push(voice)
    })
    return active
  }

  /**
   * Copy of one voice's row as booleans.
   */
  stepsFor(voice: V): boolean[] {
    return Array.from(this.rows[this.voices.indexOf(voice)], flag => flag === 1)
  }

  /**
   * Switch every cell off. The length is kept.
   */
  clear(): void {
    for (const row of this.rows) row.fill(0)
    this.notify({ kind: 'clear' })
  }

  /**
   * Subscribe to changes.
   *
   * @returns Unsubscribe function
   */
  onChange(listener: PatternListener<V>): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private rowFor(voice: V, step: number): Uint8Array {
    const row = this.rows[this.voices.indexOf(voice)]
    this.checkStep(step, voice)
    return row
  }

  private checkStep(step: number, voice?: V): void {
    if (!Number.isInteger(step) || step < 0 || step >= this.length) {
      throw new OutOfRangeError(step, this.length, voice)
    }
  }

  private notify(change: PatternChange<V>): void {
    for (const listener of this.listeners) listener(change)
  }
}
