// =============================================================================
// drumgrid - Voice Table
// =============================================================================
// Immutable mapping from percussion voice to MIDI note number. Iteration
// order is insertion order; it decides row order and per-step emission order.

import { UnknownVoiceError, VoiceTableError } from '../errors'

// =============================================================================
// Types
// =============================================================================

export interface VoiceEntry<V extends string = string> {
  voice: V
  /** MIDI note number (0-127) */
  note: number
}

// =============================================================================
// VoiceTable
// =============================================================================

export class VoiceTable<V extends string = string> {
  private readonly entries: ReadonlyArray<VoiceEntry<V>>
  private readonly notes: ReadonlyMap<string, number>
  private readonly indices: ReadonlyMap<string, number>

  constructor(entries: ReadonlyArray<VoiceEntry<V>>) {
    const notes = new Map<string, number>()
    const indices = new Map<string, number>()

    entries.forEach(({ voice, note }, index) => {
      if (notes.has(voice)) {
        throw new VoiceTableError(`duplicate voice '${voice}'`)
      }
      if (!Number.isInteger(note) || note < 0 || note > 127) {
        throw new VoiceTableError(`note for '${voice}' must be 0-127, got ${note}`)
      }
      notes.set(voice, note)
      indices.set(voice, index)
    })

    this.entries = entries.map(({ voice, note }) => ({ voice, note }))
    this.notes = notes
    this.indices = indices
  }

  get size(): number {
    return this.entries.length
  }

  /** Voices in table order. */
  get voices(): V[] {
    return this.entries.map(e => e.voice)
  }

  noteFor(voice: V): number {
    const note = this.notes.get(voice)
    if (note === undefined) throw new UnknownVoiceError(voice)
    return note
  }

  indexOf(voice: V): number {
    const index = this.indices.get(voice)
    if (index === undefined) throw new UnknownVoiceError(voice)
    return index
  }

  has(voice: string): voice is V {
    return this.notes.has(voice)
  }

  [Symbol.iterator](): IterableIterator<VoiceEntry<V>> {
    return this.entries[Symbol.iterator]()
  }
}
