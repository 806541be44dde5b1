/**
 * VoiceTable and General MIDI kit tests.
 */

import { UnknownVoiceError, VoiceTableError } from '../errors'
import { GM_DRUM_VOICES, createDrumVoiceTable } from '../voices/gm'
import { VoiceTable } from '../voices/VoiceTable'

describe('VoiceTable', () => {
  it('keeps insertion order', () => {
    const table = new VoiceTable([
      { voice: 'snare', note: 38 },
      { voice: 'kick', note: 36 }
    ])
    expect(table.voices).toEqual(['snare', 'kick'])
    expect(table.indexOf('kick')).toBe(1)
    expect(table.size).toBe(2)
  })

  it('maps voices to notes', () => {
    const table = new VoiceTable([{ voice: 'kick', note: 36 }])
    expect(table.noteFor('kick')).toBe(36)
  })

  it('iterates entries in order', () => {
    const table = new VoiceTable([
      { voice: 'kick', note: 36 },
      { voice: 'snare', note: 38 }
    ])
    expect([...table]).toEqual([
      { voice: 'kick', note: 36 },
      { voice: 'snare', note: 38 }
    ])
  })

  it('narrows strings with has()', () => {
    const table = new VoiceTable([{ voice: 'kick', note: 36 }])
    expect(table.has('kick')).toBe(true)
    expect(table.has('cowbell')).toBe(false)
  })

  it('rejects duplicate voices', () => {
    expect(() => new VoiceTable([
      { voice: 'kick', note: 36 },
      { voice: 'kick', note: 35 }
    ])).toThrow(VoiceTableError)
  })

  it('rejects notes outside 0-127', () => {
    expect(() => new VoiceTable([{ voice: 'kick', note: 128 }]))
      .toThrow("VoiceTable: note for 'kick' must be 0-127, got 128")
    expect(() => new VoiceTable([{ voice: 'kick', note: -1 }])).toThrow(VoiceTableError)
    expect(() => new VoiceTable([{ voice: 'kick', note: 36.5 }])).toThrow(VoiceTableError)
  })

  it('throws UnknownVoiceError for voices outside the table', () => {
    const table = new VoiceTable<string>([{ voice: 'kick', note: 36 }])
    expect(() => table.noteFor('cowbell')).toThrow(UnknownVoiceError)
    expect(() => table.indexOf('cowbell')).toThrow("VoiceTable: unknown voice 'cowbell'")
  })

  it('is not affected by later changes to the source array', () => {
    const entries = [{ voice: 'kick', note: 36 }]
    const table = new VoiceTable(entries)
    entries[0].note = 35
    expect(table.noteFor('kick')).toBe(36)
  })
})

describe('General MIDI kit', () => {
  it('has nine voices in row order', () => {
    const table = createDrumVoiceTable()
    expect(table.voices).toEqual([
      'kick', 'snare', 'closed_hat', 'open_hat',
      'low_tom', 'mid_tom', 'high_tom', 'crash', 'ride'
    ])
  })

  it('uses the General MIDI percussion notes', () => {
    const table = createDrumVoiceTable()
    expect(table.voices.map(v => table.noteFor(v))).toEqual([36, 38, 42, 46, 45, 47, 50, 49, 51])
    expect(GM_DRUM_VOICES).toHaveLength(9)
  })
})
