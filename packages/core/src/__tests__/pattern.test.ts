/**
 * Pattern store tests.
 */

import { ConfigValidationError, OutOfRangeError } from '../errors'
import { Pattern } from '../pattern/Pattern'
import type { PatternChange } from '../pattern/Pattern'
import { createKickSnareTable } from './helpers'

// =============================================================================
// Length
// =============================================================================

describe('Pattern length', () => {
  it('starts empty', () => {
    const pattern = new Pattern(createKickSnareTable())
    expect(pattern.totalSteps).toBe(0)
    expect(pattern.groupCount).toBe(0)
    expect(pattern.stepsFor('kick')).toEqual([])
  })

  it('grows by one group per addGroup', () => {
    const pattern = new Pattern(createKickSnareTable())
    expect(pattern.addGroup()).toBe(16)
    expect(pattern.addGroup()).toBe(32)
    expect(pattern.addGroup()).toBe(48)
    expect(pattern.groupCount).toBe(3)
    expect(pattern.stepsFor('kick')).toHaveLength(48)
    expect(pattern.stepsFor('snare')).toHaveLength(48)
  })

  it('appends off steps and keeps existing cells', () => {
    const pattern = new Pattern(createKickSnareTable())
    pattern.addGroup()
    pattern.toggle('kick', 15, true)
    pattern.addGroup()
    expect(pattern.isActive('kick', 15)).toBe(true)
    expect(pattern.stepsFor('kick').slice(16)).toEqual(new Array(16).fill(false))
  })

  it('honours a custom group size', () => {
    const pattern = new Pattern(createKickSnareTable(), { groupSize: 8 })
    pattern.addGroup()
    pattern.addGroup()
    expect(pattern.totalSteps).toBe(16)
    expect(pattern.groupCount).toBe(2)
  })

  it('rejects a group size below 1', () => {
    expect(() => new Pattern(createKickSnareTable(), { groupSize: 0 })).toThrow(ConfigValidationError)
  })
})

// =============================================================================
// Cells
// =============================================================================

describe('Pattern cells', () => {
  it('reads back what was toggled', () => {
    const pattern = new Pattern(createKickSnareTable())
    pattern.addGroup()
    pattern.toggle('snare', 4, true)
    expect(pattern.isActive('snare', 4)).toBe(true)
    expect(pattern.isActive('kick', 4)).toBe(false)
    pattern.toggle('snare', 4, false)
    expect(pattern.isActive('snare', 4)).toBe(false)
  })

  it('setting a cell twice is the same as once', () => {
    const pattern = new Pattern(createKickSnareTable())
    pattern.addGroup()
    pattern.toggle('kick', 0, true)
    pattern.toggle('kick', 0, true)
    expect(pattern.isActive('kick', 0)).toBe(true)
  })

  it('throws OutOfRangeError past the end and leaves the grid untouched', () => {
    const pattern = new Pattern(createKickSnareTable())
    pattern.addGroup()
    const before = pattern.stepsFor('kick')

    expect(() => pattern.toggle('kick', 16, true)).toThrow(OutOfRangeError)
    expect(() => pattern.toggle('kick', -1, true)).toThrow(OutOfRangeError)
    expect(() => pattern.toggle('kick', 1.5, true)).toThrow(OutOfRangeError)
    expect(pattern.stepsFor('kick')).toEqual(before)
  })

  it('describes the failing cell', () => {
    const pattern = new Pattern(createKickSnareTable())
    pattern.addGroup()
    expect(() => pattern.isActive('snare', 20))
      .toThrow("Pattern: step 20 of 'snare' is out of range [0, 16)")
  })

  it('rejects every step of an empty pattern', () => {
    const pattern = new Pattern(createKickSnareTable())
    expect(() => pattern.isActive('kick', 0)).toThrow(OutOfRangeError)
  })

  it('lists active voices in table order', () => {
    const pattern = new Pattern(createKickSnareTable())
    pattern.addGroup()
    pattern.toggle('snare', 3, true)
    pattern.toggle('kick', 3, true)
    expect(pattern.activeVoicesAt(3)).toEqual(['kick', 'snare'])
    expect(pattern.activeVoicesAt(2)).toEqual([])
    expect(() => pattern.activeVoicesAt(16)).toThrow('Pattern: step 16 is out of range [0, 16)')
  })

  it('clears every cell and keeps the length', () => {
    const pattern = new Pattern(createKickSnareTable())
    pattern.addGroup()
    pattern.toggle('kick', 0, true)
    pattern.toggle('snare', 8, true)
    pattern.clear()
    expect(pattern.totalSteps).toBe(16)
    expect(pattern.stepsFor('kick')).toEqual(new Array(16).fill(false))
    expect(pattern.stepsFor('snare')).toEqual(new Array(16).fill(false))
  })
})

// =============================================================================
// Change Notifications
// =============================================================================

describe('Pattern.onChange', () => {
  it('reports groups, toggles and clears', () => {
    const pattern = new Pattern(createKickSnareTable())
    const changes: Array<PatternChange<'kick' | 'snare'>> = []
    pattern.onChange(change => changes.push(change))

    pattern.addGroup()
    pattern.toggle('kick', 2, true)
    pattern.clear()

    expect(changes).toEqual([
      { kind: 'group', totalSteps: 16 },
      { kind: 'toggle', voice: 'kick', step: 2, on: true },
      { kind: 'clear' }
    ])
  })

  it('does not report a rejected toggle', () => {
    const pattern = new Pattern(createKickSnareTable())
    const listener = jest.fn()
    pattern.onChange(listener)
    expect(() => pattern.toggle('kick', 0, true)).toThrow(OutOfRangeError)
    expect(listener).not.toHaveBeenCalled()
  })

  it('stops after unsubscribe', () => {
    const pattern = new Pattern(createKickSnareTable())
    const listener = jest.fn()
    const unsubscribe = pattern.onChange(listener)
    unsubscribe()
    pattern.addGroup()
    expect(listener).not.toHaveBeenCalled()
  })
})
