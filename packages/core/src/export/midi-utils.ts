// =============================================================================
// drumgrid - MIDI Byte Utilities
// =============================================================================

import { STEPS_PER_BEAT } from '../constants'

// =============================================================================
// Variable Length Quantity (VLQ) Encoding
// =============================================================================

/** Largest value a 4-byte VLQ can hold (28 bits). */
export const MAX_VLQ = 0x0FFFFFFF

/**
 * Encode a number as a Variable Length Quantity (VLQ).
 *
 * Each byte: bit 7 = continuation flag (1 = more bytes follow), bits 0-6 = value.
 * Maximum 4 bytes (28-bit value).
 */
export function writeVLQ(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > MAX_VLQ) {
    throw new RangeError(`VLQ value must be an integer in [0, ${MAX_VLQ}]: ${value}`)
  }

  // Least significant group last, without the continuation bit
  const bytes: number[] = [value & 0x7F]
  let remaining = value >>> 7

  while (remaining > 0) {
    bytes.unshift((remaining & 0x7F) | 0x80)
    remaining >>>= 7
  }

  return new Uint8Array(bytes)
}

/**
 * Byte length of a VLQ-encoded value without encoding it.
 */
export function vlqLength(value: number): number {
  if (value < 0x80) return 1
  if (value < 0x4000) return 2
  if (value < 0x200000) return 3
  return 4
}

// =============================================================================
// Time Conversion
// =============================================================================

/**
 * Microseconds per quarter note, as carried by the Set Tempo meta event.
 */
export function bpmToMicrosPerBeat(bpm: number): number {
  return Math.round(60_000_000 / bpm)
}

/**
 * File ticks occupied by one sixteenth-note step.
 */
export function ticksPerStep(ticksPerBeat: number): number {
  return Math.floor(ticksPerBeat / STEPS_PER_BEAT)
}

// =============================================================================
// Binary Writing
// =============================================================================

export function writeUint16BE(value: number): Uint8Array {
  return new Uint8Array([
    (value >> 8) & 0xFF,
    value & 0xFF
  ])
}

export function writeUint24BE(value: number): Uint8Array {
  return new Uint8Array([
    (value >> 16) & 0xFF,
    (value >> 8) & 0xFF,
    value & 0xFF
  ])
}

export function writeUint32BE(value: number): Uint8Array {
  return new Uint8Array([
    (value >>> 24) & 0xFF,
    (value >> 16) & 0xFF,
    (value >> 8) & 0xFF,
    value & 0xFF
  ])
}

/**
 * Chunk identifiers ("MThd", "MTrk").
 */
export function writeAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length)
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0x7F
  }
  return bytes
}

export function concatArrays(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0)
  const result = new Uint8Array(totalLength)
  let offset = 0
  for (const arr of arrays) {
    result.set(arr, offset)
    offset += arr.length
  }
  return result
}

// =============================================================================
// MIDI Message Builders
// =============================================================================

/** Channel message status nibbles */
export const STATUS_NOTE_OFF = 0x80
export const STATUS_NOTE_ON = 0x90
export const STATUS_CONTROL_CHANGE = 0xB0

/** CC 123: All Notes Off */
export const CC_ALL_NOTES_OFF = 123

/**
 * @param channel - MIDI channel (0-15)
 * @param note - MIDI note number (0-127)
 * @param velocity - Note velocity (0-127)
 */
export function noteOn(channel: number, note: number, velocity: number): Uint8Array {
  return new Uint8Array([
    STATUS_NOTE_ON | (channel & 0x0F),
    note & 0x7F,
    velocity & 0x7F
  ])
}

/**
 * @param channel - MIDI channel (0-15)
 * @param note - MIDI note number (0-127)
 * @param velocity - Release velocity (0-127)
 */
export function noteOff(channel: number, note: number, velocity: number = 0): Uint8Array {
  return new Uint8Array([
    STATUS_NOTE_OFF | (channel & 0x0F),
    note & 0x7F,
    velocity & 0x7F
  ])
}

export function controlChange(channel: number, controller: number, value: number): Uint8Array {
  return new Uint8Array([
    STATUS_CONTROL_CHANGE | (channel & 0x0F),
    controller & 0x7F,
    value & 0x7F
  ])
}

// =============================================================================
// Meta Events
// =============================================================================

/**
 * Set Tempo meta event: FF 51 03 tttttt.
 */
export function tempoMeta(bpm: number): Uint8Array {
  return concatArrays(
    new Uint8Array([0xFF, 0x51, 0x03]),
    writeUint24BE(bpmToMicrosPerBeat(bpm))
  )
}

/**
 * End of Track meta event: FF 2F 00.
 */
export function endOfTrackMeta(): Uint8Array {
  return new Uint8Array([0xFF, 0x2F, 0x00])
}
