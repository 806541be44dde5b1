// =============================================================================
// drumgrid - Standard MIDI File Parser
// =============================================================================
// Reads SMF bytes back into absolute-tick events. Used to inspect exported
// patterns; channel messages other than notes and CC are skipped.

// --- MIDI File Structure Types ---

export type SmfFormat = 0 | 1 | 2

export interface MidiFile {
  format: SmfFormat
  trackCount: number
  /** Pulses (ticks) per quarter note */
  ppq: number
  tracks: MidiTrack[]
}

export interface MidiTrack {
  /** Events in file order */
  events: MidiEvent[]
}

// --- MIDI Event Types ---

export type MidiEvent =
  | MidiNoteOnEvent
  | MidiNoteOffEvent
  | MidiControlChangeEvent
  | MidiMetaEvent

interface BaseMidiEvent {
  /** Delta-time as stored in the file */
  delta: number
  /** Absolute tick position (accumulated delta times) */
  tick: number
}

export interface MidiNoteOnEvent extends BaseMidiEvent {
  type: 'note_on'
  channel: number
  note: number
  velocity: number
}

export interface MidiNoteOffEvent extends BaseMidiEvent {
  type: 'note_off'
  channel: number
  note: number
  velocity: number
}

export interface MidiControlChangeEvent extends BaseMidiEvent {
  type: 'control_change'
  channel: number
  controller: number
  value: number
}

export interface MidiMetaEvent extends BaseMidiEvent {
  type: 'meta'
  metaType: number
  data: Uint8Array
  /** Microseconds per quarter note, for Set Tempo events */
  microsPerBeat?: number
}

// --- Meta Event Types ---
export const META_END_OF_TRACK = 0x2F
export const META_SET_TEMPO = 0x51

// --- Parser Implementation ---

/**
 * Parse a Standard MIDI File.
 *
 * @throws Error if the data is not a valid PPQ-timed SMF
 */
export function parseMidiBuffer(input: ArrayBuffer | Uint8Array): MidiFile {
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input)
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  let offset = 0

  // --- Header Chunk (MThd) ---
  const headerChunkId = readChunkId(bytes, offset)
  if (headerChunkId !== 'MThd') {
    throw new Error(`Invalid MIDI file: expected 'MThd' header, got '${headerChunkId}'`)
  }
  offset += 4

  const headerLength = view.getUint32(offset, false)
  offset += 4
  if (headerLength < 6) {
    throw new Error(`Invalid MIDI header length: ${headerLength}`)
  }

  const format = view.getUint16(offset, false)
  if (!isSmfFormat(format)) {
    throw new Error(`Unsupported MIDI format: ${format}`)
  }
  const trackCount = view.getUint16(offset + 2, false)
  const timeDivision = view.getUint16(offset + 4, false)
  if (timeDivision & 0x8000) {
    throw new Error('SMPTE timing is not supported, only PPQ (ticks per quarter note)')
  }
  offset += headerLength

  // --- Track Chunks (MTrk) ---
  const tracks: MidiTrack[] = []

  for (let i = 0; i < trackCount; i++) {
    if (offset + 8 > bytes.length) {
      throw new Error(`Unexpected end of file: expected ${trackCount} tracks, found ${i}`)
    }

    const trackChunkId = readChunkId(bytes, offset)
    if (trackChunkId !== 'MTrk') {
      throw new Error(`Invalid track chunk: expected 'MTrk', got '${trackChunkId}' at offset ${offset}`)
    }
    const trackLength = view.getUint32(offset + 4, false)
    offset += 8

    const trackEnd = offset + trackLength
    if (trackEnd > bytes.length) {
      throw new Error(`Track ${i} extends beyond file: needs ${trackEnd}, have ${bytes.length}`)
    }

    tracks.push(parseTrack(bytes, offset, trackEnd))
    offset = trackEnd
  }

  return { format, trackCount, ppq: timeDivision, tracks }
}

function isSmfFormat(value: number): value is SmfFormat {
  return value === 0 || value === 1 || value === 2
}

function parseTrack(bytes: Uint8Array, start: number, end: number): MidiTrack {
  const events: MidiEvent[] = []
  let offset = start
  let tick = 0
  let runningStatus = 0

  while (offset < end) {
    const deltaResult = readVLQ(bytes, offset, end)
    const delta = deltaResult.value
    tick += delta
    offset += deltaResult.bytesRead

    requireBytes(offset, 1, end)
    let status = bytes[offset]

    // Status byte < 0x80 means the previous channel status is reused
    if (status < 0x80) {
      if (runningStatus === 0) {
        throw new Error(`Invalid running status at offset ${offset}`)
      }
      status = runningStatus
    } else {
      offset++
      runningStatus = status < 0xF0 ? status : 0
    }

    const channel = status & 0x0F

    if (status === 0xFF) {
      requireBytes(offset, 1, end)
      const metaType = bytes[offset++]
      const lengthResult = readVLQ(bytes, offset, end)
      offset += lengthResult.bytesRead
      requireBytes(offset, lengthResult.value, end)
      const data = bytes.slice(offset, offset + lengthResult.value)
      offset += lengthResult.value

      const event: MidiMetaEvent = { type: 'meta', delta, tick, metaType, data }
      if (metaType === META_SET_TEMPO && data.length === 3) {
        event.microsPerBeat = (data[0] << 16) | (data[1] << 8) | data[2]
      }
      events.push(event)

      if (metaType === META_END_OF_TRACK) break
      continue
    }

    if (status === 0xF0 || status === 0xF7) {
      // SysEx - skip
      const lengthResult = readVLQ(bytes, offset, end)
      offset += lengthResult.bytesRead
      requireBytes(offset, lengthResult.value, end)
      offset += lengthResult.value
      continue
    }

    requireBytes(offset, channelDataLength(status), end)

    switch (status & 0xF0) {
      case 0x80:
        events.push({ type: 'note_off', delta, tick, channel, note: bytes[offset], velocity: bytes[offset + 1] })
        offset += 2
        break
      case 0x90:
        events.push({ type: 'note_on', delta, tick, channel, note: bytes[offset], velocity: bytes[offset + 1] })
        offset += 2
        break
      case 0xB0:
        events.push({ type: 'control_change', delta, tick, channel, controller: bytes[offset], value: bytes[offset + 1] })
        offset += 2
        break
      case 0xC0: // Program Change
      case 0xD0: // Channel Pressure
        offset += 1
        break
      default: // Poly Pressure, Pitch Bend
        offset += 2
        break
    }
  }

  return { events }
}

/** Data bytes following a channel status byte. */
function channelDataLength(status: number): number {
  const kind = status & 0xF0
  return kind === 0xC0 || kind === 0xD0 ? 1 : 2
}

function requireBytes(offset: number, count: number, end: number): void {
  if (offset + count > end) {
    throw new Error(`Unexpected end of track: ${count} byte(s) needed at offset ${offset}`)
  }
}

/**
 * Read a Variable Length Quantity (VLQ).
 *
 * @param end - Offset the quantity must end before (default: end of data)
 * @throws Error if the quantity is cut off or longer than 4 bytes
 */
export function readVLQ(
  bytes: Uint8Array,
  offset: number,
  end: number = bytes.length
): { value: number; bytesRead: number } {
  let value = 0
  let bytesRead = 0

  while (true) {
    requireBytes(offset + bytesRead, 1, end)
    const byte = bytes[offset + bytesRead]
    bytesRead++

    value = (value << 7) | (byte & 0x7F)

    if ((byte & 0x80) === 0) break

    if (bytesRead >= 4) {
      throw new Error(`Invalid VLQ: too many bytes at offset ${offset}`)
    }
  }

  return { value, bytesRead }
}

function readChunkId(bytes: Uint8Array, offset: number): string {
  return String.fromCharCode(
    bytes[offset],
    bytes[offset + 1],
    bytes[offset + 2],
    bytes[offset + 3]
  )
}
