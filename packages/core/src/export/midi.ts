// =============================================================================
// drumgrid - MIDI File Export
// =============================================================================

import { DEFAULT_TICKS_PER_BEAT } from '../constants'
import { TriggerEmitter } from '../emitter/TriggerEmitter'
import type { TimedNoteEvent } from '../emitter/TriggerEmitter'
import { EmptyFilenameError, WriteFailureError } from '../errors'
import type { Pattern } from '../pattern/Pattern'
import type { FileSink } from '../runtime/types'
import { validate } from '../validation/runtime'
import type {
  MidiEncodeOptions,
  MidiEncodeResult,
  MidiExportOptions,
  MidiExportResult
} from './types'
import {
  concatArrays,
  endOfTrackMeta,
  noteOff,
  noteOn,
  tempoMeta,
  ticksPerStep as stepTicks,
  writeAscii,
  writeUint16BE,
  writeUint32BE,
  writeVLQ
} from './midi-utils'

/** Events are stateless in export mode; one emitter serves every call. */
const exportEmitter = new TriggerEmitter()

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encode a pattern as a single-track Standard MIDI File (format 0).
 *
 * The track holds a tempo event, then each step in order with its active
 * voices in table order, then End of Track. Every step spans exactly
 * `ticksPerBeat / 4` ticks whatever its density.
 *
 * @example
 * ```typescript
 * const { bytes } = encodePattern(pattern, { bpm: 120 })
 * ```
 */
export function encodePattern<V extends string>(
  pattern: Pattern<V>,
  options: MidiEncodeOptions
): MidiEncodeResult {
  const ticksPerBeat = options.ticksPerBeat ?? DEFAULT_TICKS_PER_BEAT
  validate.bpm(options.bpm)
  validate.ticksPerBeat(ticksPerBeat)

  const ticksPerStep = stepTicks(ticksPerBeat)
  const events = patternEvents(pattern, ticksPerStep)

  const chunks: Uint8Array[] = [writeVLQ(0), tempoMeta(options.bpm)]
  let durationTicks = 0

  for (const event of events) {
    durationTicks += event.delta
    chunks.push(writeVLQ(event.delta), encodeEvent(event))
  }

  chunks.push(writeVLQ(0), endOfTrackMeta())

  const trackData = concatArrays(...chunks)
  const bytes = concatArrays(
    buildHeader(ticksPerBeat),
    writeAscii('MTrk'),
    writeUint32BE(trackData.length),
    trackData
  )

  return {
    bytes,
    ticksPerBeat,
    ticksPerStep,
    durationTicks,
    eventCount: events.length
  }
}

/**
 * Delta-timed events of the whole pattern, step by step.
 */
export function patternEvents<V extends string>(
  pattern: Pattern<V>,
  ticksPerStep: number
): TimedNoteEvent[] {
  const events: TimedNoteEvent[] = []
  for (let step = 0; step < pattern.totalSteps; step++) {
    const notes = pattern.activeVoicesAt(step).map(voice => pattern.voices.noteFor(voice))
    events.push(...exportEmitter.stepEvents(notes, ticksPerStep))
  }
  return events
}

// =============================================================================
// Export
// =============================================================================

/**
 * Encode a pattern and hand the bytes to a file sink.
 *
 * @throws EmptyFilenameError if `filename` is blank
 * @throws WriteFailureError if the sink rejects
 */
export async function exportPattern<V extends string>(
  pattern: Pattern<V>,
  options: MidiExportOptions,
  sink: FileSink
): Promise<MidiExportResult> {
  const { filename } = options
  if (filename.trim() === '') {
    throw new EmptyFilenameError()
  }

  const result = encodePattern(pattern, options)

  try {
    await sink.write(filename, result.bytes)
  } catch (err) {
    throw new WriteFailureError(filename, err)
  }

  return { ...result, filename }
}

// =============================================================================
// Private
// =============================================================================

function buildHeader(ticksPerBeat: number): Uint8Array {
  return concatArrays(
    writeAscii('MThd'),
    writeUint32BE(6),
    writeUint16BE(0), // format 0
    writeUint16BE(1), // one track
    writeUint16BE(ticksPerBeat)
  )
}

function encodeEvent(event: TimedNoteEvent): Uint8Array {
  return event.type === 'note_on'
    ? noteOn(event.channel, event.note, event.velocity)
    : noteOff(event.channel, event.note, event.velocity)
}
