// =============================================================================
// drumgrid - Export Module Public API
// =============================================================================

// --- MIDI Export ---
export { encodePattern, exportPattern, patternEvents } from './midi'

// --- Types ---
export type {
  MidiEncodeOptions,
  MidiEncodeResult,
  MidiExportOptions,
  MidiExportResult
} from './types'

// --- Utilities (for advanced use) ---
export {
  writeVLQ,
  vlqLength,
  bpmToMicrosPerBeat,
  ticksPerStep,

  // Message builders
  noteOn,
  noteOff,
  controlChange,
  CC_ALL_NOTES_OFF
} from './midi-utils'
