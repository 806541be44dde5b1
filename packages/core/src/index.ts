// =============================================================================
// @drumgrid/core - Public API
// Step sequencer: voices, pattern, playback clock, MIDI file export
// =============================================================================

// --- Constants ---
export {
  GROUP_SIZE,
  STEPS_PER_BEAT,
  DEFAULT_TICKS_PER_BEAT,
  MAX_TICKS_PER_BEAT,
  MIN_BPM,
  MAX_BPM,
  DEFAULT_BPM,
  PERCUSSION_CHANNEL,
  TRIGGER_VELOCITY,
  DEFAULT_GATE_MS,
  DEFAULT_FILENAME
} from './constants'

// --- Errors ---
export {
  OutOfRangeError,
  EmptyFilenameError,
  WriteFailureError,
  MissingFileSinkError,
  ConfigValidationError,
  VoiceTableError,
  UnknownVoiceError
} from './errors'

// --- Voices ---
export { VoiceTable, GM_DRUM_VOICES, createDrumVoiceTable } from './voices/index'
export type { VoiceEntry, DrumVoice } from './voices/index'

// --- Pattern ---
export { Pattern } from './pattern/Pattern'
export type { PatternOptions, PatternChange, PatternListener } from './pattern/Pattern'

// --- Emitter ---
export { TriggerEmitter } from './emitter/TriggerEmitter'
export type { TriggerEmitterOptions, TimedNoteEvent } from './emitter/TriggerEmitter'

// --- Clock ---
export { PlaybackClock, stepIntervalMs } from './clock/PlaybackClock'
export type { ClockState, ClockStep, ClockStepListener, PlaybackClockOptions } from './clock/PlaybackClock'

// --- Export / Import ---
export * from './export/index'
export * from './import/index'

// --- Machine ---
export { DrumMachine } from './machine/DrumMachine'
export type { DrumMachineOptions, DisposableLiveSink } from './machine/DrumMachine'

// --- Debug ---
export { renderPatternAscii } from './debug/ascii'
export type { AsciiOptions } from './debug/ascii'

// --- Output Contracts ---
export type { LiveSink, FileSink } from './runtime/types'

// --- Validation ---
export { validate } from './validation/runtime'
