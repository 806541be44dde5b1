// =============================================================================
// drumgrid - Sequencer Constants
// =============================================================================
// Fixed values shared by the pattern, clock, emitter and encoder.

/**
 * Steps per group. Patterns grow one group at a time.
 */
export const GROUP_SIZE = 16

/**
 * Steps per beat: every step is a sixteenth note.
 */
export const STEPS_PER_BEAT = 4

/**
 * Default file resolution in ticks per quarter note.
 */
export const DEFAULT_TICKS_PER_BEAT = 480

/** Largest resolution a PPQ header can carry (bit 15 selects SMPTE). */
export const MAX_TICKS_PER_BEAT = 0x7FFF

/** Tempo bounds (inclusive). */
export const MIN_BPM = 30
export const MAX_BPM = 300

/**
 * Default tempo in BPM.
 */
export const DEFAULT_BPM = 120

/**
 * General MIDI percussion channel (channel 10, zero-indexed).
 */
export const PERCUSSION_CHANNEL = 9

/**
 * Velocity of every trigger, live or exported.
 */
export const TRIGGER_VELOCITY = 127

/**
 * Nominal gap between a live note-on and its note-off, in milliseconds.
 */
export const DEFAULT_GATE_MS = 100

export const DEFAULT_FILENAME = 'drum_output.mid'

/**
 * Note and velocity of the note-off written for a step with no triggers.
 */
export const PLACEHOLDER_NOTE = 0
export const PLACEHOLDER_VELOCITY = 0
