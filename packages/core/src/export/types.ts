// =============================================================================
// drumgrid - Export Types
// =============================================================================

/**
 * Options for encoding a pattern as a Standard MIDI File.
 */
export interface MidiEncodeOptions {
  /** Tempo in BPM (30-300) */
  bpm: number

  /**
   * Ticks per quarter note written in the header.
   * Each step lasts a quarter of this.
   * @default 480
   */
  ticksPerBeat?: number
}

/**
 * Options for exporting a pattern to a file sink.
 */
export interface MidiExportOptions extends MidiEncodeOptions {
  /** Destination name passed to the file sink */
  filename: string
}

/**
 * Result of encoding a pattern.
 */
export interface MidiEncodeResult {
  /** Complete SMF format 0 file */
  bytes: Uint8Array
  ticksPerBeat: number
  ticksPerStep: number
  /** Sum of every delta-time in the track */
  durationTicks: number
  /** Channel events written (tempo and end-of-track excluded) */
  eventCount: number
}

export interface MidiExportResult extends MidiEncodeResult {
  filename: string
}
