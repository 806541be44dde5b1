/**
 * Output contracts.
 *
 * The core only talks to these two interfaces. Implementations live in
 * separate packages:
 * - @drumgrid/midi-backend-node (live MIDI output)
 * - @drumgrid/node (files on disk)
 */

/**
 * Receiver of live note messages. Channel is zero-indexed (0-15).
 *
 * A sink may be missing altogether; the sequencer then drops every send.
 */
export interface LiveSink {
  sendNoteOn(channel: number, note: number, velocity: number): void
  sendNoteOff(channel: number, note: number, velocity: number): void
}

/**
 * Receiver of a fully encoded file.
 */
export interface FileSink {
  /** Store `bytes` under `filename`. Rejects when the write fails. */
  write(filename: string, bytes: Uint8Array): Promise<void>
}
