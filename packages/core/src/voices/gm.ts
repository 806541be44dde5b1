// =============================================================================
// drumgrid - General MIDI Drum Voices
// =============================================================================

import { VoiceTable } from './VoiceTable'
import type { VoiceEntry } from './VoiceTable'

export type DrumVoice =
  | 'kick'
  | 'snare'
  | 'closed_hat'
  | 'open_hat'
  | 'low_tom'
  | 'mid_tom'
  | 'high_tom'
  | 'crash'
  | 'ride'

/** Reference kit, GM percussion key map (channel 10). */
export const GM_DRUM_VOICES: ReadonlyArray<VoiceEntry<DrumVoice>> = [
  { voice: 'kick', note: 36 },       // Bass Drum 1
  { voice: 'snare', note: 38 },      // Acoustic Snare
  { voice: 'closed_hat', note: 42 }, // Closed Hi-Hat
  { voice: 'open_hat', note: 46 },   // Open Hi-Hat
  { voice: 'low_tom', note: 45 },    // Low Tom
  { voice: 'mid_tom', note: 47 },    // Low-Mid Tom
  { voice: 'high_tom', note: 50 },   // High Tom
  { voice: 'crash', note: 49 },      // Crash Cymbal 1
  { voice: 'ride', note: 51 }        // Ride Cymbal 1
]

export function createDrumVoiceTable(): VoiceTable<DrumVoice> {
  return new VoiceTable(GM_DRUM_VOICES)
}
