export { VoiceTable } from './VoiceTable'
export type { VoiceEntry } from './VoiceTable'
export { GM_DRUM_VOICES, createDrumVoiceTable } from './gm'
export type { DrumVoice } from './gm'
