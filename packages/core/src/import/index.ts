export { parseMidiBuffer, readVLQ, META_END_OF_TRACK, META_SET_TEMPO } from './midi-parser'
export type {
  MidiFile,
  MidiTrack,
  MidiEvent,
  MidiNoteOnEvent,
  MidiNoteOffEvent,
  MidiControlChangeEvent,
  MidiMetaEvent,
  SmfFormat
} from './midi-parser'
