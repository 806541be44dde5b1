/**
 * Shared fixtures for the core tests.
 */

import type { FileSink, LiveSink } from '../runtime/types'
import { VoiceTable } from '../voices/VoiceTable'

export type SentMessage = ['on' | 'off', number, number, number]

export interface RecordingLiveSink extends LiveSink {
  messages: SentMessage[]
}

/**
 * Live sink that records every message as [kind, channel, note, velocity].
 */
export function createRecordingSink(): RecordingLiveSink {
  const messages: SentMessage[] = []
  return {
    messages,
    sendNoteOn(channel, note, velocity) {
      messages.push(['on', channel, note, velocity])
    },
    sendNoteOff(channel, note, velocity) {
      messages.push(['off', channel, note, velocity])
    }
  }
}

export interface MemoryFileSink extends FileSink {
  files: Map<string, Uint8Array>
}

export function createMemorySink(): MemoryFileSink {
  const files = new Map<string, Uint8Array>()
  return {
    files,
    async write(filename, bytes) {
      files.set(filename, bytes)
    }
  }
}

/**
 * Two-voice kit used across the tests.
 */
export function createKickSnareTable(): VoiceTable<'kick' | 'snare'> {
  return new VoiceTable<'kick' | 'snare'>([
    { voice: 'kick', note: 36 },
    { voice: 'snare', note: 38 }
  ])
}
