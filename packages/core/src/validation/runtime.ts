import { ConfigValidationError } from '../errors'
import {
  MAX_BPM,
  MAX_TICKS_PER_BEAT,
  MIN_BPM,
  STEPS_PER_BEAT
} from '../constants'

export const validate = {
  /**
   * Value must be an integer in range.
   */
  integerInRange(option: string, value: number, min: number, max: number): void {
    if (!Number.isInteger(value)) {
      throw new ConfigValidationError(option, `must be an integer, got ${value}`)
    }
    if (value < min || value > max) {
      throw new ConfigValidationError(option, `must be ${min}-${max}, got ${value}`)
    }
  },

  bpm(value: number): void {
    validate.integerInRange('bpm', value, MIN_BPM, MAX_BPM)
  },

  ticksPerBeat(value: number): void {
    validate.integerInRange('ticksPerBeat', value, STEPS_PER_BEAT, MAX_TICKS_PER_BEAT)
  },

  /**
   * MIDI data byte (note number, velocity).
   */
  midiValue(option: string, value: number): void {
    validate.integerInRange(option, value, 0, 127)
  },

  nonNegativeInteger(option: string, value: number): void {
    validate.integerInRange(option, value, 0, Number.MAX_SAFE_INTEGER)
  },

  positiveInteger(option: string, value: number): void {
    validate.integerInRange(option, value, 1, Number.MAX_SAFE_INTEGER)
  }
}
