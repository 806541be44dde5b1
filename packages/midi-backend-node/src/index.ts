/**
 * @drumgrid/midi-backend-node
 *
 * Node.js MIDI output using the jzz library.
 * Implements LiveSink from @drumgrid/core.
 */

export { NodeMIDIOutput } from './NodeMIDIOutput'
export type { MIDIDevice, NodeMIDIOutputOptions } from './NodeMIDIOutput'
