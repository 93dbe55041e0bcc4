/**
 * @playnotes/midi-backend-node
 *
 * Node.js MIDI tone sink using the jzz library.
 */

export { MidiToneSink, frequencyToMidi } from './MidiToneSink'
export type { MIDIDevice, MidiToneSinkOptions } from './MidiToneSink'
