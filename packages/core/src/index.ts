// =============================================================================
// @playnotes/core - Public API
// Note-string interpreter, frequency conversion, sinks and errors
// =============================================================================

// --- Parser ---
export { play, SequenceParser, ParserState, DEFAULT_OCTAVE } from './parser'

// --- Emitter ---
export { playNote } from './emitter'
export type { FlushableNote } from './emitter'

// --- Frequency ---
export { noteToFrequency, isPitchLetter, BASE_FREQUENCY } from './frequency'

// --- Errors ---
export { PlaySyntaxError, isPlayError, formatSyntaxError, playOrThrow } from './errors'

// --- Sinks ---
export { ToneRecorder, collectTones } from './sinks'
export type { CollectedTones } from './sinks'

// --- Types ---
export { PLAY_OK } from './types'
export type {
  PitchLetter,
  RestLetter,
  NoteLetter,
  HalfTone,
  PendingNote,
  ToneEvent,
  ToneSink,
  PlayResult,
  PlayLogger,
  PlayOptions
} from './types'
