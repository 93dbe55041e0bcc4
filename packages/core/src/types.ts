/**
 * Play String Types
 *
 * Shared vocabulary for the note-string interpreter: pending notes,
 * tone events and the sink contract.
 */

// =============================================================================
// Notes
// =============================================================================

/** Pitched note letters, upper-case. */
export type PitchLetter = 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G'

/** Rest marker. */
export type RestLetter = 'R'

export type NoteLetter = PitchLetter | RestLetter

/** Half-tone alteration of a pitched note. */
export type HalfTone = 'none' | 'sharp' | 'flat'

/**
 * Note being accumulated by the parser.
 * One instance is reused for the whole scan.
 */
export interface PendingNote {
  letter: NoteLetter
  halfTone: HalfTone
  /** Duration digits read so far (default 1). Period is 1000 / duration. */
  duration: number
  /** A duration digit has been consumed. */
  lengthSpecified: boolean
  /** A note is currently being accumulated. */
  pending: boolean
}

// =============================================================================
// Tone Events
// =============================================================================

/**
 * Emitted tone. `frequencyHz` 0 is a rest.
 */
export interface ToneEvent {
  frequencyHz: number
  periodMs: number
}

/**
 * Receives one call per emitted tone, in input order.
 * The return value is ignored.
 */
export type ToneSink = (frequencyHz: number, periodMs: number) => void

// =============================================================================
// Results & Options
// =============================================================================

/** Returned by `play` when every character was consumed. */
export const PLAY_OK = -1

/**
 * `PLAY_OK`, or the zero-based index of the first unparseable character.
 */
export type PlayResult = number

/** Minimal console surface used for the parser trace. */
export interface PlayLogger {
  debug(message: string): void
}

export interface PlayOptions {
  /** Log every flushed note (default: false) */
  debug?: boolean

  /** Trace destination (default: console) */
  logger?: PlayLogger
}
