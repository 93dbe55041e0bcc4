/**
 * Sequence Parser
 *
 * Single-pass interpreter for note strings such as `c4d#8o5e2`.
 * Characters are consumed one at a time by a two-state automaton;
 * notes reach the sink at three flush points only:
 *
 * 1. a following note, rest or octave token interrupts the pending note
 * 2. a second duration digit completes it
 * 3. its letter is the last character of the input
 *
 * Any other note still pending when the input ends is never played.
 */

import { playNote } from './emitter'
import type { HalfTone, NoteLetter, PendingNote, PlayLogger, PlayOptions, PlayResult, ToneSink } from './types'
import { PLAY_OK } from './types'

// =============================================================================
// Constants
// =============================================================================

export const ParserState = {
  COMMAND: 'command',
  OCTAVE_NUMBER: 'octave_number'
} as const

export type ParserState = typeof ParserState[keyof typeof ParserState]

export const DEFAULT_OCTAVE = 4

const NOTE_LETTERS: Record<string, NoteLetter> = {
  A: 'A', B: 'B', C: 'C', D: 'D', E: 'E', F: 'F', G: 'G', R: 'R'
}

const HALF_TONES: Record<string, HalfTone> = {
  '#': 'sharp',
  '+': 'sharp',
  '-': 'flat'
}

function toNoteLetter(c: string): NoteLetter | undefined {
  return NOTE_LETTERS[c.toUpperCase()]
}

function isOctaveMarker(c: string): boolean {
  return c === 'o' || c === 'O'
}

function digitValue(c: string): number | undefined {
  const code = c.charCodeAt(0) - 48 // '0'
  return code >= 0 && code <= 9 ? code : undefined
}

// =============================================================================
// SequenceParser
// =============================================================================

/**
 * Note-string automaton bound to one sink.
 *
 * All state lives on the instance and is reset by each `run`, so a
 * parser never carries an octave or a pending note from one string
 * into the next.
 *
 * @example
 * ```typescript
 * const parser = new SequenceParser((hz, ms) => console.log(hz, ms))
 * parser.run('o5c4e4g4') // -1
 * ```
 */
export class SequenceParser {
  private state: ParserState = ParserState.COMMAND
  private octave = DEFAULT_OCTAVE
  private position = 0
  private readonly note: PendingNote = {
    letter: 'R',
    halfTone: 'none',
    duration: 1,
    lengthSpecified: false,
    pending: false
  }
  private readonly trace: PlayLogger | undefined

  constructor(
    private readonly sink: ToneSink,
    options: PlayOptions = {}
  ) {
    this.trace = options.debug ? (options.logger ?? console) : undefined
  }

  /**
   * Interpret `source`, calling the sink for every flushed note.
   *
   * @returns `PLAY_OK`, or the position of the first unparseable
   * character. Running out of input after an octave marker fails at
   * `source.length`.
   */
  run(source: string): PlayResult {
    this.reset()
    this.trace?.debug(`[playnotes] PLAY "${source}"`)

    const last = source.length - 1
    for (; this.position < source.length; this.position++) {
      const c = source[this.position]
      const accepted = this.state === ParserState.COMMAND
        ? this.command(c, this.position === last)
        : this.octaveNumber(c)

      if (!accepted) return this.position
    }

    return this.state === ParserState.OCTAVE_NUMBER ? this.position : PLAY_OK
  }

  /** Current octave (for inspection after a run). */
  getOctave(): number {
    return this.octave
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  private command(c: string, isLast: boolean): boolean {
    const letter = toNoteLetter(c)
    if (letter !== undefined) {
      if (this.note.pending) this.flush()
      this.startNote(letter)
      if (isLast) this.flush()
      return true
    }

    if (isOctaveMarker(c)) {
      if (this.note.pending) this.flushAndClear()
      this.state = ParserState.OCTAVE_NUMBER
      return true
    }

    // Stray characters between notes are skipped
    if (!this.note.pending) return true

    const digit = digitValue(c)

    if (!this.note.lengthSpecified) {
      const halfTone = HALF_TONES[c]
      if (halfTone !== undefined && this.note.letter !== 'R') {
        this.note.halfTone = halfTone
        return true
      }
      if (digit !== undefined) {
        this.note.duration = digit
        this.note.lengthSpecified = true
        return true
      }
      return false
    }

    if (digit === undefined) return false

    this.note.duration = this.note.duration * 10 + digit
    this.flushAndClear()
    return true
  }

  private octaveNumber(c: string): boolean {
    const digit = digitValue(c)
    if (digit === undefined) return false

    this.octave = digit
    this.state = ParserState.COMMAND
    return true
  }

  // ===========================================================================
  // Flush Points
  // ===========================================================================

  private startNote(letter: NoteLetter): void {
    this.note.letter = letter
    this.note.halfTone = 'none'
    this.note.duration = 1
    this.note.lengthSpecified = false
    this.note.pending = true
  }

  private flush(): void {
    playNote(this.note, this.octave, this.sink, this.trace)
  }

  private flushAndClear(): void {
    this.flush()
    this.note.pending = false
    this.note.lengthSpecified = false
  }

  private reset(): void {
    this.state = ParserState.COMMAND
    this.octave = DEFAULT_OCTAVE
    this.position = 0
    this.startNote('R')
    this.note.pending = false
  }
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Play a note string into `sink`.
 *
 * Events emitted before a failure are not rolled back.
 *
 * @returns `PLAY_OK` (-1) or the zero-based position of the first
 * unparseable character
 */
export function play(source: string, sink: ToneSink, options: PlayOptions = {}): PlayResult {
  return new SequenceParser(sink, options).run(source)
}
