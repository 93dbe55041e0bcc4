import { noteToFrequency } from './frequency'
import type { PendingNote, PlayLogger, ToneSink } from './types'

/**
 * Snapshot of the fields a flush reads.
 */
export type FlushableNote = Pick<PendingNote, 'letter' | 'halfTone' | 'duration'>

/**
 * Play one note: a single synchronous sink call.
 *
 * Notes with a duration below 1 are dropped.
 *
 * @returns whether the sink was called
 */
export function playNote(
  note: FlushableNote,
  octave: number,
  sink: ToneSink,
  trace?: PlayLogger
): boolean {
  trace?.debug(
    `[playnotes] Play '${note.letter}', halfTone=${note.halfTone}, ` +
    `octave=${octave}, duration=${note.duration}`
  )

  if (note.duration < 1) return false

  const frequencyHz = note.letter === 'R'
    ? 0
    : noteToFrequency(note.letter, note.halfTone, octave)

  sink(frequencyHz, Math.trunc(1000 / note.duration))
  return true
}
