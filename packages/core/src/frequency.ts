import type { HalfTone, NoteLetter, PitchLetter } from './types'

/** A1 reference frequency in Hz. */
export const BASE_FREQUENCY = 55

// Half-steps relative to A, with the octave position already folded in
const HALF_STEPS: Record<PitchLetter, number> = {
  C: -21,
  D: -19,
  E: -17,
  F: -16,
  G: -14,
  A: -12,
  B: -10
}

const HALF_TONE_SHIFT: Record<HalfTone, number> = {
  none: 0,
  sharp: 1,
  flat: -1
}

export function isPitchLetter(letter: string): letter is PitchLetter {
  return Object.prototype.hasOwnProperty.call(HALF_STEPS, letter)
}

/**
 * Convert a note to its equal-tempered frequency, rounded to whole Hz.
 *
 * Octaves above 1 scale by `2^octave`, octaves below 1 divide by
 * `2^-octave`. Rests have no pitch and map to 0.
 *
 * @example
 * noteToFrequency('A', 'none', 4) // 440
 * noteToFrequency('C', 'sharp', 4) // 277
 */
export function noteToFrequency(letter: NoteLetter, halfTone: HalfTone, octave: number): number {
  if (!isPitchLetter(letter)) return 0

  const halfSteps = HALF_STEPS[letter] + HALF_TONE_SHIFT[halfTone]
  let freq = BASE_FREQUENCY * Math.pow(2, halfSteps / 12)

  if (octave > 1) {
    freq *= Math.pow(2, octave)
  } else if (octave < 1) {
    freq /= Math.pow(2, -octave)
  }

  return roundHalfAwayFromZero(freq)
}

function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value))
}
