import { play } from './parser'
import type { PlayOptions, PlayResult, ToneEvent, ToneSink } from './types'

/**
 * Sink that keeps every tone it receives.
 *
 * @example
 * ```typescript
 * const recorder = new ToneRecorder()
 * play('c4e4g4', recorder.tone)
 * recorder.events // [{ frequencyHz: 262, periodMs: 250 }, ...]
 * ```
 */
export class ToneRecorder {
  private readonly recorded: ToneEvent[] = []

  readonly tone: ToneSink = (frequencyHz, periodMs) => {
    this.recorded.push({ frequencyHz, periodMs })
  }

  get events(): readonly ToneEvent[] {
    return this.recorded
  }

  /** Sum of all recorded periods, rests included. */
  get totalDurationMs(): number {
    return this.recorded.reduce((sum, e) => sum + e.periodMs, 0)
  }

  clear(): void {
    this.recorded.length = 0
  }
}

export interface CollectedTones {
  events: ToneEvent[]
  result: PlayResult
}

/**
 * Play into a fresh recorder and return what was emitted.
 */
export function collectTones(source: string, options: PlayOptions = {}): CollectedTones {
  const recorder = new ToneRecorder()
  const result = play(source, recorder.tone, options)
  return { events: [...recorder.events], result }
}
