import { play } from '../parser'
import { ToneRecorder, collectTones } from '../sinks'

describe('ToneRecorder', () => {
  it('records events in order', () => {
    const recorder = new ToneRecorder()
    play('c4r4e', recorder.tone)
    expect(recorder.events).toEqual([
      { frequencyHz: 262, periodMs: 250 },
      { frequencyHz: 0, periodMs: 250 },
      { frequencyHz: 330, periodMs: 1000 }
    ])
  })

  it('sums periods including rests', () => {
    const recorder = new ToneRecorder()
    play('c4r4e', recorder.tone)
    expect(recorder.totalDurationMs).toBe(1500)
  })

  it('clears recorded events', () => {
    const recorder = new ToneRecorder()
    play('c', recorder.tone)
    recorder.clear()
    expect(recorder.events).toEqual([])
    expect(recorder.totalDurationMs).toBe(0)
  })
})

describe('collectTones', () => {
  it('returns the events alongside the result', () => {
    expect(collectTones('g2?')).toEqual({ events: [], result: 2 })
  })
})
