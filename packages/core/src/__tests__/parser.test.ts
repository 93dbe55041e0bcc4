import { play, SequenceParser, DEFAULT_OCTAVE } from '../parser'
import { ToneRecorder, collectTones } from '../sinks'
import { PLAY_OK } from '../types'

describe('play', () => {
  describe('basic notes', () => {
    it('accepts empty input without emitting', () => {
      const sink = jest.fn()
      expect(play('', sink)).toBe(PLAY_OK)
      expect(sink).not.toHaveBeenCalled()
    })

    it('plays a lone note with the default octave and duration', () => {
      expect(collectTones('c')).toEqual({
        events: [{ frequencyHz: 262, periodMs: 1000 }],
        result: -1
      })
    })

    it('ignores letter case', () => {
      expect(collectTones('C').events).toEqual(collectTones('c').events)
    })

    it('plays a rest as 0 Hz', () => {
      expect(collectTones('r4').events).toEqual([])
      expect(collectTones('r4c').events).toEqual([
        { frequencyHz: 0, periodMs: 250 },
        { frequencyHz: 262, periodMs: 1000 }
      ])
      expect(collectTones('r').events).toEqual([{ frequencyHz: 0, periodMs: 1000 }])
    })
  })

  describe('flush points', () => {
    it('flushes a pending note when the next note starts', () => {
      const { events, result } = collectTones('c#d')
      expect(result).toBe(PLAY_OK)
      expect(events).toEqual([
        { frequencyHz: 277, periodMs: 1000 },
        { frequencyHz: 294, periodMs: 1000 }
      ])
    })

    it('flushes on the second duration digit', () => {
      const sink = jest.fn()
      play('c10', sink)
      expect(sink.mock.calls).toEqual([[262, 100]])
    })

    it('flushes a pending note before an octave change', () => {
      expect(collectTones('c#o3c').events).toEqual([
        { frequencyHz: 277, periodMs: 1000 },
        { frequencyHz: 131, periodMs: 1000 }
      ])
    })

    it('keeps a single-digit duration until interrupted', () => {
      expect(collectTones('c4d').events).toEqual([
        { frequencyHz: 262, periodMs: 250 },
        { frequencyHz: 294, periodMs: 1000 }
      ])
    })

    it('starts fresh after a two-digit duration', () => {
      expect(collectTones('c12d').events).toEqual([
        { frequencyHz: 262, periodMs: 83 },
        { frequencyHz: 294, periodMs: 1000 }
      ])
    })
  })

  describe('unflushed trailing note', () => {
    it('drops a note ending on a duration digit', () => {
      expect(collectTones('c4')).toEqual({ events: [], result: PLAY_OK })
    })

    it('drops a note ending on a half-tone modifier', () => {
      expect(collectTones('c#')).toEqual({ events: [], result: PLAY_OK })
    })

    it('only drops the last note', () => {
      expect(collectTones('e8g8').events).toEqual([{ frequencyHz: 330, periodMs: 125 }])
    })
  })

  describe('half-tones', () => {
    it('accepts + as sharp and - as flat', () => {
      expect(collectTones('c+d-e').events).toEqual([
        { frequencyHz: 277, periodMs: 1000 },
        { frequencyHz: 277, periodMs: 1000 },
        { frequencyHz: 330, periodMs: 1000 }
      ])
    })

    it('keeps the last modifier given', () => {
      expect(collectTones('c#-d').events[0]).toEqual({ frequencyHz: 247, periodMs: 1000 })
    })

    it('rejects a modifier on a rest', () => {
      const sink = jest.fn()
      expect(play('r#', sink)).toBe(1)
      expect(sink).not.toHaveBeenCalled()
    })

    it('rejects a modifier after a duration digit', () => {
      expect(play('c4#', jest.fn())).toBe(2)
    })
  })

  describe('octaves', () => {
    it('applies the octave to later notes', () => {
      expect(collectTones('o5c').events).toEqual([{ frequencyHz: 523, periodMs: 1000 }])
    })

    it('keeps the octave across notes', () => {
      expect(collectTones('o2a4a').events).toEqual([
        { frequencyHz: 110, periodMs: 250 },
        { frequencyHz: 110, periodMs: 1000 }
      ])
    })

    it('accepts an upper-case marker', () => {
      expect(collectTones('O3A').events).toEqual([{ frequencyHz: 220, periodMs: 1000 }])
    })

    it('reads a single octave digit', () => {
      // '5' has no pending note and is skipped
      expect(collectTones('o45a')).toEqual({
        events: [{ frequencyHz: 440, periodMs: 1000 }],
        result: PLAY_OK
      })
    })

    it('fails when the marker is the last character', () => {
      expect(play('o', jest.fn())).toBe(1)
    })

    it('fails at the end of input after flushing the pending note', () => {
      expect(collectTones('c4o')).toEqual({
        events: [{ frequencyHz: 262, periodMs: 250 }],
        result: 3
      })
    })

    it('fails on a non-digit after the marker', () => {
      expect(play('ox', jest.fn())).toBe(1)
      expect(play('oc', jest.fn())).toBe(1)
    })
  })

  describe('zero durations', () => {
    it('never emits a note of duration 0', () => {
      expect(collectTones('c0d').events).toEqual([{ frequencyHz: 294, periodMs: 1000 }])
      expect(collectTones('c00')).toEqual({ events: [], result: PLAY_OK })
    })

    it('reads a leading zero as part of a two-digit duration', () => {
      expect(collectTones('c05').events).toEqual([{ frequencyHz: 262, periodMs: 200 }])
    })
  })

  describe('errors', () => {
    it('returns the position of the first bad character', () => {
      expect(play('c4d8 e', jest.fn())).toBe(4)
    })

    it('keeps events emitted before the failure', () => {
      expect(collectTones('c4d x')).toEqual({
        events: [{ frequencyHz: 262, periodMs: 250 }],
        result: 3
      })
    })

    it('stops scanning at the failure', () => {
      const sink = jest.fn()
      play('c#xdefg', sink)
      expect(sink).not.toHaveBeenCalled()
    })

    it('skips characters while no note is pending', () => {
      expect(collectTones('xy z')).toEqual({ events: [], result: PLAY_OK })
      expect(collectTones('c12#a')).toEqual({
        events: [
          { frequencyHz: 262, periodMs: 83 },
          { frequencyHz: 440, periodMs: 1000 }
        ],
        result: PLAY_OK
      })
    })
  })

  describe('isolation', () => {
    it('gives identical results for independent parses', () => {
      const source = 'o3c8e8g8o4c2r4a#16'
      const first = collectTones(source)
      const second = collectTones(source)
      expect(second).toEqual(first)
      expect(first.result).toBe(PLAY_OK)
      expect(first.events).toHaveLength(6)
    })

    it('resets the octave between runs of one parser', () => {
      const recorder = new ToneRecorder()
      const parser = new SequenceParser(recorder.tone)

      parser.run('o6c')
      expect(parser.getOctave()).toBe(6)

      parser.run('a')
      expect(parser.getOctave()).toBe(DEFAULT_OCTAVE)
      expect(recorder.events[1]).toEqual({ frequencyHz: 440, periodMs: 1000 })
    })

    it('does not carry a pending note into the next run', () => {
      const sink = jest.fn()
      const parser = new SequenceParser(sink)
      parser.run('c4')
      parser.run('')
      expect(sink).not.toHaveBeenCalled()
    })
  })

  describe('debug trace', () => {
    it('logs the input and each flush when enabled', () => {
      const debug = jest.fn()
      play('c#8d', jest.fn(), { debug: true, logger: { debug } })

      expect(debug.mock.calls).toEqual([
        ['[playnotes] PLAY "c#8d"'],
        ["[playnotes] Play 'C', halfTone=sharp, octave=4, duration=8"],
        ["[playnotes] Play 'D', halfTone=none, octave=4, duration=1"]
      ])
    })

    it('is silent by default', () => {
      const debug = jest.fn()
      play('c', jest.fn(), { logger: { debug } })
      expect(debug).not.toHaveBeenCalled()
    })
  })
})
