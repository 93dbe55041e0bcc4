/**
 * @playnotes/midi-backend-node
 *
 * Tone sink that plays note strings on a system MIDI output via jzz.
 *
 * Tones arrive synchronously from the parser; each one is queued on a
 * running timeline and sent as note-on / note-off pairs with timers.
 * Rests only move the timeline forward.
 */

import type { ToneSink } from '@playnotes/core'
import JZZ from 'jzz'

// =============================================================================
// Types
// =============================================================================

/**
 * MIDI device information.
 */
export interface MIDIDevice {
  id: string
  name: string
  manufacturer?: string
}

/**
 * Options for creating a MidiToneSink.
 */
export interface MidiToneSinkOptions {
  /** MIDI channel (1-16, default: 1) */
  channel?: number

  /** Note-on velocity (0-127, default: 100) */
  velocity?: number
}

/** The part of a jzz output port this sink drives. */
interface MidiOutPort {
  send(data: number[]): unknown
  close(): unknown
}

/** The part of the jzz engine this sink drives. */
interface MidiEngine {
  info(): unknown
  openMidiOut(port: number): MidiOutPort
}

// =============================================================================
// Constants
// =============================================================================

const MIDI_NOTE_ON = 0x90
const MIDI_NOTE_OFF = 0x80
const MIDI_CONTROL_CHANGE = 0xB0
const CC_ALL_NOTES_OFF = 123

const DEFAULTS: Required<MidiToneSinkOptions> = {
  channel: 1,
  velocity: 100
}

// =============================================================================
// Conversion
// =============================================================================

/**
 * Nearest MIDI note number for a frequency, clamped to 0-127.
 * Returns null for rests (0 Hz).
 *
 * @example
 * frequencyToMidi(440) // 69
 * frequencyToMidi(262) // 60
 */
export function frequencyToMidi(frequencyHz: number): number | null {
  if (frequencyHz <= 0) return null
  const note = Math.round(69 + 12 * Math.log2(frequencyHz / 440))
  return Math.max(0, Math.min(127, note))
}

function readOutputs(info: unknown): MIDIDevice[] {
  if (typeof info !== 'object' || info === null || !('outputs' in info)) return []
  const outputs = info.outputs
  if (!Array.isArray(outputs)) return []

  return outputs.map((output: unknown, index: number) => ({
    id: String(index),
    name: readString(output, 'name') ?? `Output ${index}`,
    manufacturer: readString(output, 'manufacturer')
  }))
}

function isMidiEngine(value: unknown): value is MidiEngine {
  return typeof value === 'object' && value !== null &&
    typeof Reflect.get(value, 'info') === 'function' &&
    typeof Reflect.get(value, 'openMidiOut') === 'function'
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'string' && field.length > 0 ? field : undefined
}

// =============================================================================
// MidiToneSink
// =============================================================================

/**
 * @example
 * ```typescript
 * import { play } from '@playnotes/core'
 * import { MidiToneSink } from '@playnotes/midi-backend-node'
 *
 * const midi = new MidiToneSink({ channel: 1 })
 * await midi.init()
 * play('o4c4e4g4o5c2', midi.tone)
 * await midi.whenIdle()
 * midi.dispose()
 * ```
 */
export class MidiToneSink {
  private engine: MidiEngine | null = null
  private output: MidiOutPort | null = null
  private selectedDevice: MIDIDevice | null = null

  private readonly channel: number
  private readonly velocity: number

  // Timeline
  private originMs = 0
  private cursorMs = 0
  private timers = new Set<ReturnType<typeof setTimeout>>()
  // Note-ons per note number not yet released
  private sounding = new Map<number, number>()
  private idleWaiters: Array<() => void> = []

  private initialized = false
  private disposed = false

  constructor(options: MidiToneSinkOptions = {}) {
    const config = { ...DEFAULTS, ...options }
    this.channel = Math.max(0, Math.min(15, config.channel - 1)) // 0-indexed
    this.velocity = Math.max(0, Math.min(127, Math.round(config.velocity)))
  }

  /**
   * Open jzz and select the first available output.
   *
   * @returns True if an output is ready
   */
  async init(): Promise<boolean> {
    if (this.initialized) return this.output !== null

    try {
      const outputs = await this.listOutputs()
      if (outputs.length > 0) {
        await this.selectOutput(outputs[0].id)
        console.log(`[MidiToneSink] Using output "${outputs[0].name}"`)
      } else {
        console.warn('[MidiToneSink] No MIDI outputs available')
      }
    } catch (err) {
      console.warn('[MidiToneSink] JZZ initialization failed:', err)
    }

    this.initialized = true
    return this.output !== null
  }

  /**
   * Queue one tone. Bound, so it can be handed to `play` directly.
   */
  readonly tone: ToneSink = (frequencyHz, periodMs) => {
    if (this.disposed) return

    // Start a new timeline once the previous one has played out
    const now = Date.now()
    if (now >= this.originMs + this.cursorMs) {
      this.originMs = now
      this.cursorMs = 0
    }

    const startMs = this.cursorMs
    this.cursorMs += periodMs

    const note = frequencyToMidi(frequencyHz)
    if (note === null || !this.output) return

    const delay = Math.max(0, this.originMs + startMs - now)
    this.after(delay, () => {
      this.sounding.set(note, (this.sounding.get(note) ?? 0) + 1)
      this.send([MIDI_NOTE_ON | this.channel, note, this.velocity])
    })
    this.after(delay + periodMs, () => this.release(note))
  }

  /** Length of the queued timeline in milliseconds. */
  get totalDurationMs(): number {
    return this.cursorMs
  }

  /**
   * Resolves once every queued note has been released.
   */
  whenIdle(): Promise<void> {
    if (this.timers.size === 0) return Promise.resolve()
    return new Promise(resolve => {
      this.idleWaiters.push(resolve)
    })
  }

  /**
   * Drop queued tones and silence the channel.
   */
  cancelAll(): void {
    for (const timer of this.timers) {
      clearTimeout(timer)
    }
    this.timers.clear()

    for (const note of this.sounding.keys()) {
      this.send([MIDI_NOTE_OFF | this.channel, note, 0])
    }
    this.sounding.clear()
    this.send([MIDI_CONTROL_CHANGE | this.channel, CC_ALL_NOTES_OFF, 0])

    this.cursorMs = 0
    this.settle()
  }

  /**
   * Clean up resources.
   */
  dispose(): void {
    if (this.disposed) return

    this.cancelAll()

    if (this.output) {
      try {
        this.output.close()
      } catch (err) {
        console.warn('[MidiToneSink] Failed to close output:', err)
      }
    }

    this.output = null
    this.engine = null
    this.selectedDevice = null
    this.disposed = true
  }

  // ===========================================================================
  // Device Selection
  // ===========================================================================

  /**
   * List available MIDI outputs.
   */
  async listOutputs(): Promise<MIDIDevice[]> {
    const engine = await this.getEngine()
    return engine ? readOutputs(engine.info()) : []
  }

  /**
   * Select a MIDI output by device ID.
   */
  async selectOutput(deviceId: string): Promise<boolean> {
    const engine = await this.getEngine()
    if (!engine) return false

    const device = readOutputs(engine.info()).find(o => o.id === deviceId)
    if (!device) return false

    try {
      this.output = engine.openMidiOut(parseInt(deviceId, 10))
      this.selectedDevice = device
      return true
    } catch (err) {
      console.warn('[MidiToneSink] Failed to open MIDI output:', err)
      return false
    }
  }

  getSelectedOutput(): MIDIDevice | null {
    return this.selectedDevice
  }

  isReady(): boolean {
    return this.initialized && !this.disposed && this.output !== null
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async getEngine(): Promise<MidiEngine | null> {
    if (this.engine) return this.engine

    let engine: unknown
    try {
      engine = await JZZ()
    } catch (err) {
      console.warn('[MidiToneSink] JZZ unavailable:', err)
      return null
    }

    if (!isMidiEngine(engine)) {
      console.warn('[MidiToneSink] JZZ returned no usable engine')
      return null
    }
    this.engine = engine
    return engine
  }

  private after(delay: number, action: () => void): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer)
      action()
      if (this.timers.size === 0) this.settle()
    }, delay)
    this.timers.add(timer)
  }

  /**
   * Release one note-on of `note`; the note-off goes out with the last one.
   */
  private release(note: number): void {
    const count = (this.sounding.get(note) ?? 0) - 1
    if (count > 0) {
      this.sounding.set(note, count)
      return
    }
    this.sounding.delete(note)
    this.send([MIDI_NOTE_OFF | this.channel, note, 0])
  }

  private send(data: number[]): void {
    if (!this.output) return
    try {
      this.output.send(data)
    } catch (err) {
      console.error('[MidiToneSink] Send failed:', err)
    }
  }

  private settle(): void {
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) resolve()
  }
}
