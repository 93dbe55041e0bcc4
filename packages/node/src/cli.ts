/**
 * @playnotes/node - Command Line
 *
 * playnotes [options] [notes...]
 */

import * as fs from 'fs'
import { parseArgs } from 'util'
import { play, formatSyntaxError, isPlayError, PlaySyntaxError } from '@playnotes/core'
import type { PlayOptions, ToneSink } from '@playnotes/core'
import { MidiToneSink } from '@playnotes/midi-backend-node'
import { FileWatcher } from './FileWatcher'
import type { FileWatcherOptions, Watcher } from './FileWatcher'

// =============================================================================
// Types
// =============================================================================

/** What the CLI needs from a MIDI sink. `MidiToneSink` satisfies it. */
export interface MidiPlayback {
  tone: ToneSink
  whenIdle(): Promise<void>
  dispose(): void
}

/**
 * Process surface used by `runCli`. Tests substitute their own.
 */
export interface CliContext {
  stdout(line: string): void
  stderr(line: string): void
  readFile(path: string): string
  env: Record<string, string | undefined>
  openMidi(): Promise<MidiPlayback | null>
  createWatcher(options: FileWatcherOptions): Watcher
}

export const EXIT_OK = 0
export const EXIT_SYNTAX_ERROR = 1
export const EXIT_USAGE = 2

export const USAGE = [
  'Usage: playnotes [options] [notes...]',
  '',
  'Plays note strings such as "o4c4e4g4o5c2".',
  '',
  'Options:',
  '  -f, --file <path>  read the note string from a file',
  '  -w, --watch        replay the file whenever it changes (needs --file)',
  '  -m, --midi         send tones to the first MIDI output instead of printing them',
  '  -d, --debug        trace every played note (also PLAYNOTES_DEBUG=1)',
  '  -h, --help         show this help'
].join('\n')

// =============================================================================
// Defaults
// =============================================================================

async function openDefaultMidi(): Promise<MidiPlayback | null> {
  const sink = new MidiToneSink()
  if (await sink.init()) return sink
  sink.dispose()
  return null
}

export const defaultContext: CliContext = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
  readFile: filePath => fs.readFileSync(filePath, 'utf-8'),
  env: process.env,
  openMidi: openDefaultMidi,
  createWatcher: options => new FileWatcher(options)
}

// =============================================================================
// Helpers
// =============================================================================

export function formatTone(frequencyHz: number, periodMs: number): string {
  return frequencyHz === 0
    ? `rest ${periodMs} ms`
    : `${frequencyHz} Hz ${periodMs} ms`
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      file: { type: 'string', short: 'f' },
      watch: { type: 'boolean', short: 'w' },
      midi: { type: 'boolean', short: 'm' },
      debug: { type: 'boolean', short: 'd' },
      help: { type: 'boolean', short: 'h' }
    }
  })
}

// Errors raised inside Node (parseArgs, fs) fail `instanceof Error` under
// Jest's module sandbox, so read `message` structurally
function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  return String(error)
}

/**
 * Play one string, reporting a syntax error on stderr.
 *
 * @returns whether the whole string parsed
 */
function playSource(source: string, sink: ToneSink, options: PlayOptions, ctx: CliContext): boolean {
  const result = play(source, sink, options)
  if (!isPlayError(result)) return true

  ctx.stderr(formatSyntaxError(source, result))
  ctx.stderr(new PlaySyntaxError(source, result).message)
  return false
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Run the command line.
 *
 * In watch mode the returned promise settles once the watcher is
 * running; the watcher keeps the process alive.
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[], ctx: CliContext = defaultContext): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>
  try {
    parsed = parseCliArgs(argv)
  } catch (error) {
    ctx.stderr(`[playnotes] ${errorMessage(error)}`)
    ctx.stderr(USAGE)
    return EXIT_USAGE
  }

  const { values, positionals } = parsed

  if (values.help) {
    ctx.stdout(USAGE)
    return EXIT_OK
  }

  if (values.watch && values.file === undefined) {
    ctx.stderr('[playnotes] --watch requires --file')
    return EXIT_USAGE
  }

  if (values.file !== undefined && positionals.length > 0) {
    ctx.stderr('[playnotes] --file cannot be combined with note arguments')
    return EXIT_USAGE
  }

  let sources = positionals
  if (values.file !== undefined) {
    try {
      sources = [ctx.readFile(values.file).trimEnd()]
    } catch (error) {
      ctx.stderr(`[playnotes] Cannot read ${values.file}: ${errorMessage(error)}`)
      return EXIT_USAGE
    }
  }

  if (sources.length === 0) {
    ctx.stderr(USAGE)
    return EXIT_USAGE
  }

  const options: PlayOptions = {
    debug: values.debug === true || ctx.env.PLAYNOTES_DEBUG === '1',
    logger: { debug: line => ctx.stderr(line) }
  }

  let midi: MidiPlayback | null = null
  if (values.midi) {
    midi = await ctx.openMidi()
    if (!midi) {
      ctx.stderr('[playnotes] No MIDI output available')
      return EXIT_USAGE
    }
  }
  const sink: ToneSink = midi
    ? midi.tone
    : (frequencyHz, periodMs) => ctx.stdout(formatTone(frequencyHz, periodMs))

  let exitCode = EXIT_OK
  for (const source of sources) {
    if (!playSource(source, sink, options, ctx)) {
      exitCode = EXIT_SYNTAX_ERROR
      break
    }
  }

  if (values.watch && values.file !== undefined) {
    const watcher = ctx.createWatcher({ extensions: [] })
    watcher.on('change', contents => {
      playSource(contents.trimEnd(), sink, options, ctx)
    })
    watcher.add(values.file)
    watcher.start()
    return exitCode
  }

  if (midi) {
    await midi.whenIdle()
    midi.dispose()
  }

  return exitCode
}
