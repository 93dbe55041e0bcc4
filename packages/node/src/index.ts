/**
 * @playnotes/node
 *
 * Node.js utilities for playnotes: note-file watching and the CLI.
 * Requires Node.js 20+.
 */

export { FileWatcher } from './FileWatcher'
export type { FileWatcherOptions, Watcher } from './FileWatcher'
export { runCli, formatTone, defaultContext, USAGE, EXIT_OK, EXIT_SYNTAX_ERROR, EXIT_USAGE } from './cli'
export type { CliContext, MidiPlayback } from './cli'
