/**
 * @playnotes/node - FileWatcher
 *
 * Watches note files with chokidar and hands their contents (not their
 * paths) to registered handlers, debounced.
 */

import * as fs from 'fs'
import * as path from 'path'
import { watch, FSWatcher } from 'chokidar'

// =============================================================================
// Types
// =============================================================================

export interface Watcher {
  on(event: 'change', handler: (contents: string) => void): void
  start(): void
  stop(): void
  add(path: string): void
  remove(path: string): void
}

/**
 * FileWatcher configuration options.
 */
export interface FileWatcherOptions {
  /** Debounce delay in milliseconds (default: 300) */
  debounce?: number

  /** File extensions to watch; empty watches every file (default: ['.notes', '.txt']) */
  extensions?: string[]

  /** Patterns to ignore (glob patterns) */
  ignore?: string[]

  /** Whether to read file on initial add (default: false) */
  readOnAdd?: boolean
}

const DEFAULT_OPTIONS: Required<FileWatcherOptions> = {
  debounce: 300,
  extensions: ['.notes', '.txt'],
  ignore: ['**/node_modules/**', '**/.git/**'],
  readOnAdd: false
}

// =============================================================================
// Debounce Utility
// =============================================================================

interface Debounced {
  (): void
  cancel(): void
}

function debounce(fn: () => void, delay: number): Debounced {
  let timeoutId: ReturnType<typeof setTimeout> | null = null

  const debounced = (): void => {
    if (timeoutId) {
      clearTimeout(timeoutId)
    }
    timeoutId = setTimeout(() => {
      timeoutId = null
      fn()
    }, delay)
  }

  return Object.assign(debounced, {
    cancel: () => {
      if (timeoutId) {
        clearTimeout(timeoutId)
        timeoutId = null
      }
    }
  })
}

// =============================================================================
// FileWatcher Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * import { play } from '@playnotes/core'
 * import { FileWatcher } from '@playnotes/node'
 *
 * const watcher = new FileWatcher({ extensions: ['.notes'] })
 * watcher.on('change', (notes) => play(notes.trimEnd(), sink))
 * watcher.add('./songs')
 * watcher.start()
 * ```
 */
export class FileWatcher implements Watcher {
  private watcher: FSWatcher | null = null
  private handlers = new Set<(contents: string) => void>()
  private options: Required<FileWatcherOptions>
  private started = false
  private pendingPaths = new Set<string>()
  private debouncedEmit: Debounced

  constructor(options: FileWatcherOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options }

    this.debouncedEmit = debounce(() => {
      for (const filePath of this.pendingPaths) {
        this.emitFileContents(filePath)
      }
      this.pendingPaths.clear()
    }, this.options.debounce)

    this.watcher = watch([], {
      ignored: this.options.ignore,
      persistent: true,
      ignoreInitial: !this.options.readOnAdd
    })

    this.watcher.on('add', (filePath: string) => this.onFileEvent(filePath))
    this.watcher.on('change', (filePath: string) => this.onFileEvent(filePath))
    this.watcher.on('error', (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error)
      console.error('[FileWatcher] Error:', message)
    })
  }

  /**
   * Register a handler; it receives the file contents.
   */
  on(event: 'change', handler: (contents: string) => void): void {
    if (event === 'change') {
      this.handlers.add(handler)
    }
  }

  start(): void {
    this.started = true
  }

  /**
   * Stop watching and release chokidar. Safe to call twice.
   */
  stop(): void {
    this.started = false
    this.debouncedEmit.cancel()
    this.pendingPaths.clear()
    this.handlers.clear()

    if (this.watcher) {
      this.watcher.close().catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error)
        console.warn(`[FileWatcher] Failed to close: ${message}`)
      })
      this.watcher = null
    }
  }

  add(watchPath: string): void {
    this.watcher?.add(watchPath)
  }

  remove(watchPath: string): void {
    this.watcher?.unwatch(watchPath)
  }

  private onFileEvent(filePath: string): void {
    if (this.started && this.shouldWatch(filePath)) {
      this.pendingPaths.add(filePath)
      this.debouncedEmit()
    }
  }

  private shouldWatch(filePath: string): boolean {
    const { extensions } = this.options
    return extensions.length === 0 || extensions.includes(path.extname(filePath))
  }

  private emitFileContents(filePath: string): void {
    let contents: string
    try {
      contents = fs.readFileSync(filePath, 'utf-8')
    } catch (error) {
      // Deleted between the event and the read
      const message = error instanceof Error ? error.message : String(error)
      console.warn(`[FileWatcher] Failed to read ${filePath}: ${message}`)
      return
    }
    for (const handler of this.handlers) {
      handler(contents)
    }
  }
}
