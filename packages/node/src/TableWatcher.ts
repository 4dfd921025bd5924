/**
 * @loopsheet/node - TableWatcher
 *
 * File system watcher using chokidar.
 *
 * BEHAVIOR: When the watched table file changes, registered handlers are
 * called once per burst of writes. Handlers only get the signal; the
 * source re-reads the file itself on the next refresh.
 */

import { watch } from 'chokidar'
import type { FSWatcher } from 'chokidar'
import { silentLogger } from '@loopsheet/core'
import type { Logger } from '@loopsheet/core'

// =============================================================================
// Types
// =============================================================================

/**
 * TableWatcher configuration options.
 */
export interface TableWatcherOptions {
  /** Debounce delay in milliseconds (default: 300) */
  debounce?: number

  logger?: Logger
}

// =============================================================================
// Debounce Utility
// =============================================================================

/**
 * Create a debounced callback.
 */
function debounce(fn: () => void, delay: number): (() => void) & { cancel: () => void } {
  let timeoutId: ReturnType<typeof setTimeout> | null = null

  const cancel = (): void => {
    if (timeoutId) {
      clearTimeout(timeoutId)
      timeoutId = null
    }
  }

  const debounced = (): void => {
    cancel()
    timeoutId = setTimeout(() => {
      timeoutId = null
      fn()
    }, delay)
  }

  return Object.assign(debounced, { cancel })
}

// =============================================================================
// TableWatcher Implementation
// =============================================================================

/**
 * Watches a CSV table and reports edits.
 *
 * @example
 * ```typescript
 * const watcher = new TableWatcher('./notes.csv')
 * watcher.on('change', () => session.getFetcher().requestRefresh())
 * watcher.start()
 * ```
 */
export class TableWatcher {
  private watcher: FSWatcher | null = null
  private handlers = new Set<() => void>()
  private readonly filePath: string
  private readonly logger: Logger
  private readonly debouncedEmit: (() => void) & { cancel: () => void }

  constructor(filePath: string, options: TableWatcherOptions = {}) {
    this.filePath = filePath
    this.logger = options.logger ?? silentLogger
    this.debouncedEmit = debounce(() => this.emitChange(), options.debounce ?? 300)
  }

  /**
   * Register a handler for table changes.
   */
  on(event: 'change', handler: () => void): void {
    if (event === 'change') {
      this.handlers.add(handler)
    }
  }

  /**
   * Start watching the file.
   */
  start(): void {
    if (this.watcher) return

    this.watcher = watch(this.filePath, {
      persistent: true,
      ignoreInitial: true
    })

    // Editors that save by rename show up as unlink + add
    this.watcher.on('add', () => this.debouncedEmit())
    this.watcher.on('change', () => this.debouncedEmit())

    this.watcher.on('unlink', () => {
      this.logger.warn(`${this.filePath} was removed`)
    })

    this.watcher.on('error', (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error)
      this.logger.error(`Error: ${message}`)
    })

    this.logger.debug(`Watching ${this.filePath}`)
  }

  /**
   * Stop watching and drop pending notifications.
   */
  async stop(): Promise<void> {
    this.debouncedEmit.cancel()
    this.handlers.clear()

    if (this.watcher) {
      const watcher = this.watcher
      this.watcher = null
      await watcher.close()
    }
  }

  /**
   * Check if the watcher is running.
   */
  isWatching(): boolean {
    return this.watcher !== null
  }

  private emitChange(): void {
    this.logger.debug(`${this.filePath} changed`)
    for (const handler of this.handlers) {
      handler()
    }
  }
}
