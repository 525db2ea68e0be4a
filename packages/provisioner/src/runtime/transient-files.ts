import { rmSync } from 'fs'
import { rm } from 'fs/promises'
import type { Logger } from 'pino'

/**
 * Secret-bearing paths (client option files) that must not outlive the run.
 * Normal paths release them in `finally`; signal and exit handlers fall back
 * to releaseAllSync().
 */
export class TransientFiles {
  private readonly paths = new Set<string>()

  track (path: string): void {
    this.paths.add(path)
  }

  async release (path: string): Promise<void> {
    await rm(path, { recursive: true, force: true })
    this.paths.delete(path)
  }

  releaseAllSync (): string[] {
    const released: string[] = []
    for (const path of this.paths) {
      rmSync(path, { recursive: true, force: true })
      released.push(path)
    }
    this.paths.clear()
    return released
  }

  get size (): number {
    return this.paths.size
  }
}

const CLEANUP_SIGNALS = ['SIGINT', 'SIGTERM'] as const

const SIGNAL_EXIT_CODES: Record<typeof CLEANUP_SIGNALS[number], number> = {
  SIGINT: 130,
  SIGTERM: 143
}

/**
 * Remove tracked files on SIGINT/SIGTERM and on process exit.
 * Returns a function that uninstalls the handlers.
 */
export function installSignalCleanup (files: TransientFiles, logger: Logger): () => void {
  const onExit = () => {
    files.releaseAllSync()
  }

  const handlers = CLEANUP_SIGNALS.map((signal) => {
    const handler = () => {
      const released = files.releaseAllSync()
      logger.warn({ signal, released: released.length }, 'Interrupted, removed transient credential files')
      process.exit(SIGNAL_EXIT_CODES[signal])
    }
    process.once(signal, handler)
    return { signal, handler }
  })

  process.once('exit', onExit)

  return () => {
    for (const { signal, handler } of handlers) {
      process.removeListener(signal, handler)
    }
    process.removeListener('exit', onExit)
  }
}
