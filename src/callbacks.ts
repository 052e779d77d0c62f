import { log } from './utils/logger'

export interface ProgressCallback {
  onStart(type: string, url: string): Promise<void> | void
  onProgress(message: string, percent: number): Promise<void> | void
  onComplete(type: string, data: unknown): Promise<void> | void
  onInfo(message: string): Promise<void> | void
  onWarning(message: string): Promise<void> | void
  onError(message: string, error?: Error): Promise<void> | void
}

/**
 * Factory function to create a silent callback that does nothing
 * @returns ProgressCallback that ignores all events
 */
export function createSilentCallback(): ProgressCallback {
  return {
    onStart: (_type: string, _url: string) => {},
    onProgress: (_message: string, _percent: number) => {},
    onComplete: (_type: string, _data: unknown) => {},
    onInfo: (_message: string) => {},
    onWarning: (_message: string) => {},
    onError: (_message: string, _error?: Error) => {},
  }
}

/**
 * Routes scrape events through the shared logger so they follow LOG_LEVEL.
 */
export function createLogCallback(): ProgressCallback {
  return {
    onStart: (type: string, url: string) => {
      log.info(`Starting ${type} scraping: ${url}`)
    },
    onProgress: (message: string, percent: number) => {
      log.debug(`[${percent}%] ${message}`)
    },
    onComplete: (type: string, _data: unknown) => {
      log.success(`Completed ${type} scraping`)
    },
    onInfo: (message: string) => log.info(message),
    onWarning: (message: string) => log.warning(message),
    onError: (message: string, error?: Error) => {
      log.error(error ? `${message}: ${error.message}` : message)
    },
  }
}

/**
 * Factory function to create a multi callback that forwards events to multiple callbacks
 * @param callbacks - Array of callbacks to forward events to
 * @returns ProgressCallback that invokes all provided callbacks
 */
export function createMultiCallback(
  ...callbacks: ProgressCallback[]
): ProgressCallback {
  return {
    onStart: async (type: string, url: string) => {
      await Promise.all(callbacks.map((c) => c.onStart(type, url)))
    },
    onProgress: async (message: string, percent: number) => {
      await Promise.all(callbacks.map((c) => c.onProgress(message, percent)))
    },
    onComplete: async (type: string, data: unknown) => {
      await Promise.all(callbacks.map((c) => c.onComplete(type, data)))
    },
    onInfo: async (message: string) => {
      await Promise.all(callbacks.map((c) => c.onInfo(message)))
    },
    onWarning: async (message: string) => {
      await Promise.all(callbacks.map((c) => c.onWarning(message)))
    },
    onError: async (message: string, error?: Error) => {
      await Promise.all(callbacks.map((c) => c.onError(message, error)))
    },
  }
}
