/**
 * Ordered shutdown of the transcript service.
 *
 * Handlers run last-registered first, so the HTTP server stops taking
 * requests before the store's database handle is closed:
 *
 *   const shutdown = createShutdownManager()
 *   shutdown.register('store', () => store.close())
 *   shutdown.register('http', () => http.stop())
 *   shutdown.installSignalHandlers()
 */

import { errorContext, logger } from './logger.ts'

const log = logger.child({ component: 'shutdown' })

export type ShutdownFn = () => Promise<void> | void

export interface ShutdownHandler {
  name: string
  fn: ShutdownFn
}

export interface ShutdownOptions {
  /** Upper bound for the whole handler chain. Default 10 s. */
  timeoutMs?: number
}

export class GracefulShutdown {
  private readonly handlers: ShutdownHandler[] = []
  private inProgress = false
  private readonly timeoutMs: number

  constructor(opts?: ShutdownOptions) {
    this.timeoutMs = opts?.timeoutMs ?? 10_000
  }

  register(name: string, fn: ShutdownFn): void {
    this.handlers.push({ name, fn })
  }

  /**
   * Runs every handler in reverse order. A failing handler is logged and the
   * rest still run. Resolves once all are done or the timeout fires.
   */
  async shutdown(): Promise<void> {
    if (this.inProgress) {
      log.warn('Shutdown already in progress, ignoring duplicate call')
      return
    }
    this.inProgress = true

    log.info('Graceful shutdown started', {
      handlerCount: this.handlers.length,
      timeoutMs: this.timeoutMs,
    })

    const runHandlers = async (): Promise<void> => {
      for (const handler of [...this.handlers].reverse()) {
        try {
          log.info('Running shutdown handler', { handler: handler.name })
          await handler.fn()
          log.info('Shutdown handler completed', { handler: handler.name })
        } catch (err) {
          log.error('Shutdown handler failed', { handler: handler.name, ...errorContext(err) })
        }
      }
    }

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        log.error('Shutdown timed out, forcing exit', { timeoutMs: this.timeoutMs })
        resolve()
      }, this.timeoutMs)
    })

    try {
      await Promise.race([runHandlers(), timeout])
    } finally {
      clearTimeout(timer)
    }

    log.info('Graceful shutdown complete')
  }

  /** SIGTERM / SIGINT start a shutdown; a second signal exits at once. */
  installSignalHandlers(): void {
    let forceOnNextSignal = false

    const onSignal = (signal: NodeJS.Signals): void => {
      if (forceOnNextSignal) {
        log.warn('Received second signal, forcing exit', { signal })
        process.exit(1)
      }
      forceOnNextSignal = true
      log.info('Received signal, starting shutdown', { signal })

      this.shutdown()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error('Shutdown error', errorContext(err))
          process.exit(1)
        })
    }

    process.on('SIGTERM', onSignal)
    process.on('SIGINT', onSignal)

    process.on('uncaughtException', (err) => {
      log.error('Uncaught exception, starting shutdown', { ...errorContext(err), stack: err.stack })
      this.shutdown()
        .catch((shutdownErr: unknown) => log.error('Shutdown error', errorContext(shutdownErr)))
        .finally(() => process.exit(1))
    })
  }
}

export function createShutdownManager(opts?: ShutdownOptions): GracefulShutdown {
  return new GracefulShutdown(opts)
}
