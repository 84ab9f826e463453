/**
 * Structured JSON-lines logger for the transcript service. No dependencies.
 *
 *   import { logger } from './logger.ts'
 *   const log = logger.child({ component: 'store' })
 *   log.info('Analysis saved', { caseId: 'case-1' })
 *
 * Emits one object per line:
 *   {"timestamp":"...","level":"info","message":"Analysis saved","component":"store","caseId":"case-1"}
 *
 * The threshold comes from LOG_LEVEL (debug | info | warn | error, default info).
 * Errors go to stderr, everything else to stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = Record<string, unknown>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value)
}

export function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').trim().toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** What callers depend on; both Logger and its children satisfy it. */
export interface Log {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  child(defaults: LogContext): Log
}

/** Error objects do not survive JSON.stringify; flatten them first. */
export function errorContext(err: unknown): LogContext {
  if (err instanceof Error) return { error: err.message, errorName: err.name }
  return { error: String(err) }
}

export class Logger implements Log {
  private readonly threshold: number

  constructor(level?: LogLevel) {
    this.threshold = LEVEL_PRIORITY[level ?? resolveLevel(process.env.LOG_LEVEL)]
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= this.threshold
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    }
    const line = JSON.stringify(entry) + '\n'

    if (level === 'error') process.stderr.write(line)
    else process.stdout.write(line)
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context)
  }

  child(defaults: LogContext): Log {
    return new ChildLogger(this, defaults)
  }
}

class ChildLogger implements Log {
  constructor(
    private readonly parent: Logger,
    private readonly defaults: LogContext,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }

  /** Nested children merge their defaults; the innermost wins on conflicts. */
  child(defaults: LogContext): Log {
    return new ChildLogger(this.parent, { ...this.defaults, ...defaults })
  }
}

export const logger = new Logger()
