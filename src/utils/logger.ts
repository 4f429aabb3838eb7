/**
 * Structured JSON logger, one object per line on stdout.
 *
 * The library emits two levels: `debug` once per evaluation and `warn`
 * when a built tree drops unreachable nodes. LOG_LEVEL takes any of
 * debug, info, warn, error (default info); `error` silences both.
 *
 *   const log = logger.child({ component: 'decision-engine' })
 *   log.debug('Decision tree evaluated', { treeId: 'dependent', steps: 7 })
 *
 *   {"timestamp":"2025-06-01T12:00:00.000Z","level":"debug","message":"Decision tree evaluated","component":"decision-engine","treeId":"dependent","steps":7}
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

export function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

type Context = Record<string, unknown>

export interface LogEntry {
  timestamp: string
  level: 'debug' | 'warn'
  message: string
  [key: string]: unknown
}

/** Implemented by Logger and by its children. */
export interface LogSink {
  debug(message: string, context?: Context): void
  warn(message: string, context?: Context): void
}

export class Logger implements LogSink {
  private readonly threshold: number

  constructor(level: LogLevel = resolveLevel(process.env.LOG_LEVEL)) {
    this.threshold = LEVEL_PRIORITY[level]
  }

  debug(message: string, context?: Context): void {
    this.write({ timestamp: new Date().toISOString(), level: 'debug', message, ...context })
  }

  warn(message: string, context?: Context): void {
    this.write({ timestamp: new Date().toISOString(), level: 'warn', message, ...context })
  }

  /** A logger that adds `defaults` to every line; call context wins on clashes. */
  child(defaults: Context): ChildLogger {
    return new ChildLogger(this, defaults)
  }

  private write(entry: LogEntry): void {
    if (LEVEL_PRIORITY[entry.level] < this.threshold) return
    process.stdout.write(JSON.stringify(entry) + '\n')
  }
}

export class ChildLogger implements LogSink {
  constructor(
    private readonly parent: LogSink,
    private readonly defaults: Context,
  ) {}

  debug(message: string, context?: Context): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: Context): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }
}

export const logger = new Logger()
