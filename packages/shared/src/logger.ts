import { errorMessage } from "./errors.js"

export type LogLevel = "debug" | "info" | "warn" | "error"

export interface LogContext {
  component?: string
  step?: string
  service?: string
  [key: string]: unknown
}

export interface LogEntry {
  level: LogLevel
  message: string
  error?: unknown
  context?: LogContext
  timestamp: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug: (message: string, context?: LogContext) => void
  info: (message: string, context?: LogContext) => void
  warn: (message: string, error?: unknown, context?: LogContext) => void
  error: (message: string, error?: unknown, context?: LogContext) => void
  /** Logger whose entries carry `context` merged under their own */
  child: (context: LogContext) => Logger
}

export interface ConsoleSinkOptions {
  /** Prefix printed before every line (default: "[pyship]") */
  prefix?: string
  /** Print debug entries (default: false) */
  verbose?: boolean
}

/**
 * Console sink: info and debug on stdout, warn and error on stderr.
 * Debug entries are dropped unless `verbose` is set; an attached error's
 * message follows the entry's own.
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): LogSink {
  const prefix = options.prefix ?? "[pyship]"
  const bold = `\x1b[1m${prefix}\x1b[0m`

  return entry => {
    const reason = entry.error === undefined ? "" : `: ${errorMessage(entry.error)}`
    switch (entry.level) {
      case "debug":
        if (options.verbose) console.log(`${prefix} ${entry.message}`)
        return
      case "info":
        console.log(`${bold} ${entry.message}`)
        return
      case "warn":
        console.error(`${bold} warning: ${entry.message}${reason}`)
        return
      case "error":
        console.error(`${bold} error: ${entry.message}${reason}`)
        return
    }
  }
}

/**
 * In-memory sink, returned together with the entries it collects.
 */
export function createMemorySink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  return { sink: entry => entries.push(entry), entries }
}

export function createLogger(sink: LogSink = createConsoleSink(), baseContext?: LogContext): Logger {
  const log = (level: LogLevel, message: string, error?: unknown, context?: LogContext): void => {
    const merged = baseContext || context ? { ...baseContext, ...context } : undefined
    sink({
      level,
      message,
      error,
      context: merged,
      timestamp: new Date().toISOString(),
    })
  }

  return {
    debug: (message, context) => log("debug", message, undefined, context),
    info: (message, context) => log("info", message, undefined, context),
    warn: (message, error, context) => log("warn", message, error, context),
    error: (message, error, context) => log("error", message, error, context),
    child: context => createLogger(sink, { ...baseContext, ...context }),
  }
}
