import type { LogLevel, Logger } from '../../core/ports/logger.js'
import type { ConfiguredLogLevel } from '../../config/xmlApiConfig.js'

const LEVEL_ORDER: Record<ConfiguredLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export type LogSink = Record<LogLevel, (line: string) => void>

const consoleSink: LogSink = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
}

/**
 * Console-backed logger with `[Prefix]` tagged lines.
 *
 * Messages below `level` are dropped; `silent` drops everything.
 */
export function createConsoleLogger(opts: {
  level: ConfiguredLogLevel
  prefix?: string
  sink?: LogSink
}): Logger {
  const threshold = LEVEL_ORDER[opts.level]
  const prefix = opts.prefix ?? 'XmlApi'
  const sink = opts.sink ?? consoleSink

  const emitter = (level: LogLevel) => (message: string) => {
    if (LEVEL_ORDER[level] < threshold) return
    sink[level](`[${prefix}] ${message}`)
  }

  return {
    debug: emitter('debug'),
    info: emitter('info'),
    warn: emitter('warn'),
    error: emitter('error'),
  }
}
