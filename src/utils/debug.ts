/**
 * Debug logging utility for linkdeck
 *
 * The terminal belongs to the UI while it is mounted, so log lines go to the
 * configured log file. Without one, warn/error reach stderr and debug/info are
 * only printed when debug output is enabled (LINKDECK_DEBUG=true or --debug).
 */

import * as fs from 'fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogSink = (level: LogLevel, line: string) => void

export interface LoggingOptions {
  /** Print debug/info lines */
  debug?: boolean
  /** Append every line to this file instead of stderr */
  file?: string | null
  /** Drop lines that would reach stderr (set while the UI owns the terminal) */
  muted?: boolean
}

interface DebugOptions {
  /** Component/module name for prefixing */
  prefix: string
  /** Whether to include timestamps */
  timestamp?: boolean
}

const state: { debug: boolean; file: string | null; muted: boolean; sink: LogSink | null } = {
  debug: process.env['LINKDECK_DEBUG'] === 'true',
  file: null,
  muted: false,
  sink: null,
}

function defaultSink(level: LogLevel, line: string): void {
  if (state.file) {
    fs.appendFileSync(state.file, `${line}\n`, 'utf-8')
    return
  }
  if (state.muted) return
  process.stderr.write(`${line}\n`)
}

function emit(level: LogLevel, line: string): void {
  if ((level === 'debug' || level === 'info') && !state.debug) return
  const sink = state.sink ?? defaultSink
  sink(level, line)
}

/** Update global logging behaviour; omitted fields keep their current value */
export function configureLogging(options: LoggingOptions): void {
  if (options.debug !== undefined) state.debug = options.debug
  if (options.file !== undefined) state.file = options.file
  if (options.muted !== undefined) state.muted = options.muted
}

/**
 * Replace the output sink. Returns a function restoring the previous one.
 * Tests use this to capture lines.
 */
export function setLogSink(sink: LogSink | null): () => void {
  const previous = state.sink
  state.sink = sink
  return () => {
    state.sink = previous
  }
}

export class DebugLogger {
  private prefix: string
  private timestamp: boolean

  constructor(options: DebugOptions) {
    this.prefix = options.prefix
    this.timestamp = options.timestamp ?? true
  }

  formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const ts = this.timestamp ? `[${new Date().toISOString()}]` : ''
    const levelTag = `[${level.toUpperCase()}]`
    const prefixTag = `[${this.prefix}]`

    let formatted = `${ts}${levelTag}${prefixTag} ${message}`
    if (data !== undefined) {
      try {
        const dataStr = typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data)
        formatted += `\n${dataStr}`
      } catch {
        formatted += `\n[Unserializable data]`
      }
    }
    return formatted
  }

  debug(message: string, data?: unknown): void {
    emit('debug', this.formatMessage('debug', message, data))
  }

  info(message: string, data?: unknown): void {
    emit('info', this.formatMessage('info', message, data))
  }

  warn(message: string, data?: unknown): void {
    emit('warn', this.formatMessage('warn', message, data))
  }

  error(message: string, data?: unknown): void {
    emit('error', this.formatMessage('error', message, data))
  }

  /** Log a state change */
  state(stateName: string, oldValue: unknown, newValue: unknown): void {
    this.debug(`State change: ${stateName}`, { old: oldValue, new: newValue })
  }

  /** Create a child logger with additional prefix */
  child(childPrefix: string): DebugLogger {
    return new DebugLogger({
      prefix: `${this.prefix}:${childPrefix}`,
      timestamp: this.timestamp,
    })
  }
}

/** Create a debug logger for a component/module */
export function createDebugLogger(prefix: string): DebugLogger {
  return new DebugLogger({ prefix })
}

/** Check if debug mode is enabled */
export function isDebugEnabled(): boolean {
  return state.debug
}
