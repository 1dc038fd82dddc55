import { afterEach, beforeEach, describe, test, expect } from 'vitest'
import { DebugLogger, configureLogging, createDebugLogger, isDebugEnabled, setLogSink, type LogLevel } from './debug.js'

describe('utils/debug', () => {
  let lines: Array<[LogLevel, string]>
  let restore: () => void

  beforeEach(() => {
    lines = []
    restore = setLogSink((level, line) => lines.push([level, line]))
  })

  afterEach(() => {
    restore()
    configureLogging({ debug: false })
  })

  describe('formatMessage', () => {
    test('tags level and prefix', () => {
      const logger = new DebugLogger({ prefix: 'tui', timestamp: false })
      expect(logger.formatMessage('warn', 'hello')).toBe('[WARN][tui] hello')
    })

    test('appends objects as indented JSON', () => {
      const logger = new DebugLogger({ prefix: 'tui', timestamp: false })
      expect(logger.formatMessage('info', 'moved', { level: 1 })).toBe('[INFO][tui] moved\n{\n  "level": 1\n}')
    })

    test('appends primitives as strings', () => {
      const logger = new DebugLogger({ prefix: 'tui', timestamp: false })
      expect(logger.formatMessage('error', 'failed', 42)).toBe('[ERROR][tui] failed\n42')
    })

    test('prepends an ISO timestamp by default', () => {
      const line = createDebugLogger('cli').formatMessage('info', 'x')
      expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+Z\]\[INFO\]\[cli\] x$/)
    })
  })

  test('debug and info are dropped unless debug output is on', () => {
    const logger = new DebugLogger({ prefix: 'tui', timestamp: false })
    configureLogging({ debug: false })
    logger.debug('quiet')
    logger.info('quiet')
    logger.warn('loud')
    expect(lines).toEqual([['warn', '[WARN][tui] loud']])
  })

  test('debug output can be switched on', () => {
    configureLogging({ debug: true })
    expect(isDebugEnabled()).toBe(true)
    new DebugLogger({ prefix: 'tui', timestamp: false }).debug('now visible')
    expect(lines).toEqual([['debug', '[DEBUG][tui] now visible']])
  })

  test('state logs old and new values', () => {
    configureLogging({ debug: true })
    new DebugLogger({ prefix: 'tui', timestamp: false }).state('mode', 'browsing', 'navigating')
    expect(lines[0]?.[1]).toBe('[DEBUG][tui] State change: mode\n{\n  "old": "browsing",\n  "new": "navigating"\n}')
  })

  test('child loggers extend the prefix', () => {
    const child = new DebugLogger({ prefix: 'tui', timestamp: false }).child('dispatch')
    child.error('boom')
    expect(lines).toEqual([['error', '[ERROR][tui:dispatch] boom']])
  })
})
