import { describe, it, expect, vi, beforeEach } from 'vitest'

// Mock fs
vi.mock('node:fs', () => ({
  appendFileSync: vi.fn(),
  mkdirSync: vi.fn(),
}))

import { appendFileSync, mkdirSync } from 'node:fs'
import {
  configureLogger,
  createLogger,
  formatLogLine,
  getLoggerSettings,
  isLevelEnabled,
} from '../logger.js'

const mockAppendFileSync = vi.mocked(appendFileSync)
const mockMkdirSync = vi.mocked(mkdirSync)

describe('formatLogLine', () => {
  it('puts timestamp, level and target in brackets', () => {
    expect(
      formatLogLine('info', 'ledger', 'Loaded 3 transactions', new Date('2024-01-05T10:00:00Z'))
    ).toBe('[2024-01-05T10:00:00.000Z INFO ledger] Loaded 3 transactions')
  })
})

describe('isLevelEnabled', () => {
  it('passes levels at or above the threshold', () => {
    expect(isLevelEnabled('warn', 'info')).toBe(true)
    expect(isLevelEnabled('info', 'info')).toBe(true)
    expect(isLevelEnabled('debug', 'info')).toBe(false)
    expect(isLevelEnabled('trace', 'trace')).toBe(true)
  })
})

describe('createLogger', () => {
  beforeEach(() => {
    mockAppendFileSync.mockReset()
    mockMkdirSync.mockReset()
  })

  it('writes nothing until a file is configured', () => {
    configureLogger({ level: 'trace', file: null })

    createLogger('test').error('boom')

    expect(mockAppendFileSync).not.toHaveBeenCalled()
  })

  it('creates the log directory when configured', () => {
    configureLogger({ level: 'info', file: '/logs/tally/tally.log' })

    expect(mockMkdirSync).toHaveBeenCalledWith('/logs/tally', { recursive: true })
    expect(getLoggerSettings()).toEqual({ level: 'info', file: '/logs/tally/tally.log' })
  })

  it('appends lines at or above the configured level', () => {
    configureLogger({ level: 'info', file: '/logs/tally.log' })
    const log = createLogger('main')

    log.debug('hidden')
    log.info('====Starting tally====')

    expect(mockAppendFileSync).toHaveBeenCalledTimes(1)
    expect(mockAppendFileSync).toHaveBeenCalledWith(
      '/logs/tally.log',
      expect.stringMatching(/^\[\S+ INFO main\] ====Starting tally====\n$/)
    )
  })

  it('reports a failed write on stderr instead of throwing', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    mockAppendFileSync.mockImplementation(() => {
      throw new Error('disk full')
    })
    configureLogger({ level: 'info', file: '/logs/tally.log' })

    expect(() => createLogger('main').warn('careful')).not.toThrow()
    expect(stderr).toHaveBeenCalledWith('Could not write to log file /logs/tally.log: disk full\n')

    stderr.mockRestore()
  })
})
