import { describe, it, expect } from 'vitest'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { appConfigSchema, DEFAULT_LEDGER_PATH, DEFAULT_LOG_PATH, expandHome } from '../config-types.js'

describe('appConfigSchema', () => {
  it('fills every default from an empty object', () => {
    const result = appConfigSchema.safeParse({})

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data).toEqual({
        ledger: { path: DEFAULT_LEDGER_PATH },
        display: { pageSize: 20, bucket: 'month' },
        log: { level: 'info', file: DEFAULT_LOG_PATH },
      })
    }
  })

  it('keeps partial sections and defaults the rest', () => {
    const result = appConfigSchema.safeParse({ display: { bucket: 'year' }, editor: 'vim' })

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data.display).toEqual({ pageSize: 20, bucket: 'year' })
      expect(result.data.editor).toBe('vim')
    }
  })

  it('rejects an unknown bucket', () => {
    expect(appConfigSchema.safeParse({ display: { bucket: 'week' } }).success).toBe(false)
  })

  it('rejects a page size out of range', () => {
    expect(appConfigSchema.safeParse({ display: { pageSize: 2 } }).success).toBe(false)
    expect(appConfigSchema.safeParse({ display: { pageSize: 500 } }).success).toBe(false)
    expect(appConfigSchema.safeParse({ display: { pageSize: 12.5 } }).success).toBe(false)
  })

  it('rejects an unknown log level', () => {
    expect(appConfigSchema.safeParse({ log: { level: 'verbose' } }).success).toBe(false)
  })

  it('rejects an empty ledger path', () => {
    expect(appConfigSchema.safeParse({ ledger: { path: '' } }).success).toBe(false)
  })
})

describe('expandHome', () => {
  it('expands a leading tilde', () => {
    expect(expandHome('~/ledger.csv')).toBe(join(homedir(), 'ledger.csv'))
    expect(expandHome('~')).toBe(homedir())
  })

  it('leaves other paths alone', () => {
    expect(expandHome('/tmp/ledger.csv')).toBe('/tmp/ledger.csv')
    expect(expandHome('data/~ledger.csv')).toBe('data/~ledger.csv')
  })
})
