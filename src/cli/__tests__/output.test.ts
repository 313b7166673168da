import { describe, it, expect, vi, afterEach } from 'vitest'
import { createFormatter, formatTable } from '../output.js'

describe('formatTable', () => {
  it('pads columns and right-aligns the requested ones', () => {
    const table = formatTable(
      ['Date', 'Amount'],
      [
        ['2024-01-05', '-12.00'],
        ['2024-01-06', '3,000.00'],
      ],
      [1]
    )

    expect(table.split('\n')).toEqual([
      `Date${' '.repeat(10)}Amount`,
      '----------  --------',
      '2024-01-05    -12.00',
      '2024-01-06  3,000.00',
    ])
  })

  it('trims trailing padding on the last column', () => {
    expect(formatTable(['Name', 'Note'], [['Tea', '']]).split('\n')[2]).toBe('Tea')
  })
})

describe('createFormatter', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints the formatted text in text mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    createFormatter('text', false).success({ success: true, formatted: 'All good' })

    expect(log).toHaveBeenCalledWith('All good')
  })

  it('prints JSON in json mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    createFormatter('json', false).success({ success: true, count: 2 })

    expect(log).toHaveBeenCalledWith(JSON.stringify({ success: true, count: 2 }, null, 2))
  })

  it('skips progress in quiet mode', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)

    createFormatter('text', true).progress('Loading...')
    createFormatter('text', false).progress('Loading...')

    expect(write).toHaveBeenCalledTimes(1)
    expect(write).toHaveBeenCalledWith('Loading...\n')
  })

  it('exits with code 1 on error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit')
    })

    expect(() => createFormatter('text', false).error('Broken')).toThrow('process.exit')
    expect(error).toHaveBeenCalledWith('Error: Broken')
    expect(exit).toHaveBeenCalledWith(1)
  })
})
