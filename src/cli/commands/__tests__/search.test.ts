import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { formatSearchText, searchCommand } from '../search.js'
import { appConfigSchema } from '../../../config/config-types.js'
import { SCENARIO_CSV } from '../../../test-utils/fixtures.js'

describe('formatSearchText', () => {
  it('says when nothing matched', () => {
    expect(formatSearchText('xyz', [])).toBe('No transactions match "xyz"')
  })

  it('prints a table and a count', () => {
    const text = formatSearchText('lnch', [
      {
        date: '2024-01-05',
        description: 'Lunch',
        category: 'Food',
        amount: -1200,
        amountFormatted: '-12.00',
        matchedBy: 'description',
      },
    ])

    expect(text.split('\n')).toEqual([
      'Date        Description  Category  Amount',
      '----------  -----------  --------  ------',
      '2024-01-05  Lunch        Food      -12.00',
      '',
      '1 match',
    ])
  })
})

describe('searchCommand', () => {
  let dir: string
  let path: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tally-search-'))
    path = join(dir, 'transactions.csv')
    await writeFile(
      path,
      `${SCENARIO_CSV}2024-02-03,Fondue,Food,-30.00\n2024-02-04,Food truck,Fun,-9.50\n`
    )
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  it('returns ranked results as JSON', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    await searchCommand(
      { format: 'json', quiet: true, query: 'food' },
      appConfigSchema.parse({ ledger: { path } })
    )

    const output: unknown = JSON.parse(String(log.mock.calls[0]?.[0]))
    expect(output).toMatchObject({
      success: true,
      query: 'food',
      count: 3,
      transactions: [
        { description: 'Lunch', matchedBy: 'category' },
        { description: 'Fondue', matchedBy: 'category' },
        { description: 'Food truck', matchedBy: 'description', amount: -950 },
      ],
    })
  })

  it('honours the limit', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    await searchCommand(
      { format: 'json', quiet: true, query: 'food', limit: 1 },
      appConfigSchema.parse({ ledger: { path } })
    )

    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toMatchObject({ count: 1 })
  })
})
