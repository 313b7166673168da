import { describe, it, expect } from 'vitest'
import {
  bucketLabel,
  categoryBars,
  createAggregator,
  incomeVsExpense,
  netBalance,
  runningBalance,
  timeSeries,
  totalsByCategory,
} from '../aggregator.js'
import { TIME_BUCKETS } from '../types.js'
import { createTransactionStore } from '../../ledger/transaction-store.js'
import {
  createMockTransaction,
  createScenarioStore,
  scenarioTransactions,
} from '../../test-utils/fixtures.js'

const mixed = () => [
  createMockTransaction({ date: '2023-12-31', category: 'food', amount: -500 }),
  createMockTransaction({ date: '2024-01-05', category: 'Food', amount: -1200 }),
  createMockTransaction({ date: '2024-01-05', category: '', amount: 250 }),
  createMockTransaction({ date: '2024-01-20', category: 'Gift', amount: 0 }),
  createMockTransaction({ date: '2024-02-01', category: 'FOOD', amount: 300 }),
]

describe('bucketLabel', () => {
  it('truncates the date to the bucket', () => {
    expect(bucketLabel('2024-01-05', 'day')).toBe('2024-01-05')
    expect(bucketLabel('2024-01-05', 'month')).toBe('2024-01')
    expect(bucketLabel('2024-01-05', 'year')).toBe('2024')
  })
})

describe('totalsByCategory', () => {
  it('sums the scenario per category in first-seen order', () => {
    expect(totalsByCategory(scenarioTransactions())).toEqual([
      { category: 'Food', total: -1200, transactionCount: 1 },
      { category: 'Income', total: 300000, transactionCount: 1 },
      { category: 'Fun', total: -1500, transactionCount: 1 },
    ])
  })

  it('groups case-insensitively under the first spelling', () => {
    expect(totalsByCategory(mixed())).toEqual([
      { category: 'food', total: -1400, transactionCount: 3 },
      { category: '', total: 250, transactionCount: 1 },
      { category: 'Gift', total: 0, transactionCount: 1 },
    ])
  })

  it('returns nothing for an empty ledger', () => {
    expect(totalsByCategory([])).toEqual([])
  })
})

describe('category totals and net balance', () => {
  it.each([
    ['mixed', mixed()],
    ['scenario', scenarioTransactions()],
    ['empty', []],
  ])('add up to the net balance for the %s ledger', (_name, transactions) => {
    const sum = totalsByCategory(transactions).reduce((acc, c) => acc + c.total, 0)

    expect(sum).toBe(netBalance(transactions))
  })

  it('gives -11.50 across food, uncategorized and gifts', () => {
    expect(totalsByCategory(mixed()).map((c) => c.total)).toEqual([-1400, 250, 0])
    expect(netBalance(mixed())).toBe(-1150)
  })
})

describe('netBalance', () => {
  it('sums every amount', () => {
    expect(netBalance(scenarioTransactions())).toBe(297300)
    expect(netBalance([])).toBe(0)
  })
})

describe('incomeVsExpense', () => {
  it('splits positive and negative amounts', () => {
    expect(incomeVsExpense(scenarioTransactions())).toEqual({ incomeTotal: 300000, expenseTotal: 2700 })
  })

  it('ignores zero amounts', () => {
    expect(incomeVsExpense([createMockTransaction({ amount: 0 })])).toEqual({
      incomeTotal: 0,
      expenseTotal: 0,
    })
  })

  it('agrees with the net balance', () => {
    const { incomeTotal, expenseTotal } = incomeVsExpense(mixed())

    expect(incomeTotal - expenseTotal).toBe(netBalance(mixed()))
  })
})

describe('timeSeries', () => {
  it('buckets the scenario by month', () => {
    expect(timeSeries(scenarioTransactions(), 'month')).toEqual([
      { bucket: '2024-01', total: 298800 },
      { bucket: '2024-02', total: -1500 },
    ])
  })

  it('sorts buckets chronologically regardless of input order', () => {
    const reversed = [...mixed()].reverse()

    expect(timeSeries(reversed, 'day').map((p) => p.bucket)).toEqual([
      '2023-12-31',
      '2024-01-05',
      '2024-01-20',
      '2024-02-01',
    ])
    expect(timeSeries(reversed, 'year')).toEqual([
      { bucket: '2023', total: -500 },
      { bucket: '2024', total: -650 },
    ])
  })

  it('sums to the net balance for every bucket size', () => {
    for (const bucket of TIME_BUCKETS) {
      const total = timeSeries(mixed(), bucket).reduce((sum, p) => sum + p.total, 0)
      expect(total).toBe(netBalance(mixed()))
    }
  })
})

describe('runningBalance', () => {
  it('accumulates bucket totals', () => {
    expect(runningBalance(scenarioTransactions(), 'month')).toEqual([
      { bucket: '2024-01', balance: 298800 },
      { bucket: '2024-02', balance: 297300 },
    ])
  })

  it('ends at the net balance', () => {
    const points = runningBalance(mixed(), 'day')

    expect(points.at(-1)?.balance).toBe(netBalance(mixed()))
  })
})

describe('categoryBars', () => {
  it('splits the scenario into expenditure and income, sorted by label', () => {
    expect(categoryBars(scenarioTransactions())).toEqual({
      expenditure: [
        { label: 'Food', value: 1200 },
        { label: 'Fun', value: 1500 },
      ],
      income: [{ label: 'Income', value: 300000 }],
    })
  })

  it('treats a zero total as income and never yields negative bars', () => {
    const bars = categoryBars(mixed())

    expect(bars.expenditure).toEqual([{ label: 'food', value: 1400 }])
    expect(bars.income).toEqual([
      { label: '', value: 250 },
      { label: 'Gift', value: 0 },
    ])
  })
})

describe('createAggregator', () => {
  it('reads the store on every call', () => {
    const store = createScenarioStore()
    const aggregator = createAggregator(store)

    expect(aggregator.netBalance()).toBe(297300)

    store.append(createMockTransaction({ date: '2024-02-10', category: 'Fun', amount: -700 }))

    expect(aggregator.netBalance()).toBe(296600)
    expect(aggregator.timeSeries('month').at(-1)).toEqual({ bucket: '2024-02', total: -2200 })
    expect(aggregator.totalsByCategory().at(-1)).toEqual({
      category: 'Fun',
      total: -2200,
      transactionCount: 2,
    })
  })

  it('reports zeros for an empty store', () => {
    const aggregator = createAggregator(createTransactionStore())

    expect(aggregator.netBalance()).toBe(0)
    expect(aggregator.incomeVsExpense()).toEqual({ incomeTotal: 0, expenseTotal: 0 })
    expect(aggregator.runningBalance('month')).toEqual([])
    expect(aggregator.categoryBars()).toEqual({ expenditure: [], income: [] })
  })
})
