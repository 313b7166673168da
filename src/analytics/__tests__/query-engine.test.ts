import { describe, it, expect } from 'vitest'
import { buildDashboard, createQueryEngine, dashboardData, search } from '../query-engine.js'
import { appendTransaction, createTransactionStore } from '../../ledger/transaction-store.js'
import { createMockTransaction, createScenarioStore } from '../../test-utils/fixtures.js'

describe('query engine', () => {
  it('answers the dashboard for the scenario ledger', () => {
    const bundle = dashboardData(createScenarioStore(), 'month')

    expect(bundle.bucket).toBe('month')
    expect(bundle.netBalance).toBe(297300)
    expect(bundle.totalsByCategory.map((c) => [c.category, c.total])).toEqual([
      ['Food', -1200],
      ['Income', 300000],
      ['Fun', -1500],
    ])
    expect(bundle.incomeVsExpense).toEqual({ incomeTotal: 300000, expenseTotal: 2700 })
    expect(bundle.timeSeries).toEqual([
      { bucket: '2024-01', total: 298800 },
      { bucket: '2024-02', total: -1500 },
    ])
  })

  it('defaults to monthly buckets', () => {
    expect(createQueryEngine(createScenarioStore()).dashboardData().bucket).toBe('month')
  })

  it('searches by category and by description', () => {
    const store = createScenarioStore()

    expect(search(store, 'food').map((t) => t.description)).toEqual(['Lunch'])
    expect(search(store, 'lnch').map((t) => t.description)).toEqual(['Lunch'])
    expect(search(store, 'foo').map((t) => t.description)).toEqual(['Lunch'])
    expect(search(store, '')).toEqual([])
  })

  it('sees appends without being rebuilt', () => {
    const store = createScenarioStore()
    const engine = createQueryEngine(store)

    appendTransaction(store, { date: '2024-02-03', description: 'Fondue', category: 'Food', amount: '-30' })

    expect(engine.search('food').map((t) => t.description)).toEqual(['Lunch', 'Fondue'])
    expect(engine.dashboardData('year').timeSeries).toEqual([{ bucket: '2024', total: 294300 }])
  })

  it('explains why each result matched', () => {
    const engine = createQueryEngine(
      createTransactionStore([
        createMockTransaction({ description: 'Fun run', category: 'Sport' }),
        createMockTransaction({ description: 'Bowling', category: 'Fun' }),
      ])
    )

    expect(engine.searchHits('fun').map((h) => [h.transaction.description, h.reason])).toEqual([
      ['Bowling', 'category'],
      ['Fun run', 'description'],
    ])
  })
})

describe('buildDashboard', () => {
  it('returns empty views for no transactions', () => {
    expect(buildDashboard([], 'day')).toEqual({
      bucket: 'day',
      totalsByCategory: [],
      netBalance: 0,
      incomeVsExpense: { incomeTotal: 0, expenseTotal: 0 },
      timeSeries: [],
      runningBalance: [],
      categoryBars: { expenditure: [], income: [] },
    })
  })
})
