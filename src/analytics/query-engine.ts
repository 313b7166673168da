import type { Transaction } from '../ledger/transaction.js'
import type { TransactionStore } from '../ledger/transaction-store.js'
import {
  categoryBars,
  incomeVsExpense,
  netBalance,
  runningBalance,
  timeSeries,
  totalsByCategory,
} from './aggregator.js'
import { rankTransactions } from './fuzzy-matcher.js'
import type { AggregateBundle, SearchHit, TimeBucket } from './types.js'

export interface QueryEngine {
  search: (query: string) => Transaction[]
  /** Same ranking as `search`, with the reason each transaction matched */
  searchHits: (query: string) => SearchHit[]
  dashboardData: (bucket?: TimeBucket) => AggregateBundle
}

/**
 * Builds every dashboard view from one snapshot of transactions.
 */
export const buildDashboard = (
  transactions: readonly Transaction[],
  bucket: TimeBucket = 'month'
): AggregateBundle => ({
  bucket,
  totalsByCategory: totalsByCategory(transactions),
  netBalance: netBalance(transactions),
  incomeVsExpense: incomeVsExpense(transactions),
  timeSeries: timeSeries(transactions, bucket),
  runningBalance: runningBalance(transactions, bucket),
  categoryBars: categoryBars(transactions),
})

/**
 * Coordinates search and aggregation over a store. Holds no state of its own.
 *
 * @example
 * const engine = createQueryEngine(store)
 * engine.search('lnch')
 * engine.dashboardData('month').netBalance
 */
export const createQueryEngine = (store: TransactionStore): QueryEngine => {
  const searchHits = (query: string) => rankTransactions(store.all(), query)

  return {
    search: (query) => searchHits(query).map((hit) => hit.transaction),
    searchHits,
    dashboardData: (bucket = 'month') => buildDashboard(store.all(), bucket),
  }
}

export const search = (store: TransactionStore, query: string): Transaction[] =>
  createQueryEngine(store).search(query)

export const dashboardData = (
  store: TransactionStore,
  bucket: TimeBucket = 'month'
): AggregateBundle => createQueryEngine(store).dashboardData(bucket)
