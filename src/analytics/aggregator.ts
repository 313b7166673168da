import type { Transaction } from '../ledger/transaction.js'
import type { TransactionStore } from '../ledger/transaction-store.js'
import type {
  BalancePoint,
  BucketTotal,
  CategoryBar,
  CategoryBars,
  CategoryTotal,
  IncomeVsExpense,
  TimeBucket,
} from './types.js'

const BUCKET_LENGTH: Record<TimeBucket, number> = {
  day: 10,
  month: 7,
  year: 4,
}

/**
 * Derives the bucket label from a YYYY-MM-DD date.
 *
 * @example
 * bucketLabel('2024-01-05', 'month') // => '2024-01'
 */
export const bucketLabel = (date: string, bucket: TimeBucket): string =>
  date.slice(0, BUCKET_LENGTH[bucket])

/**
 * Sums amounts per category. Grouping ignores case; each group keeps the
 * spelling it was first seen with, and groups keep first-seen order.
 */
export const totalsByCategory = (transactions: readonly Transaction[]): CategoryTotal[] => {
  const groups = new Map<string, CategoryTotal>()

  for (const tx of transactions) {
    const key = tx.category.toLowerCase()
    const group = groups.get(key)
    if (group) {
      group.total += tx.amount
      group.transactionCount += 1
    } else {
      groups.set(key, { category: tx.category, total: tx.amount, transactionCount: 1 })
    }
  }

  return [...groups.values()]
}

export const netBalance = (transactions: readonly Transaction[]): number =>
  transactions.reduce((sum, tx) => sum + tx.amount, 0)

export const incomeVsExpense = (transactions: readonly Transaction[]): IncomeVsExpense => {
  let incomeTotal = 0
  let expenseTotal = 0

  for (const tx of transactions) {
    if (tx.amount > 0) {
      incomeTotal += tx.amount
    } else if (tx.amount < 0) {
      expenseTotal -= tx.amount
    }
  }

  return { incomeTotal, expenseTotal }
}

/**
 * Sums amounts per time bucket in chronological order.
 * Buckets without transactions are left out, not zero-filled.
 */
export const timeSeries = (
  transactions: readonly Transaction[],
  bucket: TimeBucket
): BucketTotal[] => {
  const totals = new Map<string, number>()

  for (const tx of transactions) {
    const label = bucketLabel(tx.date, bucket)
    totals.set(label, (totals.get(label) ?? 0) + tx.amount)
  }

  // Zero-padded ISO labels sort chronologically as plain strings
  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([label, total]) => ({ bucket: label, total }))
}

/**
 * Cumulative balance at the end of each bucket of `timeSeries`.
 */
export const runningBalance = (
  transactions: readonly Transaction[],
  bucket: TimeBucket
): BalancePoint[] => {
  let balance = 0
  return timeSeries(transactions, bucket).map((point) => {
    balance += point.total
    return { bucket: point.bucket, balance }
  })
}

const byLabel = (a: CategoryBar, b: CategoryBar): number =>
  a.label < b.label ? -1 : a.label > b.label ? 1 : 0

/**
 * Splits category totals into expenditure (negative totals, shown as
 * absolute values) and income (zero or positive totals), each sorted by label.
 */
export const categoryBars = (transactions: readonly Transaction[]): CategoryBars => {
  const expenditure: CategoryBar[] = []
  const income: CategoryBar[] = []

  for (const { category, total } of totalsByCategory(transactions)) {
    if (total < 0) {
      expenditure.push({ label: category, value: -total })
    } else {
      income.push({ label: category, value: total })
    }
  }

  return {
    expenditure: expenditure.sort(byLabel),
    income: income.sort(byLabel),
  }
}

export interface Aggregator {
  totalsByCategory: () => CategoryTotal[]
  netBalance: () => number
  incomeVsExpense: () => IncomeVsExpense
  timeSeries: (bucket: TimeBucket) => BucketTotal[]
  runningBalance: (bucket: TimeBucket) => BalancePoint[]
  categoryBars: () => CategoryBars
}

/**
 * Binds the aggregations to a store. Every call recomputes from the
 * store's current contents; nothing is cached.
 */
export const createAggregator = (store: TransactionStore): Aggregator => ({
  totalsByCategory: () => totalsByCategory(store.all()),
  netBalance: () => netBalance(store.all()),
  incomeVsExpense: () => incomeVsExpense(store.all()),
  timeSeries: (bucket) => timeSeries(store.all(), bucket),
  runningBalance: (bucket) => runningBalance(store.all(), bucket),
  categoryBars: () => categoryBars(store.all()),
})
