/**
 * Types for search and dashboard aggregation.
 * All monetary values are cents (100 = 1.00); negative means money out.
 */

import type { Transaction } from '../ledger/transaction.js'

export type { Transaction }

/**
 * Best alignment of a query inside a description.
 * Fewer runs means the query characters sit closer together.
 *
 * @example
 * // "lnch" in "lunch": l | nch
 * const match: FuzzyMatch = { runs: 2, start: 0 }
 */
export interface FuzzyMatch {
  /** Number of contiguous stretches the query was split into */
  runs: number
  /** Index of the first matched character */
  start: number
}

/** `category` is an exact match; `category-fuzzy` a subsequence of the category */
export type MatchReason = 'category' | 'category-fuzzy' | 'description'

export interface SearchHit {
  transaction: Transaction
  /** Position in the store */
  index: number
  reason: MatchReason
  /** Subsequence alignment; null for exact category matches */
  match: FuzzyMatch | null
}

export const TIME_BUCKETS = ['day', 'month', 'year'] as const

export type TimeBucket = (typeof TIME_BUCKETS)[number]

export interface CategoryTotal {
  /** First-seen spelling of the category */
  category: string
  total: number
  transactionCount: number
}

export interface IncomeVsExpense {
  /** Sum of positive amounts */
  incomeTotal: number
  /** Absolute sum of negative amounts */
  expenseTotal: number
}

export interface BucketTotal {
  /** YYYY-MM-DD, YYYY-MM or YYYY depending on the bucket */
  bucket: string
  total: number
}

export interface BalancePoint {
  bucket: string
  /** Cumulative balance at the end of the bucket */
  balance: number
}

export interface CategoryBar {
  label: string
  value: number
}

/**
 * Category totals split for the two dashboard charts.
 * Expenditure values are absolute, so every bar is non-negative.
 */
export interface CategoryBars {
  expenditure: CategoryBar[]
  income: CategoryBar[]
}

/**
 * Everything the dashboard renders in one pass.
 */
export interface AggregateBundle {
  bucket: TimeBucket
  totalsByCategory: CategoryTotal[]
  netBalance: number
  incomeVsExpense: IncomeVsExpense
  timeSeries: BucketTotal[]
  runningBalance: BalancePoint[]
  categoryBars: CategoryBars
}
