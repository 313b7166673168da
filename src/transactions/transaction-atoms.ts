import { atom } from 'jotai'
import { buildDashboard, searchTransactions, type TimeBucket } from '../analytics/index.js'
import type { Transaction } from '../ledger/index.js'

// Core data: a snapshot of the store, refreshed after every load or append
export const transactionsAtom = atom<readonly Transaction[]>([])

// Loading states
export const isLoadingAtom = atom(false)
export const errorAtom = atom<string | null>(null)

// Search state
export const searchQueryAtom = atom('')
export const isSearchingAtom = atom(false)

export const bucketAtom = atom<TimeBucket>('month')

// Status bar notice, e.g. once an added transaction has been saved
export const statusMessageAtom = atom<string | null>(null)

const byDateDescending = (a: Transaction, b: Transaction): number =>
  a.date < b.date ? 1 : a.date > b.date ? -1 : 0

/**
 * Rows for the table: ranked matches while a query is set,
 * otherwise every transaction, newest first.
 */
export const visibleTransactionsAtom = atom((get) => {
  const transactions = get(transactionsAtom)
  const query = get(searchQueryAtom)

  if (query.length > 0) {
    return searchTransactions(transactions, query)
  }
  return [...transactions].sort(byDateDescending)
})

// Derived: dashboard views over whatever the table shows
export const dashboardAtom = atom((get) =>
  buildDashboard(get(visibleTransactionsAtom), get(bucketAtom))
)
