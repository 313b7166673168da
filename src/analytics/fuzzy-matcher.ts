import type { Transaction } from '../ledger/transaction.js'
import type { FuzzyMatch, SearchHit } from './types.js'

const compareMatches = (a: FuzzyMatch, b: FuzzyMatch): number =>
  a.runs - b.runs || a.start - b.start

const better = (a: FuzzyMatch | null, b: FuzzyMatch | null): FuzzyMatch | null => {
  if (!a) return b
  if (!b) return a
  return compareMatches(b, a) < 0 ? b : a
}

/**
 * Case-insensitive exact category comparison. An empty query never matches.
 */
export const isCategoryMatch = (category: string, query: string): boolean =>
  query.length > 0 && category.toLowerCase() === query.toLowerCase()

/**
 * Matches `query` as a case-insensitive subsequence of `value`.
 * Returns the alignment with the fewest runs, then the earliest start; null if no alignment exists.
 *
 * @example
 * fuzzyMatch('Food', 'fd') // => { runs: 2, start: 0 }
 * fuzzyMatch('Lunch', 'unch') // => { runs: 1, start: 1 }
 * fuzzyMatch('Lunch', 'hc') // => null
 */
export const fuzzyMatch = (value: string, query: string): FuzzyMatch | null => {
  const text = value.toLowerCase()
  const pattern = query.toLowerCase()
  if (pattern.length === 0 || pattern.length > text.length) return null

  // previous[j]: best alignment of the pattern so far whose last character sits at text[j]
  let previous = Array.from({ length: text.length }, (_, j): FuzzyMatch | null =>
    text[j] === pattern[0] ? { runs: 1, start: j } : null
  )

  for (let i = 1; i < pattern.length; i++) {
    const current = new Array<FuzzyMatch | null>(text.length).fill(null)
    let bestBeforeGap: FuzzyMatch | null = null

    for (let j = 0; j < text.length; j++) {
      if (j >= 2) bestBeforeGap = better(bestBeforeGap, previous[j - 2])
      if (text[j] !== pattern[i]) continue

      const contiguous = j >= 1 ? previous[j - 1] : null
      const afterGap = bestBeforeGap
        ? { runs: bestBeforeGap.runs + 1, start: bestBeforeGap.start }
        : null
      current[j] = better(contiguous, afterGap)
    }

    previous = current
  }

  return previous.reduce<FuzzyMatch | null>(better, null)
}

export const fuzzyDescriptionMatch = (description: string, query: string): FuzzyMatch | null =>
  fuzzyMatch(description, query)

/**
 * Partial category match, e.g. "foo" in "Food". Exact matches go through isCategoryMatch.
 */
export const fuzzyCategoryMatch = (category: string, query: string): FuzzyMatch | null =>
  fuzzyMatch(category, query)

// Picks whichever field aligned tighter; the description wins a tie
const bestFuzzyHit = (
  transaction: Transaction,
  query: string
): Pick<SearchHit, 'reason' | 'match'> | null => {
  const inDescription = fuzzyDescriptionMatch(transaction.description, query)
  const inCategory = fuzzyCategoryMatch(transaction.category, query)

  if (inCategory && (!inDescription || compareMatches(inCategory, inDescription) < 0)) {
    return { reason: 'category-fuzzy', match: inCategory }
  }
  return inDescription ? { reason: 'description', match: inDescription } : null
}

/**
 * Finds every transaction matching `query` and ranks them.
 *
 * Exact category matches come first, in store order. Subsequence matches on
 * the description or the category follow, ordered by fewest runs, then
 * earliest start, then store order. Each transaction is listed once, under
 * its strongest match.
 */
export const rankTransactions = (
  transactions: readonly Transaction[],
  query: string
): SearchHit[] => {
  if (query.length === 0) return []

  const hits: SearchHit[] = []

  transactions.forEach((transaction, index) => {
    if (isCategoryMatch(transaction.category, query)) {
      hits.push({ transaction, index, reason: 'category', match: null })
      return
    }

    const fuzzy = bestFuzzyHit(transaction, query)
    if (fuzzy) {
      hits.push({ transaction, index, ...fuzzy })
    }
  })

  return hits.sort((a, b) => {
    const aExact = a.reason === 'category'
    if (aExact !== (b.reason === 'category')) return aExact ? -1 : 1
    if (a.match && b.match) {
      const byMatch = compareMatches(a.match, b.match)
      if (byMatch !== 0) return byMatch
    }
    return a.index - b.index
  })
}

export const searchTransactions = (
  transactions: readonly Transaction[],
  query: string
): Transaction[] => rankTransactions(transactions, query).map((hit) => hit.transaction)
