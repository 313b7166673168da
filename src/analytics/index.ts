/**
 * Search and dashboard aggregation over the transaction store.
 */

// Matcher
export {
  isCategoryMatch,
  fuzzyMatch,
  fuzzyDescriptionMatch,
  fuzzyCategoryMatch,
  rankTransactions,
  searchTransactions,
} from './fuzzy-matcher.js'

// Aggregator
export {
  bucketLabel,
  totalsByCategory,
  netBalance,
  incomeVsExpense,
  timeSeries,
  runningBalance,
  categoryBars,
  createAggregator,
  type Aggregator,
} from './aggregator.js'

// Query engine
export {
  buildDashboard,
  createQueryEngine,
  search,
  dashboardData,
  type QueryEngine,
} from './query-engine.js'

// Types
export { TIME_BUCKETS } from './types.js'
export type {
  FuzzyMatch,
  MatchReason,
  SearchHit,
  TimeBucket,
  CategoryTotal,
  IncomeVsExpense,
  BucketTotal,
  BalancePoint,
  CategoryBar,
  CategoryBars,
  AggregateBundle,
} from './types.js'
