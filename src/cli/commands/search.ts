import type { SearchOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { createQueryEngine, type SearchHit } from '../../analytics/index.js'
import { displayCategory, formatMoney } from '../../shared/format.js'
import { openLedger } from '../ledger.js'
import { createFormatter, formatTable } from '../output.js'

interface SearchResultOutput {
  date: string
  description: string
  category: string
  amount: number
  amountFormatted: string
  matchedBy: SearchHit['reason']
}

interface SearchResult {
  success: boolean
  query: string
  count: number
  transactions: SearchResultOutput[]
  formatted?: string
}

export const formatSearchText = (query: string, hits: SearchResultOutput[]): string => {
  if (hits.length === 0) {
    return `No transactions match "${query}"`
  }

  const table = formatTable(
    ['Date', 'Description', 'Category', 'Amount'],
    hits.map((h) => [h.date, h.description, displayCategory(h.category), h.amountFormatted]),
    [3]
  )
  return `${table}\n\n${hits.length} match${hits.length === 1 ? '' : 'es'}`
}

export const searchCommand = async (options: SearchOptions, config: AppConfig): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const store = await openLedger(config.ledger.path, formatter)

  const engine = createQueryEngine(store)
  const hits = engine.searchHits(options.query)
  const limited = options.limit === undefined ? hits : hits.slice(0, options.limit)

  const transactions: SearchResultOutput[] = limited.map((hit) => ({
    date: hit.transaction.date,
    description: hit.transaction.description,
    category: hit.transaction.category,
    amount: hit.transaction.amount,
    amountFormatted: formatMoney(hit.transaction.amount),
    matchedBy: hit.reason,
  }))

  const result: SearchResult = {
    success: true,
    query: options.query,
    count: transactions.length,
    transactions,
  }

  if (options.format === 'text') {
    result.formatted = formatSearchText(options.query, transactions)
  }

  formatter.success(result)
}
