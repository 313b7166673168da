import type { SummaryOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { createQueryEngine, type AggregateBundle, type CategoryBar } from '../../analytics/index.js'
import {
  displayCategory,
  formatMoney,
  formatSigned,
  progressBar,
} from '../../shared/format.js'
import { openLedger } from '../ledger.js'
import { createFormatter, formatTable } from '../output.js'

const BAR_WIDTH = 20

const formatBars = (title: string, bars: CategoryBar[]): string[] => {
  if (bars.length === 0) return []

  const max = Math.max(...bars.map((b) => b.value))
  const labelWidth = Math.max(...bars.map((b) => displayCategory(b.label).length))

  return [
    title,
    ...bars.map(
      (b) =>
        `  ${displayCategory(b.label).padEnd(labelWidth)}  ${progressBar(b.value, max, BAR_WIDTH)}  ${formatMoney(b.value)}`
    ),
    '',
  ]
}

/**
 * Renders the dashboard bundle as plain text for the `summary` command.
 */
export const formatSummaryText = (bundle: AggregateBundle): string => {
  const { incomeTotal, expenseTotal } = bundle.incomeVsExpense

  const lines: string[] = [
    `Net balance: ${formatMoney(bundle.netBalance)}`,
    `Income:      ${formatMoney(incomeTotal)}`,
    `Expenses:    ${formatMoney(expenseTotal)}`,
    '',
  ]

  if (bundle.totalsByCategory.length === 0) {
    lines.push('No transactions yet')
    return lines.join('\n')
  }

  lines.push(
    'By category',
    formatTable(
      ['Category', 'Total', 'Count'],
      bundle.totalsByCategory.map((c) => [
        displayCategory(c.category),
        formatMoney(c.total),
        String(c.transactionCount),
      ]),
      [1, 2]
    ),
    ''
  )

  lines.push(...formatBars('Expenditure', bundle.categoryBars.expenditure))
  lines.push(...formatBars('Income', bundle.categoryBars.income))

  lines.push(
    `By ${bundle.bucket}`,
    formatTable(
      ['Period', 'Total', 'Balance'],
      bundle.timeSeries.map((point, i) => [
        point.bucket,
        formatSigned(point.total),
        formatMoney(bundle.runningBalance[i]?.balance ?? 0),
      ]),
      [1, 2]
    )
  )

  return lines.join('\n')
}

export const summaryCommand = async (options: SummaryOptions, config: AppConfig): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const store = await openLedger(config.ledger.path, formatter)

  const bundle = createQueryEngine(store).dashboardData(options.bucket ?? config.display.bucket)

  if (options.format === 'text') {
    formatter.success({ success: true, ...bundle, formatted: formatSummaryText(bundle) })
    return
  }
  formatter.success({ success: true, ...bundle })
}
