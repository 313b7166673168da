import * as p from '@clack/prompts'
import { format } from 'date-fns'
import type { AddOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import {
  appendAndSave,
  capitalize,
  parseAmount,
  parseDate,
  SUGGESTED_CATEGORIES,
  ValidationError,
  type Transaction,
  type TransactionInput,
} from '../../ledger/index.js'
import { createLogger } from '../../shared/logger.js'
import { displayCategory, formatMoney } from '../../shared/format.js'
import { openLedger } from '../ledger.js'
import { createFormatter } from '../output.js'

const log = createLogger('add')

const CUSTOM_CATEGORY = '__custom__'

type CategoryOption = { value: string; label: string }

const CATEGORY_OPTIONS: CategoryOption[] = [
  ...SUGGESTED_CATEGORIES.map((c) => ({ value: c, label: c })),
  { value: CUSTOM_CATEGORY, label: 'Something else' },
]

const today = (): string => format(new Date(), 'yyyy-MM-dd')

const cancelled = (): never => {
  p.cancel('Nothing added')
  process.exit(0)
}

/**
 * Asks for every field the command line left out.
 * Invalid dates and amounts are re-prompted until they parse.
 */
const promptForTransaction = async (options: AddOptions): Promise<TransactionInput> => {
  p.intro('Add a transaction')

  let date = options.date
  if (date === undefined) {
    const answer = await p.text({
      message: 'Date (YYYY-MM-DD or YYYY/MM/DD)',
      placeholder: 'leave empty for today',
      validate: (value) => {
        if (value && parseDate(value) === null) {
          return 'Invalid date format. Please enter the date in YYYY-MM-DD or YYYY/MM/DD format.'
        }
      },
    })
    if (p.isCancel(answer)) return cancelled()
    date = answer || today()
  }

  let description = options.description
  if (description === undefined) {
    const answer = await p.text({ message: 'Description', placeholder: 'e.g. Lunch with Sam' })
    if (p.isCancel(answer)) return cancelled()
    description = answer ?? ''
  }

  let category = options.category
  if (category === undefined) {
    const choice = await p.select<CategoryOption[], string>({
      message: 'Category',
      options: CATEGORY_OPTIONS,
    })
    if (p.isCancel(choice)) return cancelled()

    if (choice === CUSTOM_CATEGORY) {
      const custom = await p.text({ message: 'Category name', placeholder: 'e.g. Rent' })
      if (p.isCancel(custom)) return cancelled()
      category = custom ?? ''
    } else {
      category = choice
    }
  }

  let amount = options.amount
  if (amount === undefined) {
    const answer = await p.text({
      message: 'Amount (negative for an expense)',
      placeholder: 'e.g. -12.50',
      validate: (value) => {
        if (parseAmount(value ?? '') === null) {
          return 'Invalid amount. Please enter a valid number.'
        }
      },
    })
    if (p.isCancel(answer)) return cancelled()
    amount = answer
  }

  return { date, description, category: capitalize(category), amount }
}

const hasAllFields = (options: AddOptions): options is AddOptions & TransactionInput =>
  options.date !== undefined &&
  options.description !== undefined &&
  options.category !== undefined &&
  options.amount !== undefined

export const describeTransaction = (tx: Transaction): string =>
  `${tx.date}  ${tx.description || '(no description)'}  [${displayCategory(tx.category)}]  ${formatMoney(tx.amount)}`

/**
 * Add CLI command implementation.
 *
 * @example
 * tally add --date 2024-01-05 --description Lunch --category food --amount=-12
 */
export const addCommand = async (options: AddOptions, config: AppConfig): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)

  const input: TransactionInput = hasAllFields(options)
    ? {
        date: options.date,
        description: options.description,
        category: capitalize(options.category),
        amount: options.amount,
      }
    : await promptForTransaction(options)

  const store = await openLedger(config.ledger.path, formatter)

  let transaction: Transaction
  try {
    transaction = await appendAndSave(store, input, config.ledger.path)
  } catch (err) {
    if (err instanceof ValidationError) {
      formatter.error(err.message, { field: err.field })
    }
    throw err
  }

  log.trace(`Added expense: ${JSON.stringify(transaction)}`)

  formatter.success({
    success: true,
    transaction,
    formatted: `Added ${describeTransaction(transaction)}`,
  })
}
