import { format, isValid, parse } from 'date-fns'
import { z } from 'zod'
import { ValidationError, type TransactionField } from './errors.js'

/**
 * A single dated money movement.
 * `amount` is in cents: negative for expenses, zero or positive for income.
 */
export interface Transaction {
  readonly date: string
  readonly description: string
  readonly category: string
  readonly amount: number
}

/**
 * Raw values as typed by a user or passed on the command line.
 */
export interface TransactionInput {
  date: string
  description: string
  category: string
  amount: string
}

// Hints for prompts; any category string is accepted
export const SUGGESTED_CATEGORIES = ['Food', 'Travel', 'Fun', 'Medical', 'Personal', 'Other'] as const

const DATE_FORMATS = [
  { pattern: /^\d{4}-\d{1,2}-\d{1,2}$/, format: 'yyyy-MM-dd' },
  { pattern: /^\d{4}\/\d{1,2}\/\d{1,2}$/, format: 'yyyy/MM/dd' },
] as const

const AMOUNT_PATTERN = /^([+-])?(\d+)(?:\.(\d{1,2}))?$/

/**
 * Parses a YYYY-MM-DD or YYYY/MM/DD date and returns it as YYYY-MM-DD.
 * Returns null for anything else, including impossible dates like 2024-02-30.
 */
export const parseDate = (input: string): string | null => {
  const value = input.trim()
  for (const candidate of DATE_FORMATS) {
    if (!candidate.pattern.test(value)) continue
    const parsed = parse(value, candidate.format, new Date())
    return isValid(parsed) ? format(parsed, 'yyyy-MM-dd') : null
  }
  return null
}

/**
 * Parses a signed decimal with at most two fractional digits into cents.
 *
 * @example
 * parseAmount('-12.5') // => -1250
 * parseAmount('3000') // => 300000
 */
export const parseAmount = (input: string): number | null => {
  const match = AMOUNT_PATTERN.exec(input.trim())
  if (!match) return null

  const [, sign, whole, fraction = ''] = match
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'))
  if (!Number.isSafeInteger(cents)) return null

  return sign === '-' && cents !== 0 ? -cents : cents
}

/**
 * Formats cents as the decimal written to the ledger file.
 *
 * @example
 * formatDecimal(-1200) // => '-12.00'
 */
export const formatDecimal = (cents: number): string => {
  const sign = cents < 0 ? '-' : ''
  const absolute = Math.abs(cents)
  return `${sign}${Math.floor(absolute / 100)}.${String(absolute % 100).padStart(2, '0')}`
}

export const capitalize = (value: string): string =>
  value.length === 0 ? value : value.charAt(0).toUpperCase() + value.slice(1)

export const transactionInputSchema = z.object({
  date: z
    .string()
    .trim()
    .min(1, 'date is required')
    .transform((value, ctx) => {
      const date = parseDate(value)
      if (date === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${value}" is not a valid YYYY-MM-DD or YYYY/MM/DD date`,
        })
        return z.NEVER
      }
      return date
    }),
  description: z.string(),
  category: z.string(),
  amount: z
    .string()
    .trim()
    .min(1, 'amount is required')
    .transform((value, ctx) => {
      const amount = parseAmount(value)
      if (amount === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${value}" is not a number with at most two decimal places`,
        })
        return z.NEVER
      }
      return amount
    }),
})

const FIELDS: readonly TransactionField[] = ['date', 'description', 'category', 'amount']

const fieldOf = (key: unknown): TransactionField =>
  FIELDS.find((field) => field === key) ?? 'date'

/**
 * Validates user input and builds a transaction.
 * Throws ValidationError for the first invalid field.
 */
export const createTransaction = (input: TransactionInput): Transaction => {
  const result = transactionInputSchema.safeParse(input)
  if (!result.success) {
    const [issue] = result.error.issues
    throw new ValidationError(fieldOf(issue.path[0]), issue.message)
  }
  return result.data
}
