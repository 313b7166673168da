import { ParseError } from './errors.js'
import { formatDecimal, parseAmount, parseDate, type Transaction } from './transaction.js'

export const LEDGER_HEADER = ['date', 'description', 'category', 'amount'] as const

/**
 * One CSV record before validation.
 * `line` is the 1-based line the record starts on; `text` is its source.
 */
export interface RawRecord {
  line: number
  fields: string[]
  text: string
}

const NEEDS_QUOTES = /[",\r\n]/

/**
 * Splits ledger text into records.
 * Fields may be double-quoted; quoted fields can hold commas, doubled quotes and newlines.
 * Blank lines are dropped.
 */
export const splitRecords = (text: string): RawRecord[] => {
  const records: RawRecord[] = []
  let fields: string[] = []
  let field = ''
  let inQuotes = false
  let line = 1
  let recordLine = 1
  let recordStart = 0
  let i = 0

  const endRecord = (end: number) => {
    fields.push(field)
    const source = text.slice(recordStart, end)
    if (source.trim() !== '') {
      records.push({ line: recordLine, fields, text: source })
    }
    fields = []
    field = ''
  }

  while (i < text.length) {
    const char = text[i]

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i += 2
        } else {
          inQuotes = false
          i++
        }
        continue
      }
      if (char === '\n') line++
      field += char
      i++
      continue
    }

    if (char === '"' && field === '') {
      inQuotes = true
      i++
      continue
    }

    if (char === ',') {
      fields.push(field)
      field = ''
      i++
      continue
    }

    if (char === '\n' || (char === '\r' && text[i + 1] === '\n')) {
      endRecord(i)
      i += char === '\r' ? 2 : 1
      line++
      recordLine = line
      recordStart = i
      continue
    }

    field += char
    i++
  }

  if (inQuotes) {
    throw new ParseError(recordLine, 'unterminated quoted field', text.slice(recordStart))
  }

  if (recordStart < text.length) {
    endRecord(text.length)
  }

  return records
}

const isHeader = (record: RawRecord): boolean =>
  record.fields.length === LEDGER_HEADER.length &&
  record.fields.every((value, index) => value.trim().toLowerCase() === LEDGER_HEADER[index])

/**
 * Splits ledger text into data records, dropping the header line when present.
 */
export const parseLedgerRecords = (text: string): RawRecord[] => {
  const records = splitRecords(text)
  if (records.length > 0 && isHeader(records[0])) {
    return records.slice(1)
  }
  return records
}

/**
 * Validates one record. Throws ParseError naming the record's line.
 */
export const parseRecord = (record: RawRecord): Transaction => {
  if (record.fields.length !== LEDGER_HEADER.length) {
    throw new ParseError(
      record.line,
      `expected ${LEDGER_HEADER.length} fields, found ${record.fields.length}`,
      record.text
    )
  }

  const [rawDate, description, category, rawAmount] = record.fields

  const date = parseDate(rawDate)
  if (date === null) {
    throw new ParseError(record.line, `invalid date "${rawDate}"`, record.text)
  }

  const amount = parseAmount(rawAmount)
  if (amount === null) {
    throw new ParseError(record.line, `invalid amount "${rawAmount}"`, record.text)
  }

  return { date, description, category, amount }
}

export const escapeField = (value: string): string =>
  NEEDS_QUOTES.test(value) ? `"${value.replace(/"/g, '""')}"` : value

export const serializeTransaction = (transaction: Transaction): string =>
  [
    transaction.date,
    escapeField(transaction.description),
    escapeField(transaction.category),
    formatDecimal(transaction.amount),
  ].join(',')

/**
 * Renders the whole ledger, header included, one record per line.
 */
export const serializeLedger = (transactions: readonly Transaction[]): string =>
  [LEDGER_HEADER.join(','), ...transactions.map(serializeTransaction)].join('\n') + '\n'
