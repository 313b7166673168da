/**
 * A persisted record could not be turned into a transaction.
 * `line` is 1-based and points at the first line of the offending record.
 */
export class ParseError extends Error {
  readonly line: number
  readonly reason: string
  readonly record: string

  constructor(line: number, reason: string, record: string) {
    super(`Line ${line}: ${reason}`)
    this.name = 'ParseError'
    this.line = line
    this.reason = reason
    this.record = record
  }
}

export type TransactionField = 'date' | 'description' | 'category' | 'amount'

/**
 * A transaction built from user input was rejected before reaching the store.
 */
export class ValidationError extends Error {
  readonly field: TransactionField
  readonly reason: string

  constructor(field: TransactionField, reason: string) {
    super(`Invalid ${field}: ${reason}`)
    this.name = 'ValidationError'
    this.field = field
    this.reason = reason
  }
}
