import { parseRecord, type RawRecord } from './ledger-codec.js'
import { createTransaction, type Transaction, type TransactionInput } from './transaction.js'

export interface TransactionStore {
  /** Replaces all transactions; throws ParseError and keeps the old contents on a bad record */
  load: (records: readonly RawRecord[]) => void
  append: (transaction: Transaction) => void
  /** Insertion-ordered view; not a copy, so it reflects later appends */
  all: () => readonly Transaction[]
  size: () => number
  /** True once the store was mutated after its last load or save */
  isDirty: () => boolean
  markSaved: () => void
}

/**
 * Creates the in-memory ledger.
 *
 * @example
 * const store = createTransactionStore()
 * store.load(parseLedgerRecords(text))
 * store.append(createTransaction({ date: '2024-01-05', description: 'Lunch', category: 'Food', amount: '-12' }))
 */
export const createTransactionStore = (
  initial: readonly Transaction[] = []
): TransactionStore => {
  let transactions: Transaction[] = [...initial]
  let dirty = false

  const load = (records: readonly RawRecord[]) => {
    // Parse everything before swapping so a bad record leaves the store untouched
    const parsed = records.map(parseRecord)
    transactions = parsed
    dirty = false
  }

  const append = (transaction: Transaction) => {
    transactions.push(transaction)
    dirty = true
  }

  return {
    load,
    append,
    all: () => transactions,
    size: () => transactions.length,
    isDirty: () => dirty,
    markSaved: () => {
      dirty = false
    },
  }
}

/**
 * Validates raw input and appends it. Throws ValidationError before touching the store.
 */
export const appendTransaction = (
  store: TransactionStore,
  input: TransactionInput
): Transaction => {
  const transaction = createTransaction(input)
  store.append(transaction)
  return transaction
}
