import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { createLogger } from '../shared/logger.js'
import { LEDGER_HEADER, parseLedgerRecords, serializeLedger } from './ledger-codec.js'
import { createTransactionStore, type TransactionStore } from './transaction-store.js'
import { createTransaction, type Transaction, type TransactionInput } from './transaction.js'

const log = createLogger('ledger')

/**
 * Loads the ledger at `path`. A missing file gives an empty store.
 * Throws ParseError if any record is malformed.
 */
export const loadStore = async (path: string): Promise<TransactionStore> => {
  const store = createTransactionStore()
  await reloadStore(store, path)
  return store
}

/**
 * Replaces the store's contents with the file's, e.g. after an external edit.
 */
export const reloadStore = async (store: TransactionStore, path: string): Promise<void> => {
  log.trace(`Reading ${path} ...`)
  if (!existsSync(path)) {
    log.info(`No ledger at ${path}, starting empty`)
    store.load([])
    return
  }

  const text = await readFile(path, 'utf-8')
  store.load(parseLedgerRecords(text))
  log.info(`Loaded ${store.size()} transactions from ${path}`)
}

const writeLedger = async (path: string, transactions: readonly Transaction[]): Promise<void> => {
  log.trace(`Writing ${transactions.length} transactions to ${path} ...`)
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, serializeLedger(transactions))
}

/**
 * Creates the ledger file with just a header. Returns false if it already existed.
 */
export const ensureLedgerFile = async (path: string): Promise<boolean> => {
  if (existsSync(path)) return false

  log.info(`Creating ledger at ${path}`)
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${LEDGER_HEADER.join(',')}\n`)
  return true
}

/**
 * Rewrites the whole ledger file from the store.
 */
export const saveStore = async (store: TransactionStore, path: string): Promise<void> => {
  await writeLedger(path, store.all())
  store.markSaved()
}

/**
 * Validates `input` and writes the ledger with it appended. The store only
 * takes the transaction once the write succeeded, so a failed save can be retried.
 * Throws ValidationError, or whatever the write throws.
 */
export const appendAndSave = async (
  store: TransactionStore,
  input: TransactionInput,
  path: string
): Promise<Transaction> => {
  const transaction = createTransaction(input)
  await writeLedger(path, [...store.all(), transaction])
  store.append(transaction)
  store.markSaved()
  return transaction
}
