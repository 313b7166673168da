export { ParseError, ValidationError, type TransactionField } from './errors.js'
export {
  SUGGESTED_CATEGORIES,
  parseDate,
  parseAmount,
  formatDecimal,
  capitalize,
  createTransaction,
  transactionInputSchema,
  type Transaction,
  type TransactionInput,
} from './transaction.js'
export {
  LEDGER_HEADER,
  splitRecords,
  parseLedgerRecords,
  parseRecord,
  escapeField,
  serializeTransaction,
  serializeLedger,
  type RawRecord,
} from './ledger-codec.js'
export {
  createTransactionStore,
  appendTransaction,
  type TransactionStore,
} from './transaction-store.js'
export {
  loadStore,
  reloadStore,
  saveStore,
  appendAndSave,
  ensureLedgerFile,
} from './ledger-file.js'
