import { loadStore, ParseError, type TransactionStore } from '../ledger/index.js'
import type { OutputFormatter } from './output.js'

/**
 * Loads the ledger for a command, reporting a malformed file through the formatter.
 */
export const openLedger = async (
  path: string,
  formatter: OutputFormatter
): Promise<TransactionStore> => {
  try {
    return await loadStore(path)
  } catch (err) {
    if (err instanceof ParseError) {
      formatter.error(`Could not read ledger ${path}: ${err.message}`, {
        line: err.line,
        record: err.record,
        hint: "Run 'tally edit' to fix the record",
      })
    }
    throw err
  }
}
