import type { Transaction } from '../ledger/transaction.js'
import { createTransactionStore, type TransactionStore } from '../ledger/transaction-store.js'

/**
 * Creates a mock Transaction with sensible defaults
 */
export const createMockTransaction = (overrides: Partial<Transaction> = {}): Transaction => ({
  date: '2024-01-15',
  description: 'Test purchase',
  category: 'Other',
  amount: -1000, // -10.00 in cents
  ...overrides,
})

/**
 * Small ledger with income, two expense categories and two months
 */
export const scenarioTransactions = (): Transaction[] => [
  createMockTransaction({ date: '2024-01-05', description: 'Lunch', category: 'Food', amount: -1200 }),
  createMockTransaction({ date: '2024-01-06', description: 'Salary', category: 'Income', amount: 300000 }),
  createMockTransaction({ date: '2024-02-01', description: 'Cinema', category: 'Fun', amount: -1500 }),
]

export const createScenarioStore = (): TransactionStore =>
  createTransactionStore(scenarioTransactions())

export const SCENARIO_CSV = [
  'date,description,category,amount',
  '2024-01-05,Lunch,Food,-12.00',
  '2024-01-06,Salary,Income,3000.00',
  '2024-02-01,Cinema,Fun,-15.00',
  '',
].join('\n')
