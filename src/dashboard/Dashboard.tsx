import React from 'react'
import { Box, Text, useApp, useInput } from 'ink'
import TextInput from 'ink-text-input'
import { useAtom, useAtomValue, useSetAtom } from 'jotai'
import { TIME_BUCKETS } from '../analytics/index.js'
import {
  bucketAtom,
  dashboardAtom,
  errorAtom,
  isLoadingAtom,
  isSearchingAtom,
  searchQueryAtom,
  statusMessageAtom,
  transactionsAtom,
  visibleTransactionsAtom,
} from '../transactions/transaction-atoms.js'
import { navigateAtom } from '../navigation/navigation-atoms.js'
import { TransactionRow } from '../transactions/TransactionRow.js'
import { BarChart } from '../shared/components/BarChart.js'
import { KeyHints } from '../shared/components/KeyHints.js'
import { StatusBar } from '../shared/components/StatusBar.js'
import { SummaryPanel } from '../shared/components/SummaryPanel.js'
import { useListNavigation } from '../shared/hooks/useListNavigation.js'
import { formatMoney, formatSigned } from '../shared/format.js'
import type { DashboardView } from './dashboard-session.js'

// Trend rows shown under the charts
const TREND_LENGTH = 6

interface DashboardProps {
  ledgerPath: string
  pageSize: number
  onReload: () => Promise<void>
  /** Receives the current search and bucket so they survive the edit */
  onEdit: (view: DashboardView) => void
}

export const Dashboard = ({ ledgerPath, pageSize, onReload, onEdit }: DashboardProps) => {
  const { exit } = useApp()
  const allTransactions = useAtomValue(transactionsAtom)
  const transactions = useAtomValue(visibleTransactionsAtom)
  const dashboard = useAtomValue(dashboardAtom)
  const [query, setQuery] = useAtom(searchQueryAtom)
  const [isSearching, setIsSearching] = useAtom(isSearchingAtom)
  const [bucket, setBucket] = useAtom(bucketAtom)
  const isLoading = useAtomValue(isLoadingAtom)
  const error = useAtomValue(errorAtom)
  const message = useAtomValue(statusMessageAtom)
  const navigate = useSetAtom(navigateAtom)

  const { selectedIndex, visibleRange, positionDisplay } = useListNavigation({
    itemCount: transactions.length,
    pageSize,
    resetKey: query,
    enabled: !isSearching,
  })

  useInput((input, key) => {
    // Search input owns the keyboard until Enter or Esc
    if (isSearching) {
      if (key.escape) {
        setQuery('')
        setIsSearching(false)
      } else if (key.return) {
        setIsSearching(false)
      }
      return
    }

    if (key.escape && query.length > 0) {
      setQuery('')
      return
    }

    if (input === '/') {
      setIsSearching(true)
      return
    }

    if (input === 'a') {
      navigate('add')
      return
    }

    if (input === 'b') {
      const idx = TIME_BUCKETS.indexOf(bucket)
      setBucket(TIME_BUCKETS[(idx + 1) % TIME_BUCKETS.length] ?? 'month')
      return
    }

    // Refresh
    if (input === 'r') {
      void onReload()
      return
    }

    if (input === 'e') {
      onEdit({ query, bucket })
      return
    }

    // Help
    if (input === '?') {
      navigate('help')
      return
    }

    // Quit
    if (input === 'q') {
      exit()
    }
  })

  if (isLoading) {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color="cyan">Loading transactions...</Text>
      </Box>
    )
  }

  const { expenditure, income } = dashboard.categoryBars
  const topExpense = expenditure.reduce<(typeof expenditure)[number] | null>(
    (top, bar) => (top === null || bar.value > top.value ? bar : top),
    null
  )
  const trend = dashboard.timeSeries.slice(-TREND_LENGTH)
  const balances = dashboard.runningBalance.slice(-TREND_LENGTH)

  return (
    <Box flexDirection="column">
      <StatusBar
        ledgerPath={ledgerPath}
        transactionCount={allTransactions.length}
        visibleCount={transactions.length}
        query={query}
        message={message}
      />

      {error && (
        <Box paddingX={1}>
          <Text color="red">{error}</Text>
        </Box>
      )}

      <SummaryPanel
        netBalance={dashboard.netBalance}
        incomeVsExpense={dashboard.incomeVsExpense}
        topExpense={topExpense}
      />

      {/* Search bar */}
      <Box paddingX={1} gap={2}>
        <Box gap={1}>
          <Text color={isSearching ? 'cyan' : 'gray'}>/</Text>
          {isSearching ? (
            <TextInput value={query} onChange={setQuery} placeholder="category or description" />
          ) : (
            <Text color={query ? 'yellow' : 'gray'}>{query || 'All transactions'}</Text>
          )}
        </Box>
        <Text dimColor>{transactions.length > 0 ? positionDisplay : 'No transactions'}</Text>
      </Box>

      {/* Header */}
      <Box paddingX={1} gap={1} marginTop={1}>
        <Text dimColor> </Text>
        <Box width={10}>
          <Text dimColor bold>Date</Text>
        </Box>
        <Box width={28}>
          <Text dimColor bold>Description</Text>
        </Box>
        <Box width={14}>
          <Text dimColor bold>Category</Text>
        </Box>
        <Box width={12} justifyContent="flex-end">
          <Text dimColor bold>Amount</Text>
        </Box>
      </Box>

      {/* Transaction table */}
      <Box flexDirection="column" paddingX={1}>
        {transactions.length === 0 ? (
          <Box marginY={1}>
            <Text color="yellow">
              {query ? `Nothing matches "${query}"` : 'No transactions yet. Press a to add one.'}
            </Text>
          </Box>
        ) : (
          transactions
            .slice(visibleRange.start, visibleRange.end)
            .map((tx, viewportIndex) => (
              <TransactionRow
                key={`${visibleRange.start + viewportIndex}-${tx.date}-${tx.description}`}
                transaction={tx}
                isSelected={visibleRange.start + viewportIndex === selectedIndex}
              />
            ))
        )}
      </Box>

      {/* Charts */}
      <Box paddingX={1} marginTop={1}>
        <BarChart title="Expenditure" bars={expenditure} color="red" />
        <BarChart title="Income" bars={income} color="green" />
      </Box>

      {/* Trend */}
      <Box paddingX={1} marginTop={1} flexDirection="column">
        <Text bold>Trend by {bucket}</Text>
        {trend.length === 0 ? (
          <Text dimColor>nothing yet</Text>
        ) : (
          trend.map((point, i) => (
            <Box key={point.bucket} gap={2}>
              <Box width={10}>
                <Text dimColor>{point.bucket}</Text>
              </Box>
              <Box width={12} justifyContent="flex-end">
                <Text color={point.total < 0 ? 'red' : 'green'}>{formatSigned(point.total)}</Text>
              </Box>
              <Text dimColor>balance {formatMoney(balances[i]?.balance ?? 0)}</Text>
            </Box>
          ))
        )}
      </Box>

      <KeyHints
        hints={[
          { key: 'j/k', label: 'nav', when: !isSearching },
          { key: 'G/gg', label: 'end/start', when: !isSearching },
          { key: '/', label: 'search', when: !isSearching },
          { key: 'Enter', label: 'keep results', when: isSearching },
          { key: 'Esc', label: 'clear search', when: isSearching || query.length > 0 },
          { key: 'a', label: 'add', when: !isSearching },
          { key: 'e', label: 'edit file', when: !isSearching },
          { key: 'b', label: 'bucket', when: !isSearching },
          { key: 'r', label: 'reload', when: !isSearching },
          { key: '?', label: 'help', when: !isSearching },
          { key: 'q', label: 'quit', when: !isSearching },
        ]}
      />
    </Box>
  )
}
