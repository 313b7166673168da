import React from 'react'
import { Box, Text } from 'ink'
import type { Transaction } from '../ledger/index.js'
import { formatMoney, truncate } from '../shared/format.js'

interface TransactionRowProps {
  transaction: Transaction
  isSelected: boolean
}

export const TransactionRow = ({ transaction, isSelected }: TransactionRowProps) => {
  const isExpense = transaction.amount < 0

  return (
    <Box gap={1}>
      {/* Selection indicator */}
      <Text color={isSelected ? 'cyan' : undefined}>
        {isSelected ? '▶' : ' '}
      </Text>

      {/* Date */}
      <Box width={10}>
        <Text dimColor>{transaction.date}</Text>
      </Box>

      {/* Description */}
      <Box width={28}>
        <Text bold={isSelected}>{truncate(transaction.description, 27)}</Text>
      </Box>

      {/* Category */}
      <Box width={14}>
        {transaction.category ? (
          <Text color="green">{truncate(transaction.category, 13)}</Text>
        ) : (
          <Text color="yellow" italic>
            (none)
          </Text>
        )}
      </Box>

      {/* Amount */}
      <Box width={12} justifyContent="flex-end">
        <Text color={isExpense ? 'red' : 'green'}>{formatMoney(transaction.amount)}</Text>
      </Box>
    </Box>
  )
}
