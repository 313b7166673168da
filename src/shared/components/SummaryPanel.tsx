import React from 'react'
import { Box, Text } from 'ink'
import type { CategoryBar, IncomeVsExpense } from '../../analytics/index.js'
import { displayCategory, formatCompact } from '../format.js'

interface SummaryPanelProps {
  netBalance: number
  incomeVsExpense: IncomeVsExpense
  /** Largest expenditure category, if any */
  topExpense: CategoryBar | null
}

export const SummaryPanel = ({ netBalance, incomeVsExpense, topExpense }: SummaryPanelProps) => (
  <Box
    paddingX={1}
    gap={3}
    borderStyle="single"
    borderColor="gray"
    borderTop={false}
    borderLeft={false}
    borderRight={false}
  >
    <Box gap={1}>
      <Text dimColor>Spent:</Text>
      <Text color="red" bold>
        {formatCompact(-incomeVsExpense.expenseTotal)}
      </Text>
    </Box>

    <Box gap={1}>
      <Text dimColor>Income:</Text>
      <Text color="green" bold>
        {formatCompact(incomeVsExpense.incomeTotal)}
      </Text>
    </Box>

    <Box gap={1}>
      <Text dimColor>Net:</Text>
      <Text color={netBalance >= 0 ? 'green' : 'red'} bold>
        {formatCompact(netBalance)}
      </Text>
    </Box>

    {topExpense && (
      <Box gap={1}>
        <Text dimColor>Top:</Text>
        <Text color="yellow">{displayCategory(topExpense.label).slice(0, 12)}</Text>
        <Text dimColor>({formatCompact(-topExpense.value)})</Text>
      </Box>
    )}
  </Box>
)
