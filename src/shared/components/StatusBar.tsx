import React from 'react'
import { Box, Text } from 'ink'

interface StatusBarProps {
  ledgerPath: string
  transactionCount: number
  /** Rows left after the search filter */
  visibleCount: number
  query: string
  message?: string | null
}

export const StatusBar = ({
  ledgerPath,
  transactionCount,
  visibleCount,
  query,
  message,
}: StatusBarProps) => (
  <Box borderStyle="single" borderColor="gray" paddingX={1} justifyContent="space-between">
    <Text>
      <Text bold color="green">
        tally
      </Text>
      <Text dimColor> · {ledgerPath}</Text>
    </Text>
    <Box gap={2}>
      {message && <Text color="yellow">{message}</Text>}
      <Text dimColor>
        {query.length > 0 && <Text color="cyan">{visibleCount} matching · </Text>}
        {transactionCount} total
      </Text>
    </Box>
  </Box>
)
