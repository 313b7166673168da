import React from 'react'
import { Box, Text } from 'ink'
import type { CategoryBar } from '../../analytics/index.js'
import { barLength, displayCategory, formatCompact, truncate } from '../format.js'

interface BarChartProps {
  title: string
  bars: CategoryBar[]
  color: 'red' | 'green'
  /** Cells for the longest bar */
  width?: number
}

const LABEL_WIDTH = 12

/**
 * Horizontal bar chart; every bar is scaled against the largest value.
 */
export const BarChart = ({ title, bars, color, width = 24 }: BarChartProps) => {
  const max = Math.max(0, ...bars.map((b) => b.value))

  return (
    <Box flexDirection="column" marginRight={2}>
      <Text bold>{title}</Text>
      {bars.length === 0 ? (
        <Text dimColor>nothing yet</Text>
      ) : (
        bars.map((bar) => (
          <Box key={bar.label} gap={1}>
            <Box width={LABEL_WIDTH}>
              <Text>{truncate(displayCategory(bar.label), LABEL_WIDTH - 1)}</Text>
            </Box>
            <Box width={width}>
              <Text color={color}>{'█'.repeat(barLength(bar.value, max, width))}</Text>
            </Box>
            <Text dimColor>{formatCompact(bar.value)}</Text>
          </Box>
        ))
      )}
    </Box>
  )
}
