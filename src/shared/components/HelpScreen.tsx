import React from 'react'
import { Box, Text, useInput } from 'ink'

interface HelpScreenProps {
  onClose: () => void
}

export const HelpScreen = ({ onClose }: HelpScreenProps) => {
  useInput((input, key) => {
    if (key.escape || input === 'q' || input === '?') {
      onClose()
    }
  })

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">tally - Keyboard Shortcuts</Text>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Dashboard</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>j/k</Text> or <Text color="cyan" bold>↑/↓</Text>   Navigate up/down</Text>
          <Text><Text color="cyan" bold>G</Text>           Jump to last row</Text>
          <Text><Text color="cyan" bold>gg</Text>          Jump to first row</Text>
          <Text><Text color="cyan" bold>Ctrl+d/u</Text>    Half-page down/up</Text>
          <Text><Text color="cyan" bold>PgDn/PgUp</Text>   Full page down/up</Text>
          <Text><Text color="cyan" bold>/</Text>           Search by category or description</Text>
          <Text><Text color="cyan" bold>a</Text>           Add a transaction</Text>
          <Text><Text color="cyan" bold>e</Text>           Edit the ledger in $EDITOR</Text>
          <Text><Text color="cyan" bold>b</Text>           Cycle trend bucket (day/month/year)</Text>
          <Text><Text color="cyan" bold>r</Text>           Reload the ledger file</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Search</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text dimColor>An exact category name lists that category first,</Text>
          <Text dimColor>then descriptions or categories containing the letters in order.</Text>
          <Text><Text color="cyan" bold>Enter</Text>       Keep results and return to the table</Text>
          <Text><Text color="cyan" bold>Esc</Text>         Clear the search</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Add Transaction</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>Tab/↓</Text>       Next field</Text>
          <Text><Text color="cyan" bold>Shift+Tab/↑</Text> Previous field</Text>
          <Text><Text color="cyan" bold>Enter</Text>       Save</Text>
          <Text><Text color="cyan" bold>Esc</Text>         Cancel</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Global</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>?</Text>           Show this help</Text>
          <Text><Text color="cyan" bold>q</Text>           Quit</Text>
        </Box>
      </Box>

      <Box marginTop={2}>
        <Text dimColor>Press Esc or ? to close</Text>
      </Box>
    </Box>
  )
}
