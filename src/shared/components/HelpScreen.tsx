import React from 'react'
import { Box, Text, useInput } from 'ink'
import { CATEGORIES, MAX_AMOUNT } from '../../transactions/transaction.js'

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
      <Text bold color="cyan">Expense Tracker - Keyboard Shortcuts</Text>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Transaction List</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>j/k</Text> or <Text color="cyan" bold>↑/↓</Text>   Navigate up/down</Text>
          <Text><Text color="cyan" bold>G</Text>           Jump to last item</Text>
          <Text><Text color="cyan" bold>gg</Text>          Jump to first item</Text>
          <Text><Text color="cyan" bold>Space</Text>       Mark/unmark row</Text>
          <Text><Text color="cyan" bold>m</Text>           Apply marks as matched rows</Text>
          <Text><Text color="cyan" bold>x</Text>           Clear matched rows</Text>
          <Text><Text color="cyan" bold>a</Text>           Add transaction</Text>
          <Text><Text color="cyan" bold>u</Text>           Undo (remove) selected transaction</Text>
          <Text><Text color="cyan" bold>q</Text>           Quit</Text>
        </Box>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Add Transaction</Text>
        <Box flexDirection="column" marginLeft={2}>
          <Text><Text color="cyan" bold>Tab</Text>         Switch field</Text>
          <Text><Text color="cyan" bold>Enter</Text>       Save</Text>
          <Text><Text color="cyan" bold>Esc</Text>         Cancel</Text>
          <Text dimColor>Amount: greater than 0, at most {MAX_AMOUNT}</Text>
          <Text dimColor>Category: {CATEGORIES.join(', ')}</Text>
        </Box>
      </Box>

      <Box marginTop={1}>
        <Text dimColor>Press ? or Esc to close</Text>
      </Box>
    </Box>
  )
}
