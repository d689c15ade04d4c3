import React from 'react'
import { Box, Text } from 'ink'

interface StatusBarProps {
  title: string
  transactionCount: number
  matchedCount: number
  markedCount?: number
}

export const StatusBar = ({
  title,
  transactionCount,
  matchedCount,
  markedCount = 0,
}: StatusBarProps) => (
  <Box
    borderStyle="single"
    borderColor="gray"
    paddingX={1}
    justifyContent="space-between"
  >
    <Text bold color="green">
      {title}
    </Text>
    <Box gap={2}>
      {markedCount > 0 && (
        <Text color="cyan">{markedCount} marked</Text>
      )}
      <Text dimColor>
        {matchedCount > 0 && (
          <Text color="yellow">{matchedCount} matched</Text>
        )}
        {matchedCount > 0 && ' · '}
        {transactionCount} total
      </Text>
    </Box>
  </Box>
)
