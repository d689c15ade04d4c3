import React from 'react'
import { Box, Text } from 'ink'
import { formatAmount, type Transaction } from './transaction.js'

interface TransactionRowProps {
  index: number
  transaction: Transaction
  currencySymbol: string
  isSelected: boolean
  isMarked: boolean
  isMatched: boolean
}

export const TransactionRow = ({
  index,
  transaction,
  currencySymbol,
  isSelected,
  isMarked,
  isMatched,
}: TransactionRowProps) => (
  <Box gap={1}>
    {/* Selection indicator */}
    <Text color={isSelected ? 'cyan' : undefined}>
      {isSelected ? '▶' : ' '}
    </Text>

    {/* Mark checkbox */}
    <Text color={isMarked ? 'green' : 'gray'}>
      {isMarked ? '☑' : '☐'}
    </Text>

    <Box width={4} justifyContent="flex-end">
      <Text dimColor>{index + 1}</Text>
    </Box>

    <Box width={24}>
      <Text dimColor>{transaction.timestamp.replace('T', ' ').slice(0, 19)}</Text>
    </Box>

    <Box width={15}>
      <Text bold={isSelected} color={isMatched ? 'yellow' : undefined}>
        {transaction.category}
      </Text>
    </Box>

    <Box width={12} justifyContent="flex-end">
      <Text color={isMatched ? 'yellow' : 'red'}>
        {formatAmount(transaction.amount, currencySymbol)}
      </Text>
    </Box>

    {isMatched && <Text color="yellow">★</Text>}
  </Box>
)
