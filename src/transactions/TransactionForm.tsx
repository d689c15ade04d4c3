import React, { useState } from 'react'
import { Box, Text, useInput } from 'ink'
import TextInput from 'ink-text-input'
import { useAtomValue, useSetAtom } from 'jotai'
import { goBackAtom } from '../navigation/navigation-atoms.js'
import { selectedIndexAtom, transactionsAtom } from './transaction-atoms.js'
import { KeyHints } from '../shared/components/KeyHints.js'
import { CATEGORIES } from './transaction.js'
import type { ExpenseController } from '../controller/expense-controller.js'

type Field = 'amount' | 'category'

interface TransactionFormProps {
  controller: ExpenseController
}

export const TransactionForm = ({ controller }: TransactionFormProps) => {
  const goBack = useSetAtom(goBackAtom)
  const setSelectedIndex = useSetAtom(selectedIndexAtom)
  const transactions = useAtomValue(transactionsAtom)
  const [amount, setAmount] = useState('')
  const [category, setCategory] = useState('')
  const [currentField, setCurrentField] = useState<Field>('amount')
  const [error, setError] = useState<string | null>(null)

  const handleSubmit = () => {
    const result = controller.addTransaction(amount, category)
    if (!result.success) {
      setError(result.error)
      return
    }
    // New rows land at the end
    setSelectedIndex(transactions.length)
    goBack()
  }

  useInput((_input, key) => {
    if (key.escape) {
      goBack()
      return
    }
    if (key.tab) {
      setCurrentField((f) => (f === 'amount' ? 'category' : 'amount'))
      return
    }
    if (key.return) {
      handleSubmit()
    }
  })

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">Add Transaction</Text>

      <Box marginTop={1} flexDirection="column">
        <Box gap={1}>
          <Text color={currentField === 'amount' ? 'cyan' : undefined}>
            {currentField === 'amount' ? '▶' : ' '} Amount:
          </Text>
          {currentField === 'amount' ? (
            <TextInput value={amount} onChange={setAmount} />
          ) : (
            <Text>{amount || <Text dimColor>empty</Text>}</Text>
          )}
        </Box>

        <Box gap={1}>
          <Text color={currentField === 'category' ? 'cyan' : undefined}>
            {currentField === 'category' ? '▶' : ' '} Category:
          </Text>
          {currentField === 'category' ? (
            <TextInput value={category} onChange={setCategory} />
          ) : (
            <Text>{category || <Text dimColor>empty</Text>}</Text>
          )}
        </Box>

        <Box marginLeft={2}>
          <Text dimColor>{CATEGORIES.join(' · ')}</Text>
        </Box>
      </Box>

      {error && (
        <Box marginTop={1}>
          <Text color="red">{error}</Text>
        </Box>
      )}

      <KeyHints
        hints={[
          { key: 'Tab', label: 'switch field' },
          { key: 'Enter', label: 'save' },
          { key: 'Esc', label: 'cancel' },
        ]}
      />
    </Box>
  )
}
