import React, { useEffect, useState } from 'react'
import { Box, Text, useInput, useApp } from 'ink'
import { useAtom, useAtomValue, useSetAtom } from 'jotai'
import {
  transactionsAtom,
  matchedIndexSetAtom,
  markedIndicesAtom,
  selectedIndexAtom,
  selectedTransactionAtom,
  transactionCountAtom,
  viewportStartAtom,
  lastErrorAtom,
} from './transaction-atoms.js'
import { navigateAtom } from '../navigation/navigation-atoms.js'
import { TransactionRow } from './TransactionRow.js'
import { KeyHints } from '../shared/components/KeyHints.js'
import { StatusBar } from '../shared/components/StatusBar.js'
import type { ExpenseController } from '../controller/expense-controller.js'

interface TransactionListProps {
  controller: ExpenseController
  pageSize: number
  currencySymbol: string
}

export const TransactionList = ({ controller, pageSize, currencySymbol }: TransactionListProps) => {
  const { exit } = useApp()
  const transactions = useAtomValue(transactionsAtom)
  const transactionCount = useAtomValue(transactionCountAtom)
  const selectedTransaction = useAtomValue(selectedTransactionAtom)
  const matched = useAtomValue(matchedIndexSetAtom)
  const [marked, setMarked] = useAtom(markedIndicesAtom)
  const [selectedIndex, setSelectedIndex] = useAtom(selectedIndexAtom)
  const [viewportStart, setViewportStart] = useAtom(viewportStartAtom)
  const [lastError, setLastError] = useAtom(lastErrorAtom)
  const navigate = useSetAtom(navigateAtom)

  // Track 'g' key for gg command
  const [waitingForG, setWaitingForG] = useState(false)

  // Keep selection in bounds
  useEffect(() => {
    if (selectedIndex >= transactionCount) {
      setSelectedIndex(Math.max(0, transactionCount - 1))
    }
  }, [transactionCount, selectedIndex, setSelectedIndex])

  // Keep viewport following selection
  useEffect(() => {
    if (selectedIndex < viewportStart) {
      setViewportStart(selectedIndex)
    } else if (selectedIndex >= viewportStart + pageSize) {
      setViewportStart(selectedIndex - pageSize + 1)
    }
  }, [selectedIndex, viewportStart, pageSize, setViewportStart])

  useInput((input, key) => {
    if (waitingForG) {
      setWaitingForG(false)
      if (input === 'g') {
        setSelectedIndex(0)
        setViewportStart(0)
        return
      }
    }

    if (input === 'G') {
      setSelectedIndex(Math.max(0, transactionCount - 1))
      return
    }
    if (input === 'g') {
      setWaitingForG(true)
      return
    }

    if (input === 'j' || key.downArrow) {
      setSelectedIndex((i) => Math.min(i + 1, Math.max(0, transactionCount - 1)))
    }
    if (input === 'k' || key.upArrow) {
      setSelectedIndex((i) => Math.max(i - 1, 0))
    }

    // Toggle mark
    if (input === ' ' && selectedTransaction) {
      setMarked((current: Set<number>) => {
        const next = new Set(current)
        if (next.has(selectedIndex)) {
          next.delete(selectedIndex)
        } else {
          next.add(selectedIndex)
        }
        return next
      })
    }

    if (input === 'm') {
      const result = controller.applyMatches([...marked].sort((a, b) => a - b))
      setLastError(result.success ? null : result.error)
    }

    if (input === 'x') {
      const result = controller.clearMatches()
      setLastError(result.success ? null : result.error)
    }

    if (input === 'u' && selectedTransaction) {
      const result = controller.undoTransaction(selectedIndex)
      setLastError(result.success ? null : result.error)
    }

    if (input === 'a') {
      setLastError(null)
      navigate('add')
    }

    if (input === '?') {
      navigate('help')
    }

    if (input === 'q') {
      exit()
    }
  })

  const visible = transactions.slice(viewportStart, viewportStart + pageSize)

  return (
    <Box flexDirection="column">
      <StatusBar
        title="Expense Tracker"
        transactionCount={transactionCount}
        matchedCount={matched.size}
        markedCount={marked.size}
      />

      <Box flexDirection="column" marginTop={1}>
        {transactionCount === 0 ? (
          <Text dimColor>No transactions yet. Press a to add one.</Text>
        ) : (
          visible.map((tx, i) => {
            const index = viewportStart + i
            return (
              <TransactionRow
                key={`${index}-${tx.timestamp}`}
                index={index}
                transaction={tx}
                currencySymbol={currencySymbol}
                isSelected={index === selectedIndex}
                isMarked={marked.has(index)}
                isMatched={matched.has(index)}
              />
            )
          })
        )}
      </Box>

      {transactionCount > pageSize && (
        <Text dimColor>
          {selectedIndex + 1}/{transactionCount}
        </Text>
      )}

      {lastError && (
        <Box marginTop={1}>
          <Text color="red">{lastError}</Text>
        </Box>
      )}

      <KeyHints
        hints={[
          { key: 'j/k', label: 'move' },
          { key: 'space', label: 'mark' },
          { key: 'm', label: 'match marked' },
          { key: 'x', label: 'clear matches' },
          { key: 'a', label: 'add' },
          { key: 'u', label: 'undo' },
          { key: '?', label: 'help' },
          { key: 'q', label: 'quit' },
        ]}
      />
    </Box>
  )
}
