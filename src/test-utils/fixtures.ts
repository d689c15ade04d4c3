import { vi } from 'vitest'
import type { ModelListener } from '../model/model-listener.js'
import { createTransaction, type TransactionInput, type Transaction } from '../transactions/transaction.js'

export const FIXED_NOW = new Date('2024-03-15T10:30:00.000Z')

/**
 * Creates a Transaction with sensible defaults
 */
export const createMockTransaction = (overrides: Partial<TransactionInput> = {}): Transaction =>
  createTransaction({ amount: 10, category: 'food', ...overrides }, FIXED_NOW)

/**
 * Creates a listener whose update is a vi.fn spy
 */
export const createMockListener = () => {
  const update = vi.fn<ModelListener['update']>()
  const listener: ModelListener = { update }
  return { listener, update }
}
