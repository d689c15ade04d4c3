import { describe, it, expect, beforeEach } from 'vitest'
import { createStore } from 'jotai'
import {
  bindModelToStore,
  transactionsAtom,
  matchedIndicesAtom,
  matchedIndexSetAtom,
  markedIndicesAtom,
  selectedIndexAtom,
  selectedTransactionAtom,
  transactionCountAtom,
} from '../transaction-atoms.js'
import { TransactionModel } from '../../model/expense-tracker-model.js'
import { createMockTransaction } from '../../test-utils/fixtures.js'

describe('bindModelToStore', () => {
  let model: TransactionModel
  let store: ReturnType<typeof createStore>

  beforeEach(() => {
    model = new TransactionModel()
    store = createStore()
  })

  it('registers exactly one listener', () => {
    const listener = bindModelToStore(model, store)

    expect(model.numberOfListeners()).toBe(1)
    expect(model.containsListener(listener)).toBe(true)
  })

  it('seeds the store with current model state', () => {
    const t1 = createMockTransaction()
    model.addTransaction(t1)
    model.setMatchedFilterIndices([0])

    bindModelToStore(model, store)

    expect(store.get(transactionsAtom)).toEqual([t1])
    expect(store.get(matchedIndicesAtom)).toEqual([0])
  })

  it('mirrors additions', () => {
    bindModelToStore(model, store)
    const t1 = createMockTransaction()

    model.addTransaction(t1)

    expect(store.get(transactionsAtom)).toEqual([t1])
    expect(store.get(transactionCountAtom)).toBe(1)
  })

  it('mirrors matched indices and clears them after a removal', () => {
    bindModelToStore(model, store)
    const t1 = createMockTransaction()
    model.addTransaction(t1)
    model.addTransaction(createMockTransaction())

    model.setMatchedFilterIndices([1])
    expect([...store.get(matchedIndexSetAtom)]).toEqual([1])

    model.removeTransaction(t1)
    expect(store.get(matchedIndicesAtom)).toEqual([])
  })

  it('drops row marks on every change', () => {
    bindModelToStore(model, store)
    model.addTransaction(createMockTransaction())
    store.set(markedIndicesAtom, new Set([0]))

    model.addTransaction(createMockTransaction())

    expect(store.get(markedIndicesAtom).size).toBe(0)
  })
})

describe('selectedTransactionAtom', () => {
  it('returns the transaction under the cursor', () => {
    const store = createStore()
    const t1 = createMockTransaction({ amount: 1 })
    const t2 = createMockTransaction({ amount: 2 })
    store.set(transactionsAtom, [t1, t2])
    store.set(selectedIndexAtom, 1)

    expect(store.get(selectedTransactionAtom)).toBe(t2)
  })

  it('returns null when the cursor is past the end', () => {
    const store = createStore()
    store.set(selectedIndexAtom, 3)

    expect(store.get(selectedTransactionAtom)).toBeNull()
  })
})
