import { atom, type createStore } from 'jotai'
import type { TransactionModel } from '../model/expense-tracker-model.js'
import type { ModelListener } from '../model/model-listener.js'
import type { Transaction } from './transaction.js'

type Store = ReturnType<typeof createStore>

// Mirrors of model state, written only by the model listener
export const transactionsAtom = atom<readonly Transaction[]>([])
export const matchedIndicesAtom = atom<readonly number[]>([])

// View state
export const selectedIndexAtom = atom(0)
export const markedIndicesAtom = atom<Set<number>>(new Set<number>())
export const lastErrorAtom = atom<string | null>(null)

// Derived: O(1) lookup for row rendering
export const matchedIndexSetAtom = atom((get) => new Set(get(matchedIndicesAtom)))

export const transactionCountAtom = atom((get) => get(transactionsAtom).length)

export const selectedTransactionAtom = atom((get) => {
  const transactions = get(transactionsAtom)
  const index = get(selectedIndexAtom)
  return transactions[index] ?? null
})

// Viewport for scrolling
export const viewportStartAtom = atom(0)

/**
 * Register a listener that copies model snapshots into `store`.
 * Marks are dropped on every change since row positions may have shifted.
 */
export const bindModelToStore = (model: TransactionModel, store: Store): ModelListener => {
  const sync = (current: TransactionModel) => {
    store.set(transactionsAtom, current.getTransactions())
    store.set(matchedIndicesAtom, current.getMatchedFilterIndices())
    store.set(markedIndicesAtom, new Set<number>())
  }

  const listener: ModelListener = { update: sync }
  model.register(listener)
  sync(model)
  return listener
}
