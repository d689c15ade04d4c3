import type { Transaction } from '../transactions/transaction.js'
import type { ModelListener } from './model-listener.js'
import { InvalidArgumentError } from './model-errors.js'

/**
 * In-memory store of transactions plus the row indices an external filter
 * matched. Every successful mutation notifies registered listeners in
 * registration order.
 *
 * @example
 * const model = new TransactionModel()
 * model.register({ update: (m) => render(m.getTransactions()) })
 * model.addTransaction(createTransaction({ amount: 12.5, category: 'food' }))
 */
export class TransactionModel {
  private readonly transactions: Transaction[] = []
  private matchedFilterIndices: number[] = []
  private readonly listeners: ModelListener[] = []

  addTransaction(transaction: Transaction | null | undefined): void {
    if (transaction == null) {
      throw new InvalidArgumentError('Transaction cannot be null.')
    }
    this.transactions.push(transaction)
    // Positions shift on any structural change
    this.matchedFilterIndices = []
    this.stateChanged()
  }

  /**
   * Removes the first entry identical to `transaction`. Unknown or missing
   * transactions are a no-op, but matches are still cleared and listeners
   * still notified.
   */
  removeTransaction(transaction: Transaction | null | undefined): void {
    if (transaction != null) {
      const index = this.transactions.indexOf(transaction)
      if (index !== -1) {
        this.transactions.splice(index, 1)
      }
    }
    this.matchedFilterIndices = []
    this.stateChanged()
  }

  getTransactions(): readonly Transaction[] {
    return Object.freeze([...this.transactions])
  }

  /**
   * Replaces the matched indices wholesale. Every index is checked against
   * the current log length before anything changes.
   */
  setMatchedFilterIndices(indices: readonly number[] | null | undefined): void {
    if (indices == null) {
      throw new InvalidArgumentError('Matched filter indices cannot be null.')
    }
    for (const index of indices) {
      if (!Number.isInteger(index) || index < 0 || index >= this.transactions.length) {
        throw new InvalidArgumentError(`Invalid index: ${index}`)
      }
    }
    this.matchedFilterIndices = [...indices]
    this.stateChanged()
  }

  getMatchedFilterIndices(): readonly number[] {
    return Object.freeze([...this.matchedFilterIndices])
  }

  /**
   * Returns false for a missing or already registered listener.
   */
  register(listener: ModelListener | null | undefined): boolean {
    if (listener == null || this.listeners.includes(listener)) {
      return false
    }
    this.listeners.push(listener)
    return true
  }

  numberOfListeners(): number {
    return this.listeners.length
  }

  containsListener(listener: ModelListener | null | undefined): boolean {
    return listener != null && this.listeners.includes(listener)
  }

  /**
   * Iterates a copy taken at the start of the round. Listeners added
   * mid-round hear from the next round on; a listener that mutates the
   * model runs a nested round before this one continues.
   */
  protected stateChanged(): void {
    for (const listener of [...this.listeners]) {
      listener.update(this)
    }
  }
}
