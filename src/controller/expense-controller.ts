import { z } from 'zod'
import type { TransactionModel } from '../model/expense-tracker-model.js'
import { isInvalidArgumentError } from '../model/model-errors.js'
import { createTransaction, type Transaction } from '../transactions/transaction.js'

// Plain decimals only: no sign, exponent or hex
const amountTextSchema = z
  .string()
  .regex(/^(\d+(\.\d+)?|\.\d+)$/, 'Amount must be a number')

export type ControllerResult<T = void> =
  | { success: true; value: T }
  | { success: false; error: string }

/**
 * Translates user input into model calls. Validation failures come back as
 * results so the view can show them; anything else propagates.
 */
export class ExpenseController {
  constructor(
    private readonly model: TransactionModel,
    private readonly now: () => Date = () => new Date()
  ) {}

  addTransaction(rawAmount: string, rawCategory: string): ControllerResult<Transaction> {
    const trimmed = rawAmount.trim()
    if (trimmed === '') {
      return { success: false, error: 'Amount is required' }
    }

    const amountText = amountTextSchema.safeParse(trimmed)
    if (!amountText.success) {
      return { success: false, error: amountText.error.issues[0]?.message ?? 'Invalid amount' }
    }

    return this.attempt(() => {
      const transaction = createTransaction(
        { amount: Number(amountText.data), category: rawCategory },
        this.now()
      )
      this.model.addTransaction(transaction)
      return transaction
    })
  }

  /**
   * Remove the transaction shown at `rowIndex`
   */
  undoTransaction(rowIndex: number): ControllerResult<Transaction> {
    const transactions = this.model.getTransactions()
    const transaction = Number.isInteger(rowIndex) ? transactions[rowIndex] : undefined
    if (!transaction) {
      return { success: false, error: `No transaction at row ${rowIndex}` }
    }

    this.model.removeTransaction(transaction)
    return { success: true, value: transaction }
  }

  applyMatches(indices: readonly number[]): ControllerResult {
    return this.attempt(() => {
      this.model.setMatchedFilterIndices(indices)
    })
  }

  clearMatches(): ControllerResult {
    return this.applyMatches([])
  }

  private attempt<T>(fn: () => T): ControllerResult<T> {
    try {
      return { success: true, value: fn() }
    } catch (err) {
      if (isInvalidArgumentError(err)) {
        return { success: false, error: err.message }
      }
      throw err
    }
  }
}
