import type { TransactionModel } from './expense-tracker-model.js'

/**
 * Anything that wants to hear about model changes.
 * `update` runs synchronously after every successful mutation.
 */
export interface ModelListener {
  update(model: TransactionModel): void
}
