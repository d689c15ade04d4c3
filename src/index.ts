export { TransactionModel } from './model/expense-tracker-model.js'
export type { ModelListener } from './model/model-listener.js'
export { InvalidArgumentError, isInvalidArgumentError } from './model/model-errors.js'
export {
  CATEGORIES,
  MAX_AMOUNT,
  createTransaction,
  formatAmount,
  isValidAmount,
  isValidCategory,
  transactionInputSchema,
} from './transactions/transaction.js'
export type { Category, Transaction, TransactionInput } from './transactions/transaction.js'
export { ExpenseController } from './controller/expense-controller.js'
export type { ControllerResult } from './controller/expense-controller.js'
export { bindModelToStore } from './transactions/transaction-atoms.js'
