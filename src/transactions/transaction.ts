import { z } from 'zod'
import { InvalidArgumentError } from '../model/model-errors.js'

export const CATEGORIES = ['food', 'travel', 'bills', 'entertainment', 'other'] as const

export type Category = (typeof CATEGORIES)[number]

export const MAX_AMOUNT = 1000

export const transactionInputSchema = z.object({
  amount: z
    .number({ invalid_type_error: 'Amount must be a number' })
    .finite('Amount must be a finite number')
    .gt(0, 'Amount must be greater than 0')
    .lte(MAX_AMOUNT, `Amount must not exceed ${MAX_AMOUNT}`),
  category: z
    .string({ invalid_type_error: 'Category must be text' })
    .trim()
    .toLowerCase()
    .pipe(
      z.enum(CATEGORIES, {
        errorMap: () => ({ message: `Category must be one of: ${CATEGORIES.join(', ')}` }),
      })
    ),
})

export type TransactionInput = z.input<typeof transactionInputSchema>

export interface Transaction {
  readonly amount: number
  readonly category: Category
  /** ISO-8601 creation time */
  readonly timestamp: string
}

/**
 * Validate raw input and build a frozen Transaction.
 * Throws InvalidArgumentError with the first validation message.
 */
export const createTransaction = (input: TransactionInput, now: Date = new Date()): Transaction => {
  const result = transactionInputSchema.safeParse(input)
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? 'Invalid transaction'
    throw new InvalidArgumentError(message)
  }

  return Object.freeze({
    amount: result.data.amount,
    category: result.data.category,
    timestamp: now.toISOString(),
  })
}

export const isValidAmount = (amount: number): boolean =>
  transactionInputSchema.shape.amount.safeParse(amount).success

export const isValidCategory = (category: string): boolean =>
  transactionInputSchema.shape.category.safeParse(category).success

/**
 * Format an amount as currency text, e.g. `$12.50`
 */
export const formatAmount = (amount: number, currencySymbol = '$'): string =>
  amount < 0
    ? `-${currencySymbol}${Math.abs(amount).toFixed(2)}`
    : `${currencySymbol}${amount.toFixed(2)}`
