import type { GlobalOptions } from '../args.js'
import { createFormatter } from '../output.js'
import { CATEGORIES, MAX_AMOUNT, type Category } from '../../transactions/transaction.js'

interface CategoriesResult {
  success: boolean
  categories: readonly Category[]
  maxAmount: number
  formatted?: string
}

export const buildCategoriesResult = (options: GlobalOptions): CategoriesResult => {
  const result: CategoriesResult = {
    success: true,
    categories: CATEGORIES,
    maxAmount: MAX_AMOUNT,
  }

  if (options.format === 'text') {
    result.formatted = [
      'Accepted categories:',
      ...CATEGORIES.map((c) => `  ${c}`),
      `Amounts must be greater than 0 and at most ${MAX_AMOUNT}.`,
    ].join('\n')
  }

  return result
}

export const categoriesCommand = (options: GlobalOptions): void => {
  const formatter = createFormatter(options.format, options.quiet)
  const result = buildCategoriesResult(options)
  formatter.success(result.formatted ?? result)
}
