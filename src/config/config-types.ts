import { z } from 'zod'

export const DEFAULT_PAGE_SIZE = 20
export const DEFAULT_CURRENCY_SYMBOL = '$'

export const displayConfigSchema = z.object({
  pageSize: z.number().int().min(10).max(100).default(DEFAULT_PAGE_SIZE),
  currencySymbol: z.string().trim().min(1).default(DEFAULT_CURRENCY_SYMBOL),
})

export const appConfigSchema = z.object({
  display: displayConfigSchema.default({}),
})

export type AppConfig = z.infer<typeof appConfigSchema>
