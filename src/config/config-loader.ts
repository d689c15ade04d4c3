import { appConfigSchema, type AppConfig } from './config-types.js'

/**
 * Environment variable names for defaults
 */
export const ENV_VARS = {
  PAGE_SIZE: 'EXPENSE_TRACKER_PAGE_SIZE',
  CURRENCY: 'EXPENSE_TRACKER_CURRENCY',
} as const

export interface ConfigOverrides {
  pageSize?: number
  currencySymbol?: string
}

export type ConfigSource = 'defaults' | 'env' | 'cli' | 'mixed'

interface LoadConfigResult {
  config: AppConfig
  source: ConfigSource
}

const parseNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined
  return Number(value)
}

/**
 * Merge CLI overrides over environment variables over defaults.
 * Throws a ZodError when the merged values are invalid.
 */
export const loadConfigWithEnv = (
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): LoadConfigResult => {
  const envPageSize = parseNumber(env[ENV_VARS.PAGE_SIZE])
  const envCurrency = env[ENV_VARS.CURRENCY] || undefined

  const pageSize = overrides.pageSize ?? envPageSize
  const currencySymbol = overrides.currencySymbol ?? envCurrency

  const fromCli = overrides.pageSize !== undefined || overrides.currencySymbol !== undefined
  const fromEnv =
    (envPageSize !== undefined && overrides.pageSize === undefined) ||
    (envCurrency !== undefined && overrides.currencySymbol === undefined)

  let source: ConfigSource
  if (fromCli && fromEnv) {
    source = 'mixed'
  } else if (fromCli) {
    source = 'cli'
  } else if (fromEnv) {
    source = 'env'
  } else {
    source = 'defaults'
  }

  // Validate with zod schema
  const config = appConfigSchema.parse({
    display: { pageSize, currencySymbol },
  })

  return { config, source }
}
