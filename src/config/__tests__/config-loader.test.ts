import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { loadConfigWithEnv, ENV_VARS } from '../config-loader.js'

describe('loadConfigWithEnv', () => {
  it('uses defaults when nothing is set', () => {
    const result = loadConfigWithEnv({}, {})

    expect(result.source).toBe('defaults')
    expect(result.config.display).toEqual({ pageSize: 20, currencySymbol: '$' })
  })

  it('reads values from environment variables', () => {
    const result = loadConfigWithEnv({}, {
      [ENV_VARS.PAGE_SIZE]: '40',
      [ENV_VARS.CURRENCY]: '€',
    })

    expect(result.source).toBe('env')
    expect(result.config.display).toEqual({ pageSize: 40, currencySymbol: '€' })
  })

  it('lets CLI overrides win over environment variables', () => {
    const result = loadConfigWithEnv(
      { pageSize: 15, currencySymbol: '£' },
      { [ENV_VARS.PAGE_SIZE]: '40', [ENV_VARS.CURRENCY]: '€' }
    )

    expect(result.source).toBe('cli')
    expect(result.config.display).toEqual({ pageSize: 15, currencySymbol: '£' })
  })

  it('reports mixed source when both contribute', () => {
    const result = loadConfigWithEnv({ pageSize: 30 }, { [ENV_VARS.CURRENCY]: '€' })

    expect(result.source).toBe('mixed')
    expect(result.config.display).toEqual({ pageSize: 30, currencySymbol: '€' })
  })

  it('ignores empty environment values', () => {
    const result = loadConfigWithEnv({}, { [ENV_VARS.PAGE_SIZE]: '', [ENV_VARS.CURRENCY]: '' })

    expect(result.source).toBe('defaults')
    expect(result.config.display.pageSize).toBe(20)
  })

  it('throws on a non-numeric page size', () => {
    expect(() => loadConfigWithEnv({}, { [ENV_VARS.PAGE_SIZE]: 'lots' })).toThrow(ZodError)
  })

  it('throws on an out-of-range CLI page size', () => {
    expect(() => loadConfigWithEnv({ pageSize: 500 }, {})).toThrow(ZodError)
  })
})
