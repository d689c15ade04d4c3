import { describe, it, expect } from 'vitest'
import {
  createTransaction,
  formatAmount,
  isValidAmount,
  isValidCategory,
  CATEGORIES,
} from '../transaction.js'
import { InvalidArgumentError } from '../../model/model-errors.js'
import { FIXED_NOW } from '../../test-utils/fixtures.js'

describe('createTransaction', () => {
  it('builds a frozen transaction stamped with the given time', () => {
    const tx = createTransaction({ amount: 12.5, category: 'food' }, FIXED_NOW)

    expect(tx).toEqual({ amount: 12.5, category: 'food', timestamp: '2024-03-15T10:30:00.000Z' })
    expect(Object.isFrozen(tx)).toBe(true)
  })

  it('normalizes category case and whitespace', () => {
    const tx = createTransaction({ amount: 3, category: '  Travel ' }, FIXED_NOW)

    expect(tx.category).toBe('travel')
  })

  it('accepts the maximum amount', () => {
    const tx = createTransaction({ amount: 1000, category: 'bills' }, FIXED_NOW)

    expect(tx.amount).toBe(1000)
  })

  it('rejects zero', () => {
    expect(() => createTransaction({ amount: 0, category: 'food' })).toThrow(InvalidArgumentError)
    expect(() => createTransaction({ amount: 0, category: 'food' })).toThrow(
      'Amount must be greater than 0'
    )
  })

  it('rejects negative amounts', () => {
    expect(() => createTransaction({ amount: -5, category: 'food' })).toThrow(
      'Amount must be greater than 0'
    )
  })

  it('rejects amounts above the maximum', () => {
    expect(() => createTransaction({ amount: 1000.01, category: 'food' })).toThrow(
      'Amount must not exceed 1000'
    )
  })

  it('rejects NaN', () => {
    expect(() => createTransaction({ amount: Number.NaN, category: 'food' })).toThrow(
      'Amount must be a number'
    )
  })

  it('rejects unknown categories', () => {
    expect(() => createTransaction({ amount: 5, category: 'rent' })).toThrow(
      'Category must be one of: food, travel, bills, entertainment, other'
    )
  })

  it('reports the amount problem first when both fields are bad', () => {
    expect(() => createTransaction({ amount: -1, category: 'rent' })).toThrow(
      'Amount must be greater than 0'
    )
  })
})

describe('isValidAmount', () => {
  it.each([
    [0.01, true],
    [1000, true],
    [0, false],
    [1001, false],
    [Number.POSITIVE_INFINITY, false],
  ])('%s -> %s', (amount, expected) => {
    expect(isValidAmount(amount)).toBe(expected)
  })
})

describe('isValidCategory', () => {
  it('accepts every known category', () => {
    for (const category of CATEGORIES) {
      expect(isValidCategory(category)).toBe(true)
    }
  })

  it('accepts mixed case', () => {
    expect(isValidCategory('Entertainment')).toBe(true)
  })

  it('rejects empty text', () => {
    expect(isValidCategory('')).toBe(false)
  })
})

describe('formatAmount', () => {
  it('formats with two decimals', () => {
    expect(formatAmount(12.5)).toBe('$12.50')
  })

  it('uses the given currency symbol', () => {
    expect(formatAmount(3, '€')).toBe('€3.00')
  })

  it('puts the sign before the symbol', () => {
    expect(formatAmount(-7.25)).toBe('-$7.25')
  })
})
