import { describe, it, expect } from 'vitest'
import { divide, sqrt, multiply } from './arithmetic'
import { mapError } from '@/common/types/result'
import { fromDomainError } from '@/common/types/conversions'

describe('Arithmetic Domain Operations', () => {
  describe('divide', () => {
    it('divides by a non-zero divisor', () => {
      expect(divide(10, 2)).toEqual({ isSuccess: true, value: 5 })
      expect(divide(-1, 3)).toEqual({ isSuccess: true, value: -1 / 3 })
      expect(divide(0, 7)).toEqual({ isSuccess: true, value: 0 })
    })

    it.each([10, 0, -3.5, Infinity, NaN])('fails with DivisionByZero for %s / 0', a => {
      expect(divide(a, 0)).toEqual({ isSuccess: false, error: { kind: 'DivisionByZero' } })
    })

    it('treats negative zero as zero', () => {
      expect(divide(1, -0)).toEqual({ isSuccess: false, error: { kind: 'DivisionByZero' } })
    })

    it('passes non-finite quotients through', () => {
      expect(divide(Infinity, 2)).toEqual({ isSuccess: true, value: Infinity })
      const nan = divide(NaN, 2)
      expect(nan.isSuccess && Number.isNaN(nan.value)).toBe(true)
    })

    it('converts to a Domain error', () => {
      expect(mapError(fromDomainError)(divide(1, 0))).toEqual({
        isSuccess: false,
        error: { type: 'Domain', error: { kind: 'DivisionByZero' }, message: 'division by zero' },
      })
    })
  })

  describe('sqrt', () => {
    it('returns the principal square root', () => {
      expect(sqrt(16)).toEqual({ isSuccess: true, value: 4 })
      expect(sqrt(0)).toEqual({ isSuccess: true, value: 0 })
    })

    it.each([-4, -1e-9, -Infinity])('fails with NegativeSquareRoot for %s', x => {
      expect(sqrt(x)).toEqual({ isSuccess: false, error: { kind: 'NegativeSquareRoot' } })
    })

    it.each([2, 0.5, 1e-6, 12345.678])('squares back to %s', x => {
      const root = sqrt(x)
      expect(root.isSuccess).toBe(true)
      if (root.isSuccess) {
        expect(root.value * root.value).toBeCloseTo(x, 9)
      }
    })

    it('converts to a Domain error', () => {
      expect(mapError(fromDomainError)(sqrt(-4))).toEqual({
        isSuccess: false,
        error: { type: 'Domain', error: { kind: 'NegativeSquareRoot' }, message: 'square root of a negative number' },
      })
    })
  })

  describe('multiply', () => {
    it('multiplies finite operands', () => {
      expect(multiply(6, 7)).toEqual({ isSuccess: true, value: 42 })
    })

    it('fails with Overflow when finite operands overflow', () => {
      expect(multiply(1e308, 10)).toEqual({ isSuccess: false, error: { kind: 'Overflow' } })
    })

    it('does not treat an infinite operand as overflow', () => {
      expect(multiply(Infinity, 2)).toEqual({ isSuccess: true, value: Infinity })
    })
  })
})
