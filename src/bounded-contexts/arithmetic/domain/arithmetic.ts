import { Result, Success, Failure } from '@/common/types/result'
import { DomainError } from '@/common/types/failures'
import { DivisionByZero, NegativeSquareRoot, Overflow } from './errors'

// --- Pure Calculations ---

/**
 * Divides `a` by `b`. A zero divisor (either sign) is the only rejected input;
 * NaN and infinite quotients are returned as ordinary values.
 */
export const divide = (a: number, b: number): Result<number, DomainError> =>
  b === 0
    ? Failure(DivisionByZero())
    : Success(a / b)

/**
 * Principal square root. Fails for any `x < 0`; NaN passes through.
 */
export const sqrt = (x: number): Result<number, DomainError> =>
  x < 0
    ? Failure(NegativeSquareRoot())
    : Success(Math.sqrt(x))

/**
 * Multiplies two numbers, failing when finite operands produce a non-finite product.
 */
export const multiply = (a: number, b: number): Result<number, DomainError> => {
  const product = a * b
  if (Number.isFinite(a) && Number.isFinite(b) && !Number.isFinite(product)) {
    return Failure(Overflow())
  }
  return Success(product)
}
