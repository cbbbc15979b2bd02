import { Result, Success, Failure } from '@/common/types/result'
import {
  ParseIntError,
  ParseIntErrorReason,
  ParseFloatError,
  ParseFloatErrorReason,
  ParseBoolError,
} from '@/common/types/failures'

// -------- MESSAGES --------

const parseIntMessages: Record<ParseIntErrorReason, string> = {
  Empty: 'cannot parse integer from empty string',
  InvalidDigit: 'invalid digit found in string',
  PosOverflow: 'number too large to fit in target type',
}

const parseFloatMessages: Record<ParseFloatErrorReason, string> = {
  Empty: 'cannot parse float from empty string',
  Invalid: 'invalid float literal',
}

const intFailure = (reason: ParseIntErrorReason, input: string): Result<never, ParseIntError> =>
  Failure({ kind: 'ParseIntError', reason, input, message: parseIntMessages[reason] })

const floatFailure = (reason: ParseFloatErrorReason, input: string): Result<never, ParseFloatError> =>
  Failure({ kind: 'ParseFloatError', reason, input, message: parseFloatMessages[reason] })

// -------- PREDICATES --------

const isDigit = (c: string): boolean => c >= '0' && c <= '9'

const decimalLiteral = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const infinityLiteral = /^[+-]?inf(inity)?$/i

const nanLiteral = /^[+-]?nan$/i

// -------- PARSERS --------

export const U16_MAX = 65535

/**
 * Parses an unsigned decimal integer no greater than `max`.
 *
 * Accepts an optional leading `+`. Input is not trimmed. Digits are scanned
 * left to right, so overflow is reported as soon as the running value passes
 * `max`, even if a non-digit follows.
 */
export const parseUnsignedInt = (input: string, max: number = U16_MAX): Result<number, ParseIntError> => {
  if (input.length === 0) return intFailure('Empty', input)

  const digits = input.startsWith('+') ? input.slice(1) : input
  if (digits.length === 0) return intFailure('InvalidDigit', input)

  let value = 0
  for (const c of digits) {
    if (!isDigit(c)) return intFailure('InvalidDigit', input)
    value = value * 10 + Number(c)
    if (value > max) return intFailure('PosOverflow', input)
  }
  return Success(value)
}

/**
 * Parses a float literal: decimal with optional sign, fraction and exponent,
 * or `inf`, `infinity`, `nan` in any case. Input is not trimmed.
 */
export const parseFloatStrict = (input: string): Result<number, ParseFloatError> => {
  if (input.length === 0) return floatFailure('Empty', input)

  if (decimalLiteral.test(input)) return Success(Number(input))
  if (infinityLiteral.test(input)) return Success(input.startsWith('-') ? -Infinity : Infinity)
  if (nanLiteral.test(input)) return Success(NaN)
  return floatFailure('Invalid', input)
}

/**
 * Parses exactly `true` or `false`.
 */
export const parseBool = (input: string): Result<boolean, ParseBoolError> =>
  input === 'true' || input === 'false'
    ? Success(input === 'true')
    : Failure({
        kind: 'ParseBoolError',
        input,
        message: 'provided string was not `true` or `false`',
      })
