import { describe, it, expect } from 'vitest'
import {
  fromIoFailure,
  fromParseIntError,
  fromParseFloatError,
  fromDomainError,
  toAppError,
  toCanonical,
  isAppError,
} from '@/common/types/conversions'
import { describeError, IoError, ParseError, ParseFloatFailure, DomainFailure } from '@/common/types/errors'
import type { IoFailure, ParseIntError, ParseFloatError } from '@/common/types/failures'

const missingFile: IoFailure = {
  kind: 'IoFailure',
  code: 'ENOENT',
  path: 'number.txt',
  message: "ENOENT: no such file or directory, open 'number.txt'",
}

const badDigit: ParseIntError = {
  kind: 'ParseIntError',
  reason: 'InvalidDigit',
  input: 'notanumber',
  message: 'invalid digit found in string',
}

const badFloat: ParseFloatError = {
  kind: 'ParseFloatError',
  reason: 'Invalid',
  input: 'abc',
  message: 'invalid float literal',
}

describe('Conversion registry', () => {
  it('converts an I/O failure keeping code, path and message', () => {
    expect(fromIoFailure(missingFile)).toEqual({
      type: 'Io',
      code: 'ENOENT',
      path: 'number.txt',
      message: "ENOENT: no such file or directory, open 'number.txt'",
    })
  })

  it('omits the path when the I/O failure has none', () => {
    expect(fromIoFailure({ kind: 'IoFailure', code: 'EIO', message: 'boom' })).toEqual({
      type: 'Io',
      code: 'EIO',
      message: 'boom',
    })
  })

  it('converts an integer parse failure', () => {
    expect(fromParseIntError(badDigit)).toEqual({
      type: 'Parse',
      reason: 'InvalidDigit',
      input: 'notanumber',
      message: 'invalid digit found in string',
    })
  })

  it('converts a float parse failure', () => {
    expect(fromParseFloatError(badFloat)).toEqual({
      type: 'ParseFloat',
      reason: 'Invalid',
      input: 'abc',
      message: 'invalid float literal',
    })
  })

  it('converts each domain error with its description', () => {
    expect(fromDomainError({ kind: 'DivisionByZero' })).toEqual({
      type: 'Domain',
      error: { kind: 'DivisionByZero' },
      message: 'division by zero',
    })
    expect(fromDomainError({ kind: 'NegativeSquareRoot' }).message).toBe('square root of a negative number')
    expect(fromDomainError({ kind: 'Overflow' }).message).toBe('arithmetic overflow')
  })

  it('toAppError dispatches on the failure kind', () => {
    expect(toAppError(missingFile)).toEqual(fromIoFailure(missingFile))
    expect(toAppError(badDigit)).toEqual(fromParseIntError(badDigit))
    expect(toAppError(badFloat)).toEqual(fromParseFloatError(badFloat))
    expect(toAppError({ kind: 'Overflow' })).toEqual(fromDomainError({ kind: 'Overflow' }))
  })

  it('toCanonical passes an AppError through as-is', () => {
    const already = ParseError('Empty', '', 'cannot parse integer from empty string')
    expect(isAppError(already)).toBe(true)
    expect(toCanonical(already)).toBe(already)
  })

  it('toCanonical converts a foreign failure', () => {
    expect(isAppError(badFloat)).toBe(false)
    expect(toCanonical(badFloat)).toEqual(fromParseFloatError(badFloat))
  })
})

describe('describeError', () => {
  it('names the category and embeds the cause verbatim', () => {
    expect(describeError(IoError('ENOENT', "ENOENT: no such file or directory, open 'a.txt'", 'a.txt')))
      .toBe("I/O error: ENOENT: no such file or directory, open 'a.txt'")
    expect(describeError(ParseError('InvalidDigit', 'x', 'invalid digit found in string')))
      .toBe('Parse error: invalid digit found in string')
    expect(describeError(ParseFloatFailure('Empty', '', 'cannot parse float from empty string')))
      .toBe('Float parse error: cannot parse float from empty string')
    expect(describeError(DomainFailure({ kind: 'DivisionByZero' }, 'division by zero')))
      .toBe('Math error: division by zero')
  })
})
