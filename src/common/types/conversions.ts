import {
  AppError,
  IoError,
  ParseError,
  ParseFloatFailure,
  DomainFailure,
} from './errors'
import {
  DomainError,
  ForeignFailure,
  IoFailure,
  ParseFloatError,
  ParseIntError,
  domainErrorMessages,
} from './failures'
import { assertNever } from './exhaustive'

// -------- CONVERSION REGISTRY --------
// The only sanctioned way for a collaborator's failure to become an AppError.
// Every conversion is total and keeps the cause's message verbatim.

export const fromIoFailure = (failure: IoFailure): AppError =>
  IoError(failure.code, failure.message, failure.path)

export const fromParseIntError = (failure: ParseIntError): AppError =>
  ParseError(failure.reason, failure.input, failure.message)

export const fromParseFloatError = (failure: ParseFloatError): AppError =>
  ParseFloatFailure(failure.reason, failure.input, failure.message)

export const fromDomainError = (failure: DomainError): AppError =>
  DomainFailure(failure, domainErrorMessages[failure.kind])

/**
 * Dispatches any foreign failure to its conversion.
 */
export const toAppError = (failure: ForeignFailure): AppError => {
  switch (failure.kind) {
    case 'IoFailure':
      return fromIoFailure(failure)
    case 'ParseIntError':
      return fromParseIntError(failure)
    case 'ParseFloatError':
      return fromParseFloatError(failure)
    case 'DivisionByZero':
    case 'NegativeSquareRoot':
    case 'Overflow':
      return fromDomainError(failure)
    default:
      return assertNever(failure)
  }
}

export const isAppError = (failure: AppError | ForeignFailure): failure is AppError =>
  'type' in failure

/**
 * Passes an AppError through untouched and converts anything else.
 */
export const toCanonical = (failure: AppError | ForeignFailure): AppError =>
  isAppError(failure) ? failure : toAppError(failure)
