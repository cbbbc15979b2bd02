import type {
  DomainError,
  ParseFloatErrorReason,
  ParseIntErrorReason,
} from './failures'

// Integer grammar failures, plus a value the key=value layout cannot hold
export type ParseErrorReason = ParseIntErrorReason | 'Unrepresentable'

// 1. The Unified Error Type (Value)
export type AppError =
  | { type: 'Io', code: string, path?: string, message: string }
  | { type: 'Parse', reason: ParseErrorReason, input: string, message: string }
  | { type: 'ParseFloat', reason: ParseFloatErrorReason, input: string, message: string }
  | { type: 'Domain', error: DomainError, message: string }

export type AppErrorType = AppError['type']

// 2. Factories for creating specific Failure types

/**
 * Creates an Io failure (file missing, unreadable, permission denied).
 * These errors originate from the Storage shell.
 */
export const IoError = (
  code: string,
  message: string,
  path?: string
): AppError =>
  path === undefined
    ? { type: 'Io', code, message }
    : { type: 'Io', code, path, message }

/**
 * Creates a Parse failure: text did not match the integer grammar, or a value
 * cannot be written in a form that reads back unchanged.
 */
export const ParseError = (
  reason: ParseErrorReason,
  input: string,
  message: string
): AppError => ({
  type: 'Parse',
  reason,
  input,
  message
})

/**
 * Creates a ParseFloat failure: text did not match the float grammar.
 */
export const ParseFloatFailure = (
  reason: ParseFloatErrorReason,
  input: string,
  message: string
): AppError => ({
  type: 'ParseFloat',
  reason,
  input,
  message
})

/**
 * Creates a Domain failure wrapping the DomainError raised by an arithmetic operation.
 */
export const DomainFailure = (
  error: DomainError,
  message: string
): AppError => ({
  type: 'Domain',
  error,
  message
})

// 3. Presentation

const categoryLabels: Record<AppErrorType, string> = {
  Io: 'I/O error',
  Parse: 'Parse error',
  ParseFloat: 'Float parse error',
  Domain: 'Math error',
}

/**
 * Renders an AppError as "<category>: <original cause>".
 */
export const describeError = (error: AppError): string =>
  `${categoryLabels[error.type]}: ${error.message}`
