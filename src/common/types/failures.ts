// Foreign failure shapes: what collaborators (storage, text parsers, the
// arithmetic domain) report before their failures cross into AppError.

export type IoFailure = {
  kind: 'IoFailure'
  code: string
  path?: string
  message: string
}

export type ParseIntErrorReason = 'Empty' | 'InvalidDigit' | 'PosOverflow'

export type ParseIntError = {
  kind: 'ParseIntError'
  reason: ParseIntErrorReason
  input: string
  message: string
}

export type ParseFloatErrorReason = 'Empty' | 'Invalid'

export type ParseFloatError = {
  kind: 'ParseFloatError'
  reason: ParseFloatErrorReason
  input: string
  message: string
}

// Never converted: boolean fields fall back to a default instead of failing.
export type ParseBoolError = {
  kind: 'ParseBoolError'
  input: string
  message: string
}

export type DomainError =
  | { kind: 'DivisionByZero' }
  | { kind: 'NegativeSquareRoot' }
  | { kind: 'Overflow' }

export type DomainErrorKind = DomainError['kind']

export const domainErrorMessages: Record<DomainErrorKind, string> = {
  DivisionByZero: 'division by zero',
  NegativeSquareRoot: 'square root of a negative number',
  Overflow: 'arithmetic overflow',
}

export type ForeignFailure =
  | IoFailure
  | ParseIntError
  | ParseFloatError
  | DomainError
