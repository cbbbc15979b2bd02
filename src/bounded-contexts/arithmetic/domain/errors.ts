import { DomainError } from '@/common/types/failures'

// Arithmetic precondition violations. Only the operations in ./arithmetic build these.
export const DivisionByZero = (): DomainError => ({ kind: 'DivisionByZero' })

export const NegativeSquareRoot = (): DomainError => ({ kind: 'NegativeSquareRoot' })

export const Overflow = (): DomainError => ({ kind: 'Overflow' })
