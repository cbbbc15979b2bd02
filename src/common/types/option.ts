// -------- TYPES --------

export type Option<T> = Some<T> | None<T>

export interface Some<T> {
  readonly _tag: 'Some'
  readonly value: T
}

export interface None<T> {
  readonly _tag: 'None'
}

// -------- CONSTRUCTORS --------

export const Some = <T>(value: T): Option<T> => ({ _tag: 'Some', value })

export const None = <T>(): Option<T> => ({ _tag: 'None' })

// -------- GUARDS --------

export const isSome = <T>(option: Option<T>): option is Some<T> =>
  option._tag === 'Some'

// -------- CORE OPERATIONS --------

/**
 * Create an Option from a nullable value.
 * If the value is null or undefined, returns None.
 */
export const fromNullable = <T>(value: T | null | undefined): Option<T> =>
  value === null || value === undefined ? None() : Some(value)

/**
 * Create an Option from a value that may be falsy (empty string, 0, false).
 * Uses a predicate to determine if the value is considered "present".
 */
export const fromFalsy = <T>(
  value: T,
  predicate: (x: T) => boolean = x => !!x
): Option<T> => predicate(value) ? Some(value) : None()

/**
 * Get the value if Some, otherwise return a default.
 */
export const getOrElse = <T>(defaultValue: T) => (option: Option<T>): T =>
  isSome(option) ? option.value : defaultValue

/**
 * Chain computations that may be absent.
 */
export const flatMap = <T, U>(f: (x: T) => Option<U>) => (option: Option<T>): Option<U> =>
  isSome(option) ? f(option.value) : None()
