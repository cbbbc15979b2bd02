import { AppError } from './errors'

export type Result<T, E = AppError> =
  | { isSuccess: true, value: T }
  | { isSuccess: false, error: E }

export const Success = <ValueType>(
  successfulValue: ValueType
): Result<ValueType, never> =>
  ({ isSuccess: true, value: successfulValue })

export const Failure = <ErrorType = AppError>(
  error: ErrorType
): Result<never, ErrorType> =>
  ({ isSuccess: false, error })

// -------- CORE OPERATIONS --------

/**
 * map: Transforms the Success value if the Result is on the Success track.
 * This is used for pure Calculations that do not return another Result.
 * T: The type of the value currently in the Result.
 * U: The type of the value after transformation.
 */
export const map = <T, U>(
  transformerFunction: (currentValue: T) => U
) => <E>(inputResult: Result<T, E>): Result<U, E> =>
  inputResult.isSuccess
    ? Success(transformerFunction(inputResult.value))
    : inputResult

/**
 * mapError: Transforms the Failure value, leaving the Success track untouched.
 * This is how a foreign failure is carried across a boundary into AppError.
 */
export const mapError = <E, F>(
  transformerFunction: (currentError: E) => F
) => <T>(inputResult: Result<T, E>): Result<T, F> =>
  inputResult.isSuccess
    ? inputResult
    : Failure(transformerFunction(inputResult.error))

/**
 * andThen (bind/flatMap): Transforms the Success value by running a function that itself returns a Result.
 * This is the primary composition tool for chaining synchronous operations (Calculations).
 * T: The type of the value currently in the Result.
 * U: The type of the value returned by the next Result (the next step in the pipeline).
 */
export const andThen = <T, U, E = AppError>(
  binderFunction: (currentValue: T) => Result<U, E>
) => (inputResult: Result<T, E>): Result<U, E> =>
  inputResult.isSuccess
    ? binderFunction(inputResult.value)
    : inputResult

/**
 * andThenAsync: Asynchronous version of andThen, used for chaining Actions (I/O).
 */
export const andThenAsync = <T, U, E = AppError>(
  asyncBinderFunction: (currentValue: T) => Promise<Result<U, E>>
) => async (inputResult: Result<T, E>): Promise<Result<U, E>> =>
  inputResult.isSuccess
    ? asyncBinderFunction(inputResult.value)
    : inputResult

// -------- ADDITIONAL UTILITIES --------

/**
 * fold: Handle both success and failure cases (pattern matching).
 */
export const fold = <T, U, E = AppError>(
  onFailure: (error: E) => U,
  onSuccess: (value: T) => U
) => (inputResult: Result<T, E>): U =>
  inputResult.isSuccess ? onSuccess(inputResult.value) : onFailure(inputResult.error)

/**
 * tapError: Perform a side effect on the error without changing the result.
 */
export const tapError = <E>(
  effect: (error: E) => void
) => <T>(inputResult: Result<T, E>): Result<T, E> => {
  if (!inputResult.isSuccess) effect(inputResult.error)
  return inputResult
}

/**
 * getOrElse: Get the value if success, otherwise return a default.
 * The error is discarded, so only use this where a default is a valid outcome.
 */
export const getOrElse = <T>(defaultValue: T) => <E>(inputResult: Result<T, E>): T =>
  inputResult.isSuccess ? inputResult.value : defaultValue
