import { AppError } from './errors'
import { ForeignFailure } from './failures'
import { Result, Success, Failure } from './result'
import { toCanonical } from './conversions'

/**
 * A pipeline step may fail with an AppError or with a collaborator's own
 * failure; the chain converts the latter when it stops.
 */
export type StepFailure = AppError | ForeignFailure

export type Step<A, B> = (input: A) => Result<B, StepFailure>

export type AsyncStep<A, B> = (input: A) => Result<B, StepFailure> | Promise<Result<B, StepFailure>>

export interface Chain<A, B> {
  andThen: <C>(step: Step<B, C>) => Chain<A, C>
  run: (input: A) => Result<B>
}

export interface AsyncChain<A, B> {
  andThen: <C>(step: AsyncStep<B, C>) => AsyncChain<A, C>
  run: (input: A) => Promise<Result<B>>
}

const canonicalize = <T>(stepResult: Result<T, StepFailure>): Result<T> =>
  stepResult.isSuccess ? stepResult : Failure(toCanonical(stepResult.error))

const buildChain = <A, B>(run: (input: A) => Result<B>): Chain<A, B> => ({
  andThen: <C>(step: Step<B, C>) =>
    buildChain<A, C>(input => {
      const current = run(input)
      return current.isSuccess ? canonicalize(step(current.value)) : current
    }),
  run,
})

const buildAsyncChain = <A, B>(run: (input: A) => Promise<Result<B>>): AsyncChain<A, B> => ({
  andThen: <C>(step: AsyncStep<B, C>) =>
    buildAsyncChain<A, C>(async input => {
      const current = await run(input)
      if (!current.isSuccess) return current
      return canonicalize(await step(current.value))
    }),
  run,
})

/**
 * Fail-fast composition of synchronous steps.
 *
 * Steps run left to right, each receiving the previous step's value. The first
 * failure stops the chain and becomes its result, converted to an AppError.
 * A chain without steps returns its input.
 *
 * @example
 * chain<string>().andThen(parseFloatStrict).andThen(sqrt).run('16') // Success(4)
 */
export const chain = <A>(): Chain<A, A> =>
  buildChain<A, A>(input => Success(input))

/**
 * Same as {@link chain}, for steps that may return a Promise (I/O).
 */
export const chainAsync = <A>(): AsyncChain<A, A> =>
  buildAsyncChain<A, A>(async input => Success(input))
