import { Router, Request, Response } from 'express'
import { Storage } from '@/common/infrastructure/storage'
import { sendErrorResponse, wrapAsyncRoute } from '@/common/infrastructure/errorMapper'
import { computeFromFileWorkflow } from '@/bounded-contexts/arithmetic/application/computeFromFileWorkflow'
import { divide, multiply, sqrt } from '@/bounded-contexts/arithmetic/domain/arithmetic'
import { chain } from '@/common/types/chain'
import { Result } from '@/common/types/result'
import { DomainError } from '@/common/types/failures'
import { parseFloatStrict } from '@/shared/parsing'

// A missing query parameter parses as the empty string.
const queryText = (req: Request, name: string): string => {
  const value = req.query[name]
  return typeof value === 'string' ? value.trim() : ''
}

/**
 * Finds the first parameter sent more than once (or as a nested object),
 * which has no single number to parse.
 */
const findAmbiguousParam = (req: Request, names: string[]): string | undefined =>
  names.find(name => {
    const value = req.query[name]
    return value !== undefined && typeof value !== 'string'
  })

const sendAmbiguousParam = (res: Response, name: string): void => {
  res.status(400).json({
    error: {
      type: 'InvalidQuery',
      message: `Query parameter ${name} must be given exactly once`
    }
  })
}

type BinaryOperation = (a: number, b: number) => Result<number, DomainError>

// Parses a then b, stopping at the first failure, and applies the operation.
const runBinary = (req: Request, operation: BinaryOperation): Result<number> =>
  chain<string>()
    .andThen(parseFloatStrict)
    .andThen(a => chain<string>()
      .andThen(parseFloatStrict)
      .andThen(b => operation(a, b))
      .run(queryText(req, 'b')))
    .run(queryText(req, 'a'))

export const arithmeticRoutes = (storage: Storage): Router => {
  const router = Router()
  const computeFromFile = computeFromFileWorkflow(storage)

  /**
   * GET /api/arithmetic/files/:name
   * Reads a number from a stored file and returns sqrt(n) / 10.
   *
   * Responses:
   * - 200: { result }
   * - 400: Unparsable content or negative number
   * - 404: File not found
   * - 500: Other storage failure
   */
  router.get('/files/:name', wrapAsyncRoute(async (req, res) => {
    const result = await computeFromFile(req.params.name)

    if (result.isSuccess) {
      res.json({ result: result.value })
    } else {
      sendErrorResponse(res, result.error)
    }
  }))

  /**
   * GET /api/arithmetic/sqrt?x=
   *
   * Responses:
   * - 200: { result }
   * - 400: x missing, repeated, unparsable or negative
   */
  router.get('/sqrt', wrapAsyncRoute(async (req, res) => {
    const ambiguous = findAmbiguousParam(req, ['x'])
    if (ambiguous !== undefined) {
      sendAmbiguousParam(res, ambiguous)
      return
    }

    const result = chain<string>()
      .andThen(parseFloatStrict)
      .andThen(sqrt)
      .run(queryText(req, 'x'))

    if (result.isSuccess) {
      res.json({ result: result.value })
    } else {
      sendErrorResponse(res, result.error)
    }
  }))

  /**
   * GET /api/arithmetic/divide?a=&b=
   *
   * Responses:
   * - 200: { result }
   * - 400: a or b missing, repeated or unparsable, or b is zero
   */
  router.get('/divide', wrapAsyncRoute(async (req, res) => {
    const ambiguous = findAmbiguousParam(req, ['a', 'b'])
    if (ambiguous !== undefined) {
      sendAmbiguousParam(res, ambiguous)
      return
    }

    const result = runBinary(req, divide)

    if (result.isSuccess) {
      res.json({ result: result.value })
    } else {
      sendErrorResponse(res, result.error)
    }
  }))

  /**
   * GET /api/arithmetic/multiply?a=&b=
   *
   * Responses:
   * - 200: { result }
   * - 400: a or b missing, repeated or unparsable, or the product of finite operands overflows
   */
  router.get('/multiply', wrapAsyncRoute(async (req, res) => {
    const ambiguous = findAmbiguousParam(req, ['a', 'b'])
    if (ambiguous !== undefined) {
      sendAmbiguousParam(res, ambiguous)
      return
    }

    const result = runBinary(req, multiply)

    if (result.isSuccess) {
      res.json({ result: result.value })
    } else {
      sendErrorResponse(res, result.error)
    }
  }))

  return router
}
