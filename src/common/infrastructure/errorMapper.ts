import { Request, Response } from 'express'
import { AppError, describeError } from '../types/errors'
import { assertNever } from '../types/exhaustive'

export type ErrorResponse = {
  status: number
  body: { error: Record<string, unknown> }
}

/**
 * Maps an AppError to an HTTP response status and body.
 * This is a pure function that centralizes the mapping logic.
 */
export const mapErrorToResponse = (error: AppError): ErrorResponse => {
  switch (error.type) {
    case 'Io':
      if (error.code === 'ENOENT') {
        return {
          status: 404, // Not Found
          body: { error: { ...error, description: describeError(error) } }
        }
      }
      // Do not expose storage details (paths, codes) to the client
      return {
        status: 500,
        body: {
          error: {
            type: 'Io',
            message: 'Internal server error'
          }
        }
      }

    case 'Parse':
    case 'ParseFloat':
    case 'Domain':
      // Malformed input or a violated arithmetic precondition
      return {
        status: 400, // Bad Request
        body: { error: { ...error, description: describeError(error) } }
      }

    default:
      return assertNever(error)
  }
}

/**
 * Helper to send an error response using Express's res object.
 * This is an impure function (side effect: sending HTTP response).
 */
export const sendErrorResponse = (res: Response, error: AppError): void => {
  const { status, body } = mapErrorToResponse(error)
  res.status(status).json(body)
}

/**
 * Higher-order function that wraps an async route handler to catch errors and map them.
 * Usage: wrapAsyncRoute(myHandler)
 */
export const wrapAsyncRoute = (handler: (req: Request, res: Response) => Promise<void>) =>
  async (req: Request, res: Response): Promise<void> => {
    try {
      await handler(req, res)
    } catch (error: unknown) {
      // Anything thrown here escaped the Result track: log it and answer with a generic 500.
      console.error('Unexpected error in route handler', error)
      res.status(500).json({
        error: {
          type: 'Unexpected',
          message: 'An unexpected error occurred'
        }
      })
    }
  }
