// Error Handler Middleware
// Maps engine errors to HTTP status codes and formats error responses
//
// Error mappings:
// - TransportError → 503 Service Unavailable (timer server not reachable)
// - IntentError → 409 Conflict (control not applicable to the current state)
// - ZodError → 400 Bad Request
// - Unknown errors → 500 Internal Server Error

import type { Request, Response, NextFunction } from 'express'
import { ZodError } from 'zod'
import { IntentError, TransportError } from '@/errors/TimerErrors'
import { formatZodErrors } from '@/api/schemas/validators'
import { createComponentLogger } from '@/utils/logger'

const logger = createComponentLogger('ErrorHandler')

interface ErrorResponse {
  error: {
    code: string
    message: string
    details?: unknown
    stack?: string
  }
}

/**
 * Global error handler middleware
 *
 * MUST BE THE LAST MIDDLEWARE in the Express app.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  let statusCode = 500
  let errorCode = 'INTERNAL_ERROR'
  let message = 'Internal server error'
  let details: unknown = undefined

  if (err instanceof TransportError) {
    statusCode = 503
    errorCode = err.code
    message = err.message
  } else if (err instanceof IntentError) {
    statusCode = 409
    errorCode = err.code
    message = err.message
    details = { control: err.control }
  } else if (err instanceof ZodError) {
    statusCode = 400
    errorCode = 'VALIDATION_ERROR'
    message = 'Request validation failed'
    details = formatZodErrors(err)
  }

  if (statusCode >= 500 && statusCode !== 503) {
    logger.error({ err, url: req.url, method: req.method }, 'Request error')
  } else {
    logger.warn({ code: errorCode, url: req.url, method: req.method }, 'Request rejected')
  }

  const response: ErrorResponse = {
    error: {
      code: errorCode,
      message,
      ...(details !== undefined && { details }),
    },
  }

  if (process.env.NODE_ENV === 'development') {
    response.error.stack = err.stack
  }

  res.status(statusCode).json(response)
}
