import type { Request, Response, NextFunction } from 'express'
import { ZodError, type ZodTypeAny } from 'zod'
import { formatZodErrors } from '@/api/schemas/validators'

/**
 * Validation target type
 * Determines which part of the request to validate
 */
type ValidationTarget = 'body' | 'params' | 'query'

/**
 * Generic validation middleware factory
 *
 * Body validation replaces req.body with the parsed value (defaults applied,
 * unknown fields stripped). Params and query are checked in place.
 *
 * @example
 * router.post('/v1/controls/:action',
 *   validateBody(ControlBodySchema),
 *   (req, res) => { ... }
 * )
 */
export function validate(schema: ZodTypeAny, target: ValidationTarget = 'body') {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (target === 'body') {
        req.body = await schema.parseAsync(req.body ?? {})
      } else {
        await schema.parseAsync(target === 'params' ? req.params : req.query)
      }

      next()
    } catch (err) {
      if (err instanceof ZodError) {
        res.status(400).json({
          error: {
            code: 'VALIDATION_ERROR',
            message: 'Request validation failed',
            details: formatZodErrors(err),
          },
        })
      } else {
        next(err)
      }
    }
  }
}

export const validateBody = (schema: ZodTypeAny) => validate(schema, 'body')
