import { z } from 'zod'

/**
 * Formats Zod validation errors into a consistent structure
 *
 * @example
 * const errors = formatZodErrors(zodError)
 * // [
 * //   {
 * //     field: "RECONNECT_DELAY_MS",
 * //     message: "Number must be greater than or equal to 100",
 * //     code: "too_small"
 * //   }
 * // ]
 */
export function formatZodErrors(error: z.ZodError) {
  return error.issues.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }))
}
