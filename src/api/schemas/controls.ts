import { z } from 'zod'
import { CONTROL_ACTIONS } from '@/engine/IntentDispatcher'

/**
 * Control route params
 * POST /v1/controls/:action
 */
export const ControlParamsSchema = z.object({
  action: z.enum(CONTROL_ACTIONS, {
    message: `Unknown control. Must be one of: ${CONTROL_ACTIONS.join(', ')}`,
  }),
})

/**
 * Control request body
 * `enabled` only applies to blink and blackout; omitted means toggle
 */
export const ControlBodySchema = z.object({
  enabled: z.boolean().optional(),
})

export type ControlBody = z.infer<typeof ControlBodySchema>
